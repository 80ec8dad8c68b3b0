import { attachmentKindFromMarker } from "./attachmentKindFromMarker.js";
import type { Attachment, AttachmentMarkersParseResult } from "./attachmentTypes.js";

/**
 * Extracts `[KIND:target]` markers from message text.
 * Recognized markers are removed from the returned text and listed in source order;
 * every other bracket span is kept verbatim. The first `]` after a `[` always closes
 * the span, so targets cannot contain `]`.
 */
export function attachmentMarkersParse(message: string): AttachmentMarkersParseResult {
    let cleaned = "";
    const attachments: Attachment[] = [];
    let cursor = 0;

    while (cursor < message.length) {
        const open = message.indexOf("[", cursor);
        if (open === -1) {
            cleaned += message.slice(cursor);
            break;
        }
        cleaned += message.slice(cursor, open);

        const close = message.indexOf("]", open);
        if (close === -1) {
            cleaned += message.slice(open);
            break;
        }

        const attachment = markerParse(message.slice(open + 1, close));
        if (attachment) {
            attachments.push(attachment);
        } else {
            cleaned += message.slice(open, close + 1);
        }
        cursor = close + 1;
    }

    return { text: cleaned.trim(), attachments };
}

function markerParse(body: string): Attachment | null {
    const separator = body.indexOf(":");
    if (separator === -1) {
        return null;
    }
    const kind = attachmentKindFromMarker(body.slice(0, separator));
    if (!kind) {
        return null;
    }
    const target = body.slice(separator + 1).trim();
    if (target.length === 0) {
        return null;
    }
    return Object.freeze({ kind, target });
}
