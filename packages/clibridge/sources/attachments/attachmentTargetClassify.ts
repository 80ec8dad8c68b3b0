import type { AttachmentTargetLocation } from "./attachmentTypes.js";

/**
 * Classifies an attachment target by its scheme prefix. Only exact, case-sensitive
 * `http://` and `https://` prefixes are remote; the filesystem is never consulted.
 */
export function attachmentTargetClassify(target: string): AttachmentTargetLocation {
    if (target.startsWith("http://") || target.startsWith("https://")) {
        return "remote";
    }
    return "local";
}
