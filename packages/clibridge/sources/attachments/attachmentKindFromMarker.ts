import type { AttachmentKind } from "./attachmentTypes.js";

const MARKER_KINDS = new Map<string, AttachmentKind>([
    ["IMAGE", "image"],
    ["PHOTO", "image"],
    ["DOCUMENT", "document"],
    ["FILE", "document"],
    ["VIDEO", "video"],
    ["AUDIO", "audio"],
    ["VOICE", "voice"]
]);

const ASCII_NAME_REGEX = /^[A-Za-z]+$/;

/**
 * Resolves a marker name (canonical or synonym, any ASCII case, surrounding whitespace allowed)
 * into an attachment kind. Returns null for unknown names.
 * Expects: only ASCII letters fold, so `ﬁle` or `vıdeo` stay unknown.
 */
export function attachmentKindFromMarker(marker: string): AttachmentKind | null {
    const name = marker.trim();
    if (!ASCII_NAME_REGEX.test(name)) {
        return null;
    }
    return MARKER_KINDS.get(name.toUpperCase()) ?? null;
}
