import type { AttachmentKind } from "./attachmentTypes.js";

const MARKER_NAMES: Record<AttachmentKind, string> = {
    image: "IMAGE",
    document: "DOCUMENT",
    video: "VIDEO",
    audio: "AUDIO",
    voice: "VOICE"
};

/**
 * Returns the canonical uppercase marker name emitted for an attachment kind.
 */
export function attachmentKindMarkerName(kind: AttachmentKind): string {
    return MARKER_NAMES[kind];
}
