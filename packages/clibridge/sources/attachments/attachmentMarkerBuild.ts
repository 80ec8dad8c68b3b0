import { attachmentKindMarkerName } from "./attachmentKindMarkerName.js";
import type { AttachmentKind } from "./attachmentTypes.js";

/**
 * Builds a `[KIND:target]` marker using the canonical kind name.
 * Expects: target is non-empty and contains no `]`.
 */
export function attachmentMarkerBuild(kind: AttachmentKind, target: string): string {
    return `[${attachmentKindMarkerName(kind)}:${target}]`;
}
