export type AttachmentKind = "image" | "document" | "video" | "audio" | "voice";

export type AttachmentTargetLocation = "local" | "remote";

export type Attachment = {
    readonly kind: AttachmentKind;
    readonly target: string;
};

export type AttachmentMarkersParseResult = {
    text: string;
    attachments: Attachment[];
};

export const ATTACHMENT_KINDS: readonly AttachmentKind[] = ["image", "document", "video", "audio", "voice"];
