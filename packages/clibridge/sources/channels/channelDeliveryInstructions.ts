import { attachmentMarkerBuild } from "../attachments/attachmentMarkerBuild.js";
import { ATTACHMENT_KINDS } from "../attachments/attachmentTypes.js";

const TARGET_PLACEHOLDER = "<path-or-url>";

const DEFAULT_CHANNELS = new Set([
    "discord",
    "slack",
    "mattermost",
    "matrix",
    "dingtalk",
    "lark",
    "feishu",
    "signal",
    "whatsapp",
    "qq",
    "imessage",
    "email",
    "irc"
]);

const TELEGRAM_INSTRUCTIONS = [
    "You are replying in a Telegram chat.",
    `To send an image, put ${attachmentMarkerBuild("image", TARGET_PLACEHOLDER)} on its own line; the marker is removed from the text and the file is uploaded.`,
    `Other media work the same way: ${ATTACHMENT_KINDS.filter((kind) => kind !== "image")
        .map((kind) => attachmentMarkerBuild(kind, TARGET_PLACEHOLDER))
        .join(", ")}.`,
    "Telegram renders **bold**, _italic_ and `code`; keep formatting light.",
    "Keep replies short enough to read on a phone. Use tool results silently and do not narrate tool calls."
].join("\n");

const DEFAULT_INSTRUCTIONS = [
    "Media delivery: reference files with markers, one per line:",
    ...ATTACHMENT_KINDS.map((kind) => `- ${attachmentMarkerBuild(kind, TARGET_PLACEHOLDER)}`),
    "Markers are removed from the message and the referenced file or URL is sent as an attachment.",
    "Be concise and direct. Skip filler phrases, greetings and sign-offs.",
    "Use tool results silently: do not narrate what you are about to do, report the outcome."
].join("\n");

/**
 * Returns delivery guidance appended to the system prompt for a messaging channel.
 * Channels without attachment support (cli, dummy, unknown names) get null.
 * Lookup is case-sensitive.
 */
export function channelDeliveryInstructions(channel: string): string | null {
    if (channel === "telegram") {
        return TELEGRAM_INSTRUCTIONS;
    }
    if (DEFAULT_CHANNELS.has(channel)) {
        return DEFAULT_INSTRUCTIONS;
    }
    return null;
}
