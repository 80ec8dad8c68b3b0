import { attachmentKindMarkerName } from "../attachments/attachmentKindMarkerName.js";
import { attachmentMarkersParse } from "../attachments/attachmentMarkersParse.js";
import { attachmentTargetClassify } from "../attachments/attachmentTargetClassify.js";
import { streamReadText } from "../utils/streamReadText.js";

/**
 * Reads message text from input and prints the cleaned text and attachments as JSON.
 */
export async function parseCommand(input: AsyncIterable<Buffer | string> = process.stdin): Promise<void> {
    const text = await streamReadText(input);
    const result = attachmentMarkersParse(text);
    const payload = {
        text: result.text,
        attachments: result.attachments.map((attachment) => ({
            kind: attachmentKindMarkerName(attachment.kind),
            target: attachment.target,
            location: attachmentTargetClassify(attachment.target)
        }))
    };
    console.log(JSON.stringify(payload, null, 2));
}
