import { outputSanitize } from "../output/outputSanitize.js";
import { streamReadText } from "../utils/streamReadText.js";

export async function sanitizeCommand(input: AsyncIterable<Buffer | string> = process.stdin): Promise<void> {
    const raw = await streamReadText(input);
    console.log(outputSanitize(raw));
}
