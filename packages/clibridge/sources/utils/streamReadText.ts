/**
 * Reads a stream to its end and decodes it as UTF-8.
 */
export async function streamReadText(stream: AsyncIterable<Buffer | string>): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    }
    return Buffer.concat(chunks).toString("utf8");
}
