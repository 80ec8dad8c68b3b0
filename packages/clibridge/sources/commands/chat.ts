import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { configLoad } from "../config/configLoad.js";
import type { ChatMessage } from "../prompt/promptTypes.js";
import { CliProvider } from "../providers/cliProvider.js";
import type { ProviderCommandOptions } from "./commandTypes.js";

export type ChatCommandOptions = ProviderCommandOptions;

const historySchema = z.array(
    z.object({
        role: z.string(),
        content: z.string()
    })
);

/**
 * Replays a conversation history file through the CLI backend and prints the reply.
 * Expects: historyFile holds a JSON array of `{ role, content }` messages.
 */
export async function chatCommand(historyFile: string, options: ChatCommandOptions): Promise<void> {
    try {
        const messages = await chatHistoryRead(historyFile);
        const config = await configLoad(options.settings, {
            executable: options.executable,
            agent: options.agent,
            model: options.model
        });
        const provider = new CliProvider(config);
        const reply = await provider.chatWithHistory(messages);
        console.log(reply);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        process.exitCode = 1;
        console.error(`Failed to chat: ${reason}`);
    }
}

async function chatHistoryRead(historyFile: string): Promise<ChatMessage[]> {
    const content = await fs.readFile(path.resolve(historyFile), "utf8");
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (_error) {
        throw new Error(`History file is not valid JSON: ${historyFile}`);
    }
    const parsed = historySchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`History file must be an array of { role, content } messages: ${historyFile}`);
    }
    return parsed.data;
}
