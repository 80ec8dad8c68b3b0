import { configLoad } from "../config/configLoad.js";
import { CliProvider } from "../providers/cliProvider.js";
import type { ProviderCommandOptions } from "./commandTypes.js";

export type AskCommandOptions = ProviderCommandOptions & {
    system?: string;
};

/**
 * Sends one message through the configured CLI backend and prints the reply.
 */
export async function askCommand(message: string, options: AskCommandOptions): Promise<void> {
    try {
        const config = await configLoad(options.settings, {
            executable: options.executable,
            agent: options.agent,
            model: options.model
        });
        const provider = new CliProvider(config);
        const reply = await provider.chatWithSystem(options.system ?? null, message);
        console.log(reply);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        process.exitCode = 1;
        console.error(`Failed to ask: ${reason}`);
    }
}
