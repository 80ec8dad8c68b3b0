import type { ChatMessage, CliInvocation, CliProviderConfig } from "@/types";

import { cliBridgeInvoke } from "../bridge/cliBridgeInvoke.js";
import { cliInvocationBuild } from "../bridge/cliInvocationBuild.js";
import { getLogger } from "../log.js";
import { promptBuild } from "../prompt/promptBuild.js";
import { promptSingleTurnBuild } from "../prompt/promptSingleTurnBuild.js";
import type { ChatProvider, ProviderCallOptions } from "./providerTypes.js";

const logger = getLogger("providers.cli");

/**
 * Chat provider backed by a local agent CLI. Each call spawns one process;
 * the invocation is built once from the resolved config and reused.
 */
export class CliProvider implements ChatProvider {
    private readonly config: CliProviderConfig;
    private readonly invocation: CliInvocation;

    constructor(config: CliProviderConfig) {
        this.config = config;
        this.invocation = cliInvocationBuild({
            executable: config.executable,
            agent: config.agent,
            model: config.model,
            transport: config.transport,
            env: config.env
        });
        logger.debug(
            `start: CLI provider ready executable=${config.executable} agent=${config.agent ?? "default"} model=${config.model ?? "default"} transport=${config.transport}`
        );
    }

    supportsNativeTools(): boolean {
        return false;
    }

    async chatWithSystem(system: string | null, message: string, options: ProviderCallOptions = {}): Promise<string> {
        const prompt = promptSingleTurnBuild(system, message, this.config.systemRule, this.config.budget);
        return this.invoke(prompt, options);
    }

    async chatWithHistory(messages: ChatMessage[], options: ProviderCallOptions = {}): Promise<string> {
        const prompt = promptBuild(messages, this.config.systemRule, this.config.budget);
        logger.debug(`event: History prompt built messages=${messages.length} promptChars=${prompt.length}`);
        return this.invoke(prompt, options);
    }

    private invoke(prompt: string, options: ProviderCallOptions): Promise<string> {
        return cliBridgeInvoke(this.invocation, prompt, {
            overflowMarkers: this.config.overflowMarkers,
            signal: options.signal
        });
    }
}
