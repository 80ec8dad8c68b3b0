import { cliExecutableResolve } from "../bridge/cliExecutableResolve.js";
import { DEFAULT_OVERFLOW_MARKERS } from "../output/outputContextOverflowIs.js";
import type { CliProviderConfig, ConfigOverrides, SettingsConfig } from "./configTypes.js";

export const CLI_AGENT_ENV = "KIRO_AGENT";
export const CLI_MODEL_ENV = "KIRO_MODEL";

export const DEFAULT_MAX_PROMPT_CHARS = 100_000;
export const DEFAULT_MAX_HISTORY_TURNS = 8;

export type ConfigResolveOptions = {
    env?: Readonly<Record<string, string | undefined>>;
    find?: (name: string, searchPath: string | undefined) => string | null;
};

/**
 * Resolves settings, overrides and the environment into an immutable provider config.
 * Precedence for executable, agent and model: overrides, then settings, then environment.
 */
export function configResolve(
    settings: SettingsConfig,
    overrides: ConfigOverrides = {},
    options: ConfigResolveOptions = {}
): CliProviderConfig {
    const env = options.env ?? {};
    const executable = cliExecutableResolve({
        explicit: overrides.executable ?? settings.cli?.executable,
        env,
        find: options.find
    });

    const config: CliProviderConfig = {
        executable,
        agent: valueResolve(overrides.agent ?? settings.cli?.agent, env[CLI_AGENT_ENV]),
        model: valueResolve(overrides.model ?? settings.cli?.model, env[CLI_MODEL_ENV]),
        transport: settings.cli?.transport ?? "stdin",
        systemRule: settings.prompt?.system ?? { mode: "full" },
        budget: {
            maxPromptChars: settings.prompt?.maxPromptChars ?? DEFAULT_MAX_PROMPT_CHARS,
            maxHistoryTurns: settings.prompt?.maxHistoryTurns ?? DEFAULT_MAX_HISTORY_TURNS
        },
        overflowMarkers: settings.overflowMarkers ? [...settings.overflowMarkers] : [...DEFAULT_OVERFLOW_MARKERS],
        env: envDefinedPick(env)
    };
    return configFreeze(config);
}

function configFreeze(config: CliProviderConfig): CliProviderConfig {
    Object.freeze(config.systemRule);
    Object.freeze(config.budget);
    Object.freeze(config.overflowMarkers);
    Object.freeze(config.env);
    return Object.freeze(config);
}

function valueResolve(configured: string | undefined, fromEnv: string | undefined): string | null {
    const value = configured?.trim() || fromEnv?.trim();
    return value ? value : null;
}

function envDefinedPick(env: Readonly<Record<string, string | undefined>>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}
