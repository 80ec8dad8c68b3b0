import type { CliTransport } from "../bridge/cliInvocationTypes.js";
import type { PromptBudget, PromptSystemRule } from "../prompt/promptTypes.js";

export type CliSettings = {
    executable?: string;
    agent?: string;
    model?: string;
    transport?: CliTransport;
};

export type PromptSettings = {
    system?: PromptSystemRule;
    maxPromptChars?: number;
    maxHistoryTurns?: number;
};

export type SettingsConfig = {
    cli?: CliSettings;
    prompt?: PromptSettings;
    overflowMarkers?: string[];
};

/**
 * Fully resolved provider configuration. Environment lookups happen once while
 * resolving; nothing downstream reads process state.
 */
export type CliProviderConfig = {
    executable: string;
    agent: string | null;
    model: string | null;
    transport: CliTransport;
    systemRule: PromptSystemRule;
    budget: PromptBudget;
    overflowMarkers: readonly string[];
    env: Readonly<Record<string, string>>;
};

export type ConfigOverrides = {
    executable?: string;
    agent?: string;
    model?: string;
};
