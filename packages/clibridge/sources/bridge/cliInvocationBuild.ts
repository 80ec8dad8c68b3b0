import type { CliInvocation, CliInvocationOptions } from "./cliInvocationTypes.js";

export const CLI_SUBCOMMAND: readonly string[] = ["chat", "--no-interactive"];

export const CLI_ENV_OVERRIDES: Readonly<Record<string, string>> = {
    NO_COLOR: "1",
    TERM: "dumb"
};

/**
 * Builds the immutable invocation reused for every call of a provider instance.
 * Overrides always win over the base environment so output stays plain.
 */
export function cliInvocationBuild(options: CliInvocationOptions): CliInvocation {
    const args = [...CLI_SUBCOMMAND];
    if (options.agent) {
        args.push("--agent", options.agent);
    }
    if (options.model) {
        args.push("--model", options.model);
    }

    return Object.freeze({
        executable: options.executable,
        args: Object.freeze(args),
        env: Object.freeze({ ...options.env, ...CLI_ENV_OVERRIDES }),
        transport: options.transport
    });
}

/**
 * Returns the argv for one call; the argument transport appends the prompt last.
 */
export function cliInvocationArgs(invocation: CliInvocation, prompt: string): string[] {
    return invocation.transport === "argument" ? [...invocation.args, prompt] : [...invocation.args];
}
