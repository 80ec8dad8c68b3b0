import { cliExecutableFind } from "./cliExecutableFind.js";

export const CLI_EXECUTABLE_DEFAULT = "kiro-cli";
export const CLI_EXECUTABLE_ENV = "KIRO_CLI_PATH";

export type CliExecutableResolveOptions = {
    explicit?: string | null;
    env: Readonly<Record<string, string | undefined>>;
    fallback?: string;
    find?: (name: string, searchPath: string | undefined) => string | null;
};

/**
 * Resolves the CLI executable: explicit value, then KIRO_CLI_PATH, then a PATH lookup
 * of the fallback name, then the bare fallback name.
 */
export function cliExecutableResolve(options: CliExecutableResolveOptions): string {
    const explicit = options.explicit?.trim();
    if (explicit) {
        return explicit;
    }

    const fromEnv = options.env[CLI_EXECUTABLE_ENV]?.trim();
    if (fromEnv) {
        return fromEnv;
    }

    const fallback = options.fallback ?? CLI_EXECUTABLE_DEFAULT;
    const find = options.find ?? cliExecutableFind;
    return find(fallback, options.env.PATH) ?? fallback;
}
