import { promises as fs } from "node:fs";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { configResolve, type ConfigResolveOptions } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { CliProviderConfig, ConfigOverrides } from "./configTypes.js";

/**
 * Loads, validates and resolves the settings file. A missing file counts as empty settings.
 * Expects: settingsPath points at a JSON document.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {},
    options: ConfigResolveOptions = { env: process.env }
): Promise<CliProviderConfig> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!errorCodeIs(error, "ENOENT")) {
            throw error;
        }
    }

    const settings = configSettingsParse(raw);
    return configResolve(settings, overrides, options);
}

function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}
