import { z } from "zod";

import type { SettingsConfig } from "./configTypes.js";

const systemRuleSchema = z.discriminatedUnion("mode", [
    z.object({ mode: z.literal("full") }),
    z.object({ mode: z.literal("anchor"), anchor: z.string().min(1) })
]);

const settingsSchema = z
    .object({
        cli: z
            .object({
                executable: z.string().min(1).optional(),
                agent: z.string().min(1).optional(),
                model: z.string().min(1).optional(),
                transport: z.enum(["stdin", "argument"]).optional()
            })
            .passthrough()
            .optional(),
        prompt: z
            .object({
                system: systemRuleSchema.optional(),
                maxPromptChars: z.number().int().positive().optional(),
                maxHistoryTurns: z.number().int().nonnegative().optional()
            })
            .passthrough()
            .optional(),
        overflowMarkers: z.array(z.string().min(1)).optional()
    })
    .passthrough();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; throws a ZodError describing every invalid field.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw ?? {});
}
