import { z } from "zod";

import type { DisplayConfigInput } from "./displayConfigTypes.js";

/**
 * Parses raw formatter settings into a validated DisplayConfigInput.
 * Expects: raw is JSON-compatible; throws ZodError when it does not match the schema.
 */
export function displayConfigParse(raw: unknown): DisplayConfigInput {
    const sliceSettings = z
        .object({
            limit: z.number().int().nonnegative().optional(),
            separator: z.string().optional(),
            braces: z.tuple([z.string(), z.string()]).optional()
        })
        .strict();

    const timestampSettings = z
        .object({
            precision: z.enum(["micros", "millis"]).optional(),
            withTimezone: z.boolean().optional()
        })
        .strict();

    const configSchema = z
        .object({
            slice: sliceSettings.optional(),
            timestamp: timestampSettings.optional()
        })
        .strict();

    return configSchema.parse(raw);
}
