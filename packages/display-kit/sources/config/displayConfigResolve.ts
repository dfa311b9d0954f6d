import { getLogger } from "../log.js";
import {
    SLICE_DEFAULT_BRACES,
    SLICE_DEFAULT_LIMIT,
    SLICE_DEFAULT_SEPARATOR,
    type SliceBraces
} from "../slice/sliceDisplay.js";
import type { DisplayConfig, DisplayConfigEnv, DisplayConfigInput } from "./displayConfigTypes.js";

const logger = getLogger("config.resolve");

/**
 * Resolves defaults and environment overrides into an immutable DisplayConfig snapshot.
 * Explicit input wins over DISPLAY_KIT_SLICE_LIMIT and DISPLAY_KIT_SLICE_SEPARATOR.
 * Expects: input already validated by displayConfigParse.
 */
export function displayConfigResolve(
    input: DisplayConfigInput = {},
    env: DisplayConfigEnv = process.env
): DisplayConfig {
    const limit = input.slice?.limit ?? envLimitRead(env) ?? SLICE_DEFAULT_LIMIT;
    const separator = input.slice?.separator ?? env.DISPLAY_KIT_SLICE_SEPARATOR ?? SLICE_DEFAULT_SEPARATOR;
    const [left, right] = input.slice?.braces ?? SLICE_DEFAULT_BRACES;
    const braces: SliceBraces = Object.freeze([left, right] as const);

    return Object.freeze({
        slice: Object.freeze({ limit, separator, braces }),
        timestamp: Object.freeze({
            precision: input.timestamp?.precision ?? "micros",
            withTimezone: input.timestamp?.withTimezone ?? true
        })
    });
}

function envLimitRead(env: DisplayConfigEnv): number | null {
    const raw = env.DISPLAY_KIT_SLICE_LIMIT?.trim();
    if (!raw) {
        return null;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0) {
        logger.warn({ value: raw }, "config: ignoring DISPLAY_KIT_SLICE_LIMIT, expected a non-negative integer");
        return null;
    }
    return parsed;
}
