import { displayConfigResolve } from "./config/displayConfigResolve.js";
import type { DisplayConfig } from "./config/displayConfigTypes.js";
import { optionDisplay, optionDisplayDebug } from "./option/optionDisplay.js";
import { resultDisplay } from "./result/resultDisplay.js";
import { type SliceDisplayOptions, sliceDisplay } from "./slice/sliceDisplay.js";
import { unixTimestampDisplay, unixTimestampDisplayShort } from "./timestamp/unixTimestampDisplay.js";
import type { Display, Option, Result } from "./types.js";

export type DisplayFormatter = {
    readonly config: DisplayConfig;
    option<T extends Display>(value: Option<T>): string;
    optionDebug<T>(value: Option<T>): string;
    result<T extends Display, E extends Display>(result: Result<T, E>): string;
    slice<T extends Display>(items: readonly T[], limitOrOptions?: number | SliceDisplayOptions<T>): string;
    timestamp(millis: Option<number>): string;
    timestampShort(millis: Option<number>): string;
};

/**
 * Binds the formatters to a resolved configuration.
 * Per-call slice options override the configured slice defaults.
 */
export function displayFormatterCreate(config: DisplayConfig = displayConfigResolve()): DisplayFormatter {
    return {
        config,
        option: (value) => optionDisplay(value),
        optionDebug: (value) => optionDisplayDebug(value),
        result: (result) => resultDisplay(result),
        slice: (items, limitOrOptions) => sliceDisplay(items, sliceOptionsMerge(config, limitOrOptions)),
        timestamp: (millis) => unixTimestampDisplay(millis, config.timestamp),
        timestampShort: (millis) => unixTimestampDisplayShort(millis)
    };
}

function sliceOptionsMerge<T>(
    config: DisplayConfig,
    limitOrOptions: number | SliceDisplayOptions<T> | undefined
): SliceDisplayOptions<T> {
    const overrides: SliceDisplayOptions<T> =
        typeof limitOrOptions === "number" ? { limit: limitOrOptions } : (limitOrOptions ?? {});
    return {
        limit: overrides.limit ?? config.slice.limit,
        separator: overrides.separator ?? config.slice.separator,
        braces: overrides.braces ?? config.slice.braces,
        format: overrides.format
    };
}
