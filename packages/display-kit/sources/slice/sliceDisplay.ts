import type { Display } from "../types.js";
import { valueDisplay } from "../value/valueDisplay.js";

export const SLICE_DEFAULT_LIMIT = 4;
export const SLICE_DEFAULT_SEPARATOR = ",";
export const SLICE_DEFAULT_BRACES: SliceBraces = ["[", "]"];
export const SLICE_ELISION_MARKER = "..";

export type SliceBraces = readonly [left: string, right: string];

export type SliceDisplayOptions<T> = {
    limit?: number;
    separator?: string;
    braces?: SliceBraces;
    format?: (item: T) => string;
};

/**
 * Renders a sequence between braces, eliding the middle once it has more than limit + 1 items.
 * Past that point the first `limit` items, the ".." marker and the last item are kept:
 * [1..8] with limit 3 renders "[1,2,3,..,8]".
 */
export function sliceDisplay<T extends Display>(
    items: readonly T[],
    limitOrOptions?: number | SliceDisplayOptions<T>
): string {
    const options: SliceDisplayOptions<T> =
        typeof limitOrOptions === "number" ? { limit: limitOrOptions } : (limitOrOptions ?? {});
    const limit = sliceLimitNormalize(options.limit);
    const separator = options.separator ?? SLICE_DEFAULT_SEPARATOR;
    const [left, right] = options.braces ?? SLICE_DEFAULT_BRACES;
    const format = options.format ?? valueDisplay;

    const last = items.at(-1);
    if (items.length <= limit + 1 || last === undefined) {
        return `${left}${items.map((item) => format(item)).join(separator)}${right}`;
    }

    const pieces = items.slice(0, limit).map((item) => format(item));
    pieces.push(SLICE_ELISION_MARKER, format(last));
    return `${left}${pieces.join(separator)}${right}`;
}

/**
 * Coerces a limit into a non-negative integer; non-finite input selects the default.
 */
export function sliceLimitNormalize(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit)) {
        return SLICE_DEFAULT_LIMIT;
    }
    return Math.max(0, Math.trunc(limit));
}
