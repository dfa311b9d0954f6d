import type { Display, Option } from "../types.js";
import { valueDebug } from "../value/valueDebug.js";
import { valueDisplay } from "../value/valueDisplay.js";

export const OPTION_NONE = "None";

/**
 * Renders the inner value of an option, or "None" when it is null or undefined.
 */
export function optionDisplay<T extends Display>(value: Option<T>): string {
    if (value === null || value === undefined) {
        return OPTION_NONE;
    }
    return valueDisplay(value);
}

/**
 * Same as optionDisplay, but renders the inner value in debug form.
 */
export function optionDisplayDebug<T>(value: Option<T>): string {
    if (value === null || value === undefined) {
        return OPTION_NONE;
    }
    return valueDebug(value);
}
