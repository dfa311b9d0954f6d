import type { Display } from "../types.js";

/**
 * Renders a value in its canonical text form.
 */
export function valueDisplay(value: Display): string {
    return String(value);
}
