import type { Display, Result } from "../types.js";
import { valueDisplay } from "../value/valueDisplay.js";

/**
 * Renders a result as "Ok(value)" or "Err(error)".
 */
export function resultDisplay<T extends Display, E extends Display>(result: Result<T, E>): string {
    if (result.ok) {
        return `Ok(${valueDisplay(result.value)})`;
    }
    return `Err(${valueDisplay(result.error)})`;
}
