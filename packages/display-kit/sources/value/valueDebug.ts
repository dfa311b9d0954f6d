/**
 * Renders a value in debug form: strings quoted, arrays spaced, objects as JSON.
 * Expects: value is acyclic when it is an array.
 */
export function valueDebug(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (value === undefined) {
        return "undefined";
    }
    if (typeof value === "string") {
        return JSON.stringify(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map((entry: unknown) => valueDebug(entry)).join(", ")}]`;
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
    }
    if (value instanceof Error) {
        return `${value.name}(${JSON.stringify(value.message)})`;
    }
    if (typeof value === "object") {
        return valueDebugObject(value);
    }
    return String(value);
}

function valueDebugObject(value: object): string {
    try {
        const json = JSON.stringify(value);
        return typeof json === "string" ? json : String(value);
    } catch {
        return String(value);
    }
}
