export type UnixTimestampErrorKind = "not_integer" | "negative" | "out_of_range";

/**
 * Thrown when a millisecond timestamp cannot be rendered as a calendar date.
 * Expects: value is the rejected input, unchanged.
 */
export class UnixTimestampError extends Error {
    readonly kind: UnixTimestampErrorKind;
    readonly value: number;

    constructor(kind: UnixTimestampErrorKind, value: number, message: string) {
        super(message);
        this.name = "UnixTimestampError";
        this.kind = kind;
        this.value = value;
    }
}
