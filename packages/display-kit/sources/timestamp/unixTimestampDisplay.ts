import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";

import type { Option } from "../types.js";
import { UnixTimestampError } from "./unixTimestampError.js";

/**
 * Last millisecond of 9999-12-31 UTC; later years no longer fit the four-digit year field.
 */
export const UNIX_TIMESTAMP_MAX_MILLIS = 253_402_300_799_999;

export type UnixTimestampPrecision = "micros" | "millis";

export type UnixTimestampDisplayOptions = {
    precision?: UnixTimestampPrecision;
    withTimezone?: boolean;
};

const DATE_TIME_PATTERN = "yyyy-MM-dd'T'HH:mm:ss";
const TIMEZONE_SUFFIX = "'Z+0000'";

/**
 * Renders milliseconds since the Unix epoch as a UTC ISO-8601 datetime.
 * Defaults to microsecond precision with a timezone suffix: "2024-08-08T07:40:19.023000Z+0000".
 * Absent input renders "None".
 * Expects: millis is an integer within [0, UNIX_TIMESTAMP_MAX_MILLIS]; throws UnixTimestampError otherwise.
 */
export function unixTimestampDisplay(millis: Option<number>, options: UnixTimestampDisplayOptions = {}): string {
    if (millis === null || millis === undefined) {
        return "None";
    }
    unixTimestampValidate(millis);

    const precision = options.precision ?? "micros";
    const withTimezone = options.withTimezone ?? true;
    const fraction = precision === "micros" ? "SSSSSS" : "SSS";
    const pattern = `${DATE_TIME_PATTERN}.${fraction}${withTimezone ? TIMEZONE_SUFFIX : ""}`;
    return format(new UTCDate(millis), pattern);
}

/**
 * Renders milliseconds since the Unix epoch with millisecond precision and no timezone suffix:
 * "2024-08-08T07:40:19.023".
 */
export function unixTimestampDisplayShort(millis: Option<number>): string {
    return unixTimestampDisplay(millis, { precision: "millis", withTimezone: false });
}

/**
 * Throws UnixTimestampError unless millis is an integer inside the renderable range.
 */
export function unixTimestampValidate(millis: number): void {
    if (!Number.isInteger(millis)) {
        throw new UnixTimestampError("not_integer", millis, `Unix timestamp must be an integer, got ${millis}.`);
    }
    if (millis < 0) {
        throw new UnixTimestampError("negative", millis, `Unix timestamp must not precede the epoch, got ${millis}.`);
    }
    if (millis > UNIX_TIMESTAMP_MAX_MILLIS) {
        throw new UnixTimestampError(
            "out_of_range",
            millis,
            `Unix timestamp ${millis} is past ${UNIX_TIMESTAMP_MAX_MILLIS} (9999-12-31T23:59:59.999Z).`
        );
    }
}
