import type { SliceBraces } from "../slice/sliceDisplay.js";
import type { UnixTimestampPrecision } from "../timestamp/unixTimestampDisplay.js";

export type DisplayConfigInput = {
    slice?: {
        limit?: number;
        separator?: string;
        braces?: SliceBraces;
    };
    timestamp?: {
        precision?: UnixTimestampPrecision;
        withTimezone?: boolean;
    };
};

export type DisplayConfig = {
    readonly slice: {
        readonly limit: number;
        readonly separator: string;
        readonly braces: SliceBraces;
    };
    readonly timestamp: {
        readonly precision: UnixTimestampPrecision;
        readonly withTimezone: boolean;
    };
};

export type DisplayConfigEnv = Record<string, string | undefined>;
