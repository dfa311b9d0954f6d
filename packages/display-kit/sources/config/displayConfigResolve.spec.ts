import { describe, expect, it } from "vitest";

import { displayConfigResolve } from "./displayConfigResolve.js";

describe("displayConfigResolve", () => {
    it("fills defaults", () => {
        expect(displayConfigResolve({}, {})).toEqual({
            slice: { limit: 4, separator: ",", braces: ["[", "]"] },
            timestamp: { precision: "micros", withTimezone: true }
        });
    });

    it("keeps explicit settings", () => {
        const config = displayConfigResolve(
            { slice: { limit: 2, braces: ["(", ")"] }, timestamp: { precision: "millis" } },
            { DISPLAY_KIT_SLICE_LIMIT: "7" }
        );

        expect(config.slice.limit).toBe(2);
        expect(config.slice.braces).toEqual(["(", ")"]);
        expect(config.timestamp).toEqual({ precision: "millis", withTimezone: true });
    });

    it("reads slice overrides from the environment", () => {
        const config = displayConfigResolve({}, { DISPLAY_KIT_SLICE_LIMIT: " 6 ", DISPLAY_KIT_SLICE_SEPARATOR: "; " });

        expect(config.slice.limit).toBe(6);
        expect(config.slice.separator).toBe("; ");
    });

    it("ignores an invalid environment limit", () => {
        expect(displayConfigResolve({}, { DISPLAY_KIT_SLICE_LIMIT: "-2" }).slice.limit).toBe(4);
        expect(displayConfigResolve({}, { DISPLAY_KIT_SLICE_LIMIT: "many" }).slice.limit).toBe(4);
    });

    it("returns a frozen snapshot", () => {
        const config = displayConfigResolve({}, {});

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.slice)).toBe(true);
        expect(Object.isFrozen(config.slice.braces)).toBe(true);
    });
});
