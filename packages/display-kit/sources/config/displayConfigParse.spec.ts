import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { displayConfigParse } from "./displayConfigParse.js";

describe("displayConfigParse", () => {
    it("accepts an empty object", () => {
        expect(displayConfigParse({})).toEqual({});
    });

    it("accepts slice and timestamp settings", () => {
        const parsed = displayConfigParse({
            slice: { limit: 0, separator: ", ", braces: ["{", "}"] },
            timestamp: { precision: "millis", withTimezone: false }
        });

        expect(parsed.slice?.limit).toBe(0);
        expect(parsed.slice?.separator).toBe(", ");
        expect(parsed.slice?.braces).toEqual(["{", "}"]);
        expect(parsed.timestamp?.precision).toBe("millis");
        expect(parsed.timestamp?.withTimezone).toBe(false);
    });

    it("rejects negative and fractional limits", () => {
        expect(() => displayConfigParse({ slice: { limit: -1 } })).toThrow(ZodError);
        expect(() => displayConfigParse({ slice: { limit: 2.5 } })).toThrow(ZodError);
    });

    it("rejects unknown precision and unknown keys", () => {
        expect(() => displayConfigParse({ timestamp: { precision: "nanos" } })).toThrow(ZodError);
        expect(() => displayConfigParse({ slice: { limt: 3 } })).toThrow(ZodError);
    });

    it("rejects braces that are not a pair of strings", () => {
        expect(() => displayConfigParse({ slice: { braces: ["["] } })).toThrow(ZodError);
    });
});
