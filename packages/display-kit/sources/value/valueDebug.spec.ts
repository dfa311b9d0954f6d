import { describe, expect, it } from "vitest";

import { valueDebug } from "./valueDebug.js";

describe("valueDebug", () => {
    it("quotes and escapes strings", () => {
        expect(valueDebug("hello")).toBe('"hello"');
        expect(valueDebug('say "hi"\n')).toBe('"say \\"hi\\"\\n"');
    });

    it("renders primitives as text", () => {
        expect(valueDebug(1)).toBe("1");
        expect(valueDebug(false)).toBe("false");
        expect(valueDebug(12n)).toBe("12");
        expect(valueDebug(null)).toBe("null");
        expect(valueDebug(undefined)).toBe("undefined");
    });

    it("renders arrays with spaced separators", () => {
        expect(valueDebug([1, 2, 3])).toBe("[1, 2, 3]");
        expect(valueDebug(["a", ["b"]])).toBe('["a", ["b"]]');
        expect(valueDebug([])).toBe("[]");
    });

    it("renders dates, errors and objects", () => {
        expect(valueDebug(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
        expect(valueDebug(new TypeError("bad input"))).toBe('TypeError("bad input")');
        expect(valueDebug({ id: 1, name: "x" })).toBe('{"id":1,"name":"x"}');
    });

    it("falls back to String for objects JSON cannot encode", () => {
        const cyclic: Record<string, unknown> = {};
        cyclic.self = cyclic;
        expect(valueDebug(cyclic)).toBe("[object Object]");
    });
});
