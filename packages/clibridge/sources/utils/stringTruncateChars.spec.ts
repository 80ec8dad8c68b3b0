import { describe, expect, it } from "vitest";

import { stringTruncateChars } from "./stringTruncateChars.js";

describe("stringTruncateChars", () => {
    it("returns the original string when within limits", () => {
        expect(stringTruncateChars("hello", 5)).toBe("hello");
        expect(stringTruncateChars("hello", 10)).toBe("hello");
    });

    it("keeps the head", () => {
        expect(stringTruncateChars("abcdefghij", 4)).toBe("abcd");
    });

    it("never splits a surrogate pair", () => {
        const value = "ab😀cd";
        expect(value.length).toBe(6);
        expect(stringTruncateChars(value, 3)).toBe("ab");
        expect(stringTruncateChars(value, 4)).toBe("ab😀");
    });

    it("supports a zero budget", () => {
        expect(stringTruncateChars("abc", 0)).toBe("");
    });
});
