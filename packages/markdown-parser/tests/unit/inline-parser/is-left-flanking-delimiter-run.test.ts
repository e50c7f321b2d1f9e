import { describe, expect, test } from "vitest";
import { isLeftFlankingDelimiterRun } from "@/inline-parser";

describe("isLeftFlankingDelimiterRun", () => {
    test("returns true for an asterisk followed by a non-space", () => {
        expect(isLeftFlankingDelimiterRun("*", "", "w")).toBe(true);
        expect(isLeftFlankingDelimiterRun("*", " ", "!")).toBe(true);
    });

    test("returns false for an asterisk at the end of the text", () => {
        expect(isLeftFlankingDelimiterRun("*", "a", "")).toBe(false);
    });

    test("returns false for an underscore followed by whitespace", () => {
        expect(isLeftFlankingDelimiterRun("_", "", " ")).toBe(false);
    });

    test("returns false for an underscore inside a word", () => {
        expect(isLeftFlankingDelimiterRun("_", "a", "b")).toBe(false);
    });

    test("returns false when an underscore follows", () => {
        expect(isLeftFlankingDelimiterRun("_", "", "_")).toBe(false);
    });

    test("returns false for other characters", () => {
        expect(isLeftFlankingDelimiterRun("~", "", "a")).toBe(false);
    });
});
