import { describe, expect, test } from "vitest";
import { appendParagraphLine, getParagraphContent } from "@/parser-helpers";
import { blocksOf, createParagraphNode } from "./test-helpers";

describe("blockPhase - Paragraphs", () => {
    test("empty input gives no blocks", () => {
        expect(blocksOf("")).toEqual([]);
    });

    test("consecutive lines join and blank lines separate", () => {
        expect(blocksOf("one\ntwo\n\nthree")).toEqual([
            { type: "paragraph", children: [], _raw: "one\ntwo" },
            { type: "paragraph", children: [], _raw: "three" },
        ]);
    });

    test("normalises CRLF line endings", () => {
        expect(blocksOf("a\r\nb")).toEqual([{ type: "paragraph", children: [], _raw: "a\nb" }]);
    });

    test("fence markers inside a paragraph are lazy continuation text", () => {
        expect(blocksOf("line\n```\ncode\n```")).toEqual([
            { type: "paragraph", children: [], _raw: "line\n```\ncode\n```" },
        ]);
    });
});

describe("appendParagraphLine", () => {
    test("joins lines with a newline", () => {
        const node = createParagraphNode("first");
        appendParagraphLine(node, "second");
        expect(getParagraphContent(node)).toBe("first\nsecond");
    });
});
