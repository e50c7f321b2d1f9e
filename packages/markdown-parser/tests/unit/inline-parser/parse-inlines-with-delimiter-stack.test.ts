import { describe, expect, test } from "vitest";
import type { InlineNode } from "@/ast";
import type { InlineToken } from "@/inline-parser";
import { appendInline, parseInlinesWithDelimiterStack } from "@/inline-parser/parse-inlines-with-delimiter-stack";

describe("parseInlinesWithDelimiterStack", () => {
    test("pairs a closer with the nearest opener and unwinds the runs between", () => {
        // *a _b* c_
        const tokens: InlineToken[] = [
            { type: "delim", content: "*", before: "", after: "a" },
            { type: "text", content: "a " },
            { type: "delim", content: "_", before: " ", after: "b" },
            { type: "text", content: "b" },
            { type: "delim", content: "*", before: "b", after: " " },
            { type: "text", content: " c" },
            { type: "delim", content: "_", before: "c", after: "" },
        ];
        expect(parseInlinesWithDelimiterStack(tokens)).toEqual([
            { type: "emphasis", kind: "bold", children: [{ type: "text", value: "a _b" }] },
            { type: "text", value: " c_" },
        ]);
    });

    test("turns escaped literals into text", () => {
        const tokens: InlineToken[] = [
            { type: "text", content: "1" },
            { type: "escaped_literal", content: "*" },
            { type: "text", content: "2" },
        ];
        expect(parseInlinesWithDelimiterStack(tokens)).toEqual([{ type: "text", value: "1*2" }]);
    });

    test("converts image tokens", () => {
        const tokens: InlineToken[] = [
            { type: "image", content: "![a](b.png)", alt: "a", url: "b.png", attributes: {} },
        ];
        expect(parseInlinesWithDelimiterStack(tokens)).toEqual([
            { type: "image", alt: "a", url: "b.png", attributes: {} },
        ]);
    });
});

describe("appendInline", () => {
    test("merges adjacent text", () => {
        const nodes: InlineNode[] = [{ type: "text", value: "a" }];
        appendInline(nodes, { type: "text", value: "b" });
        expect(nodes).toEqual([{ type: "text", value: "ab" }]);
    });

    test("keeps other nodes separate", () => {
        const nodes: InlineNode[] = [{ type: "text", value: "a" }];
        appendInline(nodes, { type: "code_span", code: "b" });
        appendInline(nodes, { type: "text", value: "c" });
        expect(nodes).toEqual([
            { type: "text", value: "a" },
            { type: "code_span", code: "b" },
            { type: "text", value: "c" },
        ]);
    });
});
