import { describe, expect, test } from "vitest";
import type { LineContext } from "@/line-classifier";
import {
    classifyLine,
    countQuoteMarkers,
    discardComments,
    isFenceEnd,
    parseAtxHeading,
    scanComment,
    stripQuoteMarkers,
} from "@/line-classifier";

const start: LineContext = { previousLine: null, previousBlank: false, quoteLevel: 0 };
const afterBlank: LineContext = { previousLine: "", previousBlank: true, quoteLevel: 0 };
const midParagraph: LineContext = { previousLine: "some text", previousBlank: false, quoteLevel: 0 };

function lines(...texts: string[]) {
    return texts.map((text, i) => ({ text, number: i + 1 }));
}

describe("classifyLine", () => {
    test("blank and whitespace-only lines are blank", () => {
        expect(classifyLine("", midParagraph)).toEqual({ kind: "blank" });
        expect(classifyLine("   \t", midParagraph)).toEqual({ kind: "blank" });
    });

    test("recognises ATX headings at a block start", () => {
        expect(classifyLine("# Title", start)).toEqual({ kind: "atx_heading", level: 1, text: "Title" });
        expect(classifyLine("## Heading ##", afterBlank)).toEqual({ kind: "atx_heading", level: 2, text: "Heading" });
    });

    test("a heading marker inside a paragraph is plain text", () => {
        expect(classifyLine("# not a header", midParagraph)).toEqual({ kind: "plain" });
        expect(classifyLine("#tag", midParagraph)).toEqual({ kind: "plain" });
    });

    test("recognises fences with and without an info string", () => {
        expect(classifyLine("```ts", start)).toEqual({ kind: "fence_start", fence: "```", info: "ts" });
        expect(classifyLine("~~~", afterBlank)).toEqual({ kind: "fence_start", fence: "~~~" });
    });

    test("a backtick fence whose info string holds a backtick is plain", () => {
        expect(classifyLine("``` a`b", start)).toEqual({ kind: "plain" });
    });

    test("recognises display math, one-line and opening forms", () => {
        expect(classifyLine("\\[x^2\\]", start)).toEqual({ kind: "math_delimiter", inline: "x^2", rest: "" });
        expect(classifyLine("\\[", start)).toEqual({ kind: "math_delimiter", rest: "" });
        expect(classifyLine("\\[ a + b", start)).toEqual({ kind: "math_delimiter", rest: " a + b" });
    });

    test("recognises HTML block starts only for tag-like openings", () => {
        expect(classifyLine('<div class="x">', start)).toEqual({ kind: "html_block_start" });
        expect(classifyLine("</section>", start)).toEqual({ kind: "html_block_start" });
        expect(classifyLine("<3 love", start)).toEqual({ kind: "plain" });
    });

    test("recognises footnote definitions", () => {
        expect(classifyLine("[^1]: The note", start)).toEqual({
            kind: "footnote_definition_start",
            label: "1",
            content: "The note",
        });
        expect(classifyLine("[^1]: The note", midParagraph)).toEqual({ kind: "plain" });
    });

    test("two or more quote markers open a blockquote even mid-paragraph", () => {
        expect(classifyLine(">> quoted", start)).toEqual({ kind: "blockquote_marker", count: 2, content: "quoted" });
        expect(classifyLine(">> quoted", midParagraph)).toEqual({ kind: "blockquote_marker", count: 2, content: "quoted" });
    });

    test("a single quote marker is plain text", () => {
        expect(classifyLine("> single", start)).toEqual({ kind: "plain" });
    });

    test("quote markers must exceed the enclosing level", () => {
        const inQuote: LineContext = { previousLine: null, previousBlank: false, quoteLevel: 2 };
        expect(classifyLine(">> same level", inQuote)).toEqual({ kind: "plain" });
        expect(classifyLine(">>> deeper", inQuote)).toEqual({ kind: "blockquote_marker", count: 3, content: "deeper" });
    });
});

describe("parseAtxHeading", () => {
    test("accepts a bare marker as an empty heading", () => {
        expect(parseAtxHeading("#")).toEqual({ level: 1, text: "" });
    });

    test("takes the text straight after the marker when there is no space", () => {
        expect(parseAtxHeading("#Title")).toEqual({ level: 1, text: "Title" });
        expect(parseAtxHeading("###Deep ###")).toEqual({ level: 3, text: "Deep" });
    });

    test("rejects more than six markers", () => {
        expect(parseAtxHeading("####### seven")).toBeNull();
    });
});

describe("quote markers", () => {
    test("counts leading markers", () => {
        expect(countQuoteMarkers(">>> x")).toBe(3);
        expect(countQuoteMarkers("x > y")).toBe(0);
    });

    test("strips the markers and a single following space", () => {
        expect(stripQuoteMarkers(">>  two spaces", 2)).toBe(" two spaces");
        expect(stripQuoteMarkers(">>tight", 2)).toBe("tight");
    });
});

describe("isFenceEnd", () => {
    test("closes on a run of the same character at least as long", () => {
        expect(isFenceEnd("```", "```")).toBe(true);
        expect(isFenceEnd("````", "```")).toBe(true);
        expect(isFenceEnd("  ```  ", "```")).toBe(true);
    });

    test("does not close on a shorter run or a different character", () => {
        expect(isFenceEnd("``", "```")).toBe(false);
        expect(isFenceEnd("~~~", "```")).toBe(false);
        expect(isFenceEnd("``` js", "```")).toBe(false);
    });
});

describe("scanComment", () => {
    test("leaves lines without comments alone", () => {
        expect(scanComment("plain", false)).toEqual({ kind: "none", text: "plain" });
    });

    test("removes a comment closed on the same line", () => {
        expect(scanComment("before <!-- hidden --> after", false)).toEqual({
            kind: "comment_start",
            text: "before  after",
            inComment: false,
        });
    });

    test("tracks a comment that spans lines", () => {
        expect(scanComment("text <!-- open", false)).toEqual({ kind: "comment_start", text: "text ", inComment: true });
        expect(scanComment("still hidden", true)).toEqual({ kind: "comment_body", text: "", inComment: true });
        expect(scanComment("done --> tail", true)).toEqual({ kind: "comment_end", text: " tail", inComment: false });
    });
});

describe("discardComments", () => {
    test("drops comment-only lines and keeps source line numbers", () => {
        const visible = discardComments(lines("a", "<!-- c -->", "b"));
        expect(visible).toEqual([
            { text: "a", number: 1 },
            { text: "b", number: 3 },
        ]);
    });

    test("keeps comment syntax inside fenced code", () => {
        const visible = discardComments(lines("```", "<!-- kept -->", "```"));
        expect(visible.map((l) => l.text)).toEqual(["```", "<!-- kept -->", "```"]);
    });

    test("keeps comment syntax inside a quoted fence", () => {
        const visible = discardComments(lines(">> ```html", ">> <!-- kept -->", ">> ```"));
        expect(visible.map((l) => l.text)).toEqual([">> ```html", ">> <!-- kept -->", ">> ```"]);
    });

    test("a quoted fence ends with its quote", () => {
        const visible = discardComments(lines(">> ```", ">> a", "", "<!-- gone -->", "b"));
        expect(visible.map((l) => l.text)).toEqual([">> ```", ">> a", "", "b"]);
    });

    test("drops a quoted line that held only a comment", () => {
        const visible = discardComments(lines(">> a", ">> <!-- c -->", ">> b"));
        expect(visible).toEqual([
            { text: ">> a", number: 1 },
            { text: ">> b", number: 3 },
        ]);
    });

    test("an unterminated comment hides the rest of the document", () => {
        const visible = discardComments(lines("x", "<!-- open", "hidden", "", "y"));
        expect(visible).toEqual([{ text: "x", number: 1 }]);
    });
});
