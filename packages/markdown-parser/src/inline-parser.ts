import type { BlockNode, DocumentNode, InlineNode } from "./ast";
import { isDebugMode, logDebug } from "./debug";
import { parseInlinesWithDelimiterStack } from "./inline-parser/parse-inlines-with-delimiter-stack";
import type { ParseContext } from "./parse-options";
import { DEFAULT_IMAGE_ATTRIBUTE_KEY } from "./parse-options";
import { getRawContent } from "./parser-helpers";

export {
  isLeftFlankingDelimiterRun,
  isRightFlankingDelimiterRun,
} from "./inline-parser/parse-inlines-with-delimiter-stack";

export type InlineToken =
  | { type: "text"; content: string }
  | { type: "escaped_literal"; content: string }
  | { type: "code_span"; content: string; code: string }
  | { type: "math_span"; content: string; value: string }
  | {
      type: "image";
      content: string;
      alt: string;
      url: string;
      attributes: Record<string, string>;
    }
  | { type: "link"; content: string; url: string; tokens: InlineToken[] }
  | { type: "footnote_reference"; content: string; label: string }
  | { type: "delim"; content: string; before: string; after: string };

export interface InlineOptions {
  imageAttributeKey?: string;
}

interface InlineMatch<T> {
  token: T;
  length: number;
}

const ASCII_PUNCTUATION = /^[!-\/:-@\[-`{-~]$/;

export function walkBlockTreeAndParseInlines(root: DocumentNode, ctx: ParseContext) {
  const options: InlineOptions = { imageAttributeKey: ctx.options.imageAttributeKey };

  function recurse(node: BlockNode) {
    switch (node.type) {
      case "blockquote":
        for (const c of node.children) {
          recurse(c);
        }
        break;
      case "paragraph":
      case "heading":
        node.children = parseInlineString(getRawContent(node), options);
        delete node._raw;
        break;
      case "code_block":
      case "math_block":
      case "html_block":
        break;
    }
  }

  for (const c of root.children) {
    if (isDebugMode(ctx.debug)) {
      logDebug(ctx.debug, `Inline parsing for node type: ${c.type}`);
    }
    recurse(c);
  }
  for (const def of root.footnotes.values()) {
    if (isDebugMode(ctx.debug)) {
      logDebug(ctx.debug, `Inline parsing for footnote definition [^${def.label}]`);
    }
    def.children = parseInlineString(getRawContent(def), options);
    delete def._raw;
  }
}

export function parseInlineString(input: string, options: InlineOptions = {}): InlineNode[] {
  const tokens = lexInline(input, options);
  return parseInlinesWithDelimiterStack(tokens);
}

/**
 * Splits one block's text into tokens. At any position the first rule that
 * matches wins: escape, code span, math span, image, link, footnote
 * reference, emphasis run, then plain text.
 */
export function lexInline(line: string, options: InlineOptions = {}): InlineToken[] {
  const attributeKey = options.imageAttributeKey ?? DEFAULT_IMAGE_ATTRIBUTE_KEY;
  const tokens: InlineToken[] = [];
  let text = "";
  let i = 0;

  const flushText = () => {
    if (text) {
      tokens.push({ type: "text", content: text });
      text = "";
    }
  };
  const emit = (match: InlineMatch<InlineToken>) => {
    flushText();
    tokens.push(match.token);
    i += match.length;
  };

  while (i < line.length) {
    const c = line[i];

    if (c === "\\") {
      const next = line[i + 1] || "";
      if (isAsciiPunctuation(next)) {
        emit({ token: { type: "escaped_literal", content: next }, length: 2 });
        continue;
      }
      text += c;
      i++;
      continue;
    }

    if (c === "`") {
      const code = matchCodeSpan(line, i);
      if (code) {
        emit(code);
        continue;
      }
      const run = readRun(line, i, "`");
      text += run;
      i += run.length;
      continue;
    }

    if (c === "$") {
      const math = matchMathSpan(line, i);
      if (math) {
        emit(math);
        continue;
      }
      const run = readRun(line, i, "$");
      text += run;
      i += run.length;
      continue;
    }

    if (c === "!" && line[i + 1] === "[") {
      const image = matchImage(line, i, attributeKey);
      if (image) {
        emit(image);
        continue;
      }
      text += c;
      i++;
      continue;
    }

    if (c === "[") {
      const link = matchLink(line, i, options);
      if (link) {
        emit(link);
        continue;
      }
      const footnote = matchFootnoteReference(line, i);
      if (footnote) {
        emit(footnote);
        continue;
      }
      text += c;
      i++;
      continue;
    }

    if (c === "*" || c === "_") {
      const run = readRun(line, i, c);
      emit({
        token: {
          type: "delim",
          content: run,
          before: i > 0 ? line[i - 1] : "",
          after: line[i + run.length] || "",
        },
        length: run.length,
      });
      continue;
    }

    text += c;
    i++;
  }

  flushText();
  return tokens;
}

export function isAsciiPunctuation(ch: string): boolean {
  return ASCII_PUNCTUATION.test(ch);
}

function readRun(str: string, start: number, ch: string): string {
  let end = start;
  while (end < str.length && str[end] === ch) end++;
  return str.slice(start, end);
}

/** A backtick run closed by the next run of exactly the same length. */
export function matchCodeSpan(str: string, start: number): InlineMatch<InlineToken> | null {
  const opener = readRun(str, start, "`");
  let pos = start + opener.length;
  while (pos < str.length) {
    const next = str.indexOf("`", pos);
    if (next === -1) return null;
    const closer = readRun(str, next, "`");
    if (closer.length === opener.length) {
      const end = next + closer.length;
      return {
        token: { type: "code_span", content: str.slice(start, end), code: str.slice(start + opener.length, next) },
        length: end - start,
      };
    }
    pos = next + closer.length;
  }
  return null;
}

export function matchMathSpan(str: string, start: number): InlineMatch<InlineToken> | null {
  if (str[start + 1] === "$") return null;
  const end = str.indexOf("$", start + 1);
  if (end === -1) return null;
  return {
    token: { type: "math_span", content: str.slice(start, end + 1), value: str.slice(start + 1, end) },
    length: end + 1 - start,
  };
}

/**
 * `{token}` right after an image holds one bare value stored under
 * `attributeKey`. Anything else in braces is left for the text scanner.
 */
export function parseImageAttributes(
  str: string,
  start: number,
  attributeKey: string,
): { attributes: Record<string, string>; length: number } {
  const m = str.slice(start).match(/^\{([^\s{}=]+)\}/);
  if (!m) return { attributes: {}, length: 0 };
  return { attributes: { [attributeKey]: m[1] }, length: m[0].length };
}

export function matchImage(str: string, start: number, attributeKey: string): InlineMatch<InlineToken> | null {
  const m = str.slice(start).match(/^!\[([^\]]*)\]\(([^)]*)\)/);
  if (!m) return null;
  const url = m[2].trim();
  if (!url) return null;
  const attrs = parseImageAttributes(str, start + m[0].length, attributeKey);
  const length = m[0].length + attrs.length;
  return {
    token: {
      type: "image",
      content: str.slice(start, start + length),
      alt: m[1],
      url,
      attributes: attrs.attributes,
    },
    length,
  };
}

function findClosingBracket(str: string, start: number): number {
  let depth = 0;
  for (let j = start; j < str.length; j++) {
    const ch = str[j];
    if (ch === "\\") {
      j++;
      continue;
    }
    if (ch === "[") depth++;
    if (ch === "]") {
      depth--;
      if (depth === 0) return j;
    }
  }
  return -1;
}

export function matchLink(str: string, start: number, options: InlineOptions = {}): InlineMatch<InlineToken> | null {
  const close = findClosingBracket(str, start);
  if (close === -1 || str[close + 1] !== "(") return null;
  const parenClose = str.indexOf(")", close + 2);
  if (parenClose === -1) return null;
  const url = str.slice(close + 2, parenClose).trim();
  if (!url) return null;
  const label = str.slice(start + 1, close);
  return {
    token: {
      type: "link",
      content: str.slice(start, parenClose + 1),
      url,
      tokens: lexInline(label, options),
    },
    length: parenClose + 1 - start,
  };
}

export function matchFootnoteReference(str: string, start: number): InlineMatch<InlineToken> | null {
  const m = str.slice(start).match(/^\[\^([^\]]+)\]/);
  if (!m) return null;
  return {
    token: { type: "footnote_reference", content: m[0], label: m[1] },
    length: m[0].length,
  };
}
