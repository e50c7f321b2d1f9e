import type {
  BlockNode,
  DocumentNode,
  ParagraphNode,
  HeadingNode,
  BlockquoteNode,
  CodeBlockNode,
  MathBlockNode,
  HtmlBlockNode,
  FootnoteDefinitionNode,
} from "./ast";
import { isDebugMode, logDebug } from "./debug";
import type { LineContext, SourceLine } from "./line-classifier";
import {
  classifyLine,
  classifyFenceLine,
  classifyMathLine,
  closesVerbatimRegion,
  countQuoteMarkers,
  discardComments,
  isBlankLine,
  opensVerbatimRegion,
  stripQuoteMarkers,
} from "./line-classifier";
import type { VerbatimRegion } from "./line-classifier";
import type { ParseContext } from "./parse-options";
import { appendParagraphLine, registerFootnote } from "./parser-helpers";

export function splitSourceLines(markdown: string): SourceLine[] {
  const content = markdown.replace(/\r\n?/g, "\n");
  return content.split("\n").map((text, i) => ({ text, number: i + 1 }));
}

export function blockPhase(markdown: string, ctx: ParseContext): DocumentNode {
  const footnotes = new Map<string, FootnoteDefinitionNode>();
  const lines = discardComments(splitSourceLines(markdown));
  return {
    type: "document",
    children: assembleBlocks(lines, 0, footnotes, ctx),
    footnotes,
  };
}

/**
 * Builds the block sequence for one container: the document itself, or the
 * body of a blockquote whose marker count is `quoteLevel`.
 */
export function assembleBlocks(
  lines: SourceLine[],
  quoteLevel: number,
  footnotes: Map<string, FootnoteDefinitionNode>,
  ctx: ParseContext,
): BlockNode[] {
  const blocks: BlockNode[] = [];
  let paragraph: ParagraphNode | null = null;
  let previousLine: string | null = null;
  let previousBlank = false;

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const context: LineContext = { previousLine, previousBlank, quoteLevel };
    const cls = classifyLine(line.text, context);
    if (isDebugMode(ctx.debug)) {
      logDebug(ctx.debug, `Line ${line.number} (quote level ${quoteLevel}): ${cls.kind} "${line.text}"`);
    }

    switch (cls.kind) {
      case "blank":
        paragraph = null;
        i++;
        break;

      case "atx_heading": {
        paragraph = null;
        const heading: HeadingNode = { type: "heading", level: cls.level, children: [], _raw: cls.text };
        blocks.push(heading);
        i++;
        break;
      }

      case "fence_start": {
        paragraph = null;
        const node: CodeBlockNode = { type: "code_block", info: cls.info, lines: [], fence: cls.fence };
        blocks.push(node);
        i = collectFence(lines, i + 1, node, ctx);
        break;
      }

      case "math_delimiter": {
        paragraph = null;
        const node: MathBlockNode = { type: "math_block", value: "" };
        blocks.push(node);
        if (cls.inline !== undefined) {
          node.value = cls.inline;
          i++;
        } else {
          i = collectMath(lines, i + 1, cls.rest, node, ctx);
        }
        break;
      }

      case "html_block_start": {
        paragraph = null;
        const node: HtmlBlockNode = { type: "html_block", lines: [] };
        blocks.push(node);
        i = collectHtml(lines, i, node);
        break;
      }

      case "blockquote_marker": {
        paragraph = null;
        const quote: BlockquoteNode = { type: "blockquote", level: cls.count, children: [] };
        blocks.push(quote);
        const { inner, end } = gatherQuoteLines(lines, i, cls.count);
        if (isDebugMode(ctx.debug)) {
          logDebug(ctx.debug, `Blockquote level ${cls.count} spans lines ${lines[i].number}-${lines[end - 1].number}`);
        }
        quote.children = assembleBlocks(inner, cls.count, footnotes, ctx);
        i = end;
        break;
      }

      case "footnote_definition_start": {
        paragraph = null;
        const def: FootnoteDefinitionNode = {
          type: "footnote_definition",
          label: cls.label,
          children: [],
          _raw: cls.content,
        };
        registerFootnote(footnotes, def, line.number, ctx);
        i++;
        break;
      }

      default: {
        if (paragraph === null) {
          const p: ParagraphNode = { type: "paragraph", children: [] };
          blocks.push(p);
          paragraph = p;
        }
        appendParagraphLine(paragraph, line.text);
        i++;
        break;
      }
    }

    const last = lines[i - 1];
    previousLine = last.text;
    previousBlank = isBlankLine(last.text);
  }

  return blocks;
}

/**
 * Takes the body of a quote with `level` markers starting at `start`. Lines at
 * exactly that level lose their markers; deeper lines keep theirs so the body
 * can open nested quotes, except inside a fence or math block opened in the
 * body, where only this level's markers come off.
 */
function gatherQuoteLines(
  lines: SourceLine[],
  start: number,
  level: number,
): { inner: SourceLine[]; end: number } {
  const inner: SourceLine[] = [];
  let region: VerbatimRegion | null = null;
  let previousLine: string | null = null;
  let j = start;

  while (j < lines.length) {
    const candidate = lines[j];
    if (isBlankLine(candidate.text)) break;
    const count = countQuoteMarkers(candidate.text);
    if (count < level) break;

    let text: string;
    if (region !== null) {
      text = stripQuoteMarkers(candidate.text, level);
      if (closesVerbatimRegion(text, region)) region = null;
    } else if (count === level) {
      text = stripQuoteMarkers(candidate.text, level);
      region = opensVerbatimRegion(text, {
        previousLine,
        previousBlank: previousLine !== null && isBlankLine(previousLine),
        quoteLevel: level,
      });
    } else {
      text = candidate.text;
    }

    inner.push({ text, number: candidate.number });
    previousLine = text;
    j++;
  }

  return { inner, end: j };
}

function collectFence(lines: SourceLine[], start: number, node: CodeBlockNode, ctx: ParseContext): number {
  let i = start;
  while (i < lines.length) {
    if (classifyFenceLine(lines[i].text, node.fence).kind === "fence_end") {
      return i + 1;
    }
    node.lines.push(lines[i].text);
    i++;
  }
  if (isDebugMode(ctx.debug)) {
    logDebug(ctx.debug, `Unterminated ${node.fence} fence closed at end of input`);
  }
  return i;
}

function collectMath(
  lines: SourceLine[],
  start: number,
  rest: string,
  node: MathBlockNode,
  ctx: ParseContext,
): number {
  const body: string[] = rest.trim() ? [rest] : [];
  let i = start;
  let closed = false;
  while (i < lines.length) {
    if (classifyMathLine(lines[i].text).kind === "math_delimiter") {
      closed = true;
      i++;
      break;
    }
    body.push(lines[i].text);
    i++;
  }
  if (!closed && isDebugMode(ctx.debug)) {
    logDebug(ctx.debug, `Unterminated math block closed at end of input`);
  }
  node.value = body.join("\n");
  return i;
}

function collectHtml(lines: SourceLine[], start: number, node: HtmlBlockNode): number {
  let i = start;
  while (i < lines.length && !isBlankLine(lines[i].text)) {
    node.lines.push(lines[i].text);
    i++;
  }
  return i;
}
