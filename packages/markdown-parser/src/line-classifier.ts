export interface SourceLine {
  text: string;
  /** 1-based line number in the original document. */
  number: number;
}

export interface LineContext {
  /** `null` at the start of the document or of the enclosing block. */
  previousLine: string | null;
  previousBlank: boolean;
  /** Marker count of the enclosing blockquote, 0 at top level. */
  quoteLevel: number;
}

export type LineClass =
  | { kind: "blank" }
  | { kind: "atx_heading"; level: number; text: string }
  | { kind: "fence_start"; fence: string; info?: string }
  | { kind: "fence_end" }
  | { kind: "math_delimiter"; inline?: string; rest: string }
  | { kind: "html_block_start" }
  | { kind: "blockquote_marker"; count: number; content: string }
  | { kind: "footnote_definition_start"; label: string; content: string }
  | { kind: "plain" };

export type CommentScan =
  | { kind: "none"; text: string }
  | { kind: "comment_start"; text: string; inComment: boolean }
  | { kind: "comment_body"; text: string; inComment: boolean }
  | { kind: "comment_end"; text: string; inComment: boolean };

/** An open fenced code or display math region; `fence` is `null` for math. */
export interface VerbatimRegion {
  fence: string | null;
  /** Quote level the region was opened at, 0 at top level. */
  level: number;
}

const ATX_HEADING_RE = /^(#{1,6})(?!#)[ \t]*(.*?)(?:[ \t]+#+[ \t]*|[ \t]*)$/;
const FENCE_RE = /^(`{3,}|~{3,})(.*)$/;
const HTML_BLOCK_RE = /^<\/?[A-Za-z][A-Za-z0-9-]*(?:[\s/>]|$)/;
const FOOTNOTE_DEF_RE = /^\[\^([^\]]+)\]:[ \t]*(.*)$/;

export function isBlankLine(line: string): boolean {
  return !line.trim();
}

export function countQuoteMarkers(line: string): number {
  let count = 0;
  while (count < line.length && line[count] === ">") count++;
  return count;
}

/** Drops the marker run and a single following space. */
export function stripQuoteMarkers(line: string, count: number): string {
  const rest = line.slice(count);
  return rest.startsWith(" ") ? rest.slice(1) : rest;
}

/** Quote level a line opens or continues, with its markers removed. */
export function splitQuoteLine(line: string): { level: number; inner: string } {
  const count = countQuoteMarkers(line);
  if (count < 2) return { level: 0, inner: line };
  return { level: count, inner: stripQuoteMarkers(line, count) };
}

export function canStartBlock(context: LineContext): boolean {
  return context.previousLine === null || context.previousBlank;
}

export function parseAtxHeading(line: string): { level: number; text: string } | null {
  const m = line.match(ATX_HEADING_RE);
  if (!m) return null;
  return { level: m[1].length, text: m[2] || "" };
}

export function parseFenceStart(line: string): { fence: string; info?: string } | null {
  const m = line.match(FENCE_RE);
  if (!m) return null;
  const fence = m[1];
  const info = m[2].trim();
  // a backtick fence cannot carry backticks in its info string
  if (fence[0] === "`" && info.includes("`")) return null;
  return { fence, info: info || undefined };
}

export function isFenceEnd(line: string, fence: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length < fence.length) return false;
  for (const ch of trimmed) {
    if (ch !== fence[0]) return false;
  }
  return true;
}

export function isMathOpen(line: string): boolean {
  return line.trimStart().startsWith("\\[");
}

export function isMathClose(line: string): boolean {
  return line.trimStart().startsWith("\\]");
}

export function isHtmlBlockStart(line: string): boolean {
  return HTML_BLOCK_RE.test(line);
}

export function parseFootnoteDefinition(line: string): { label: string; content: string } | null {
  const m = line.match(FOOTNOTE_DEF_RE);
  if (!m) return null;
  return { label: m[1], content: m[2] };
}

/**
 * Classifies a line outside any verbatim region. Block starts other than
 * blockquote markers only count after a blank line or at the start of the
 * enclosing block; anywhere else they continue the open paragraph.
 */
export function classifyLine(line: string, context: LineContext): LineClass {
  if (isBlankLine(line)) return { kind: "blank" };

  const markers = countQuoteMarkers(line);
  if (markers >= 2 && markers > context.quoteLevel) {
    return { kind: "blockquote_marker", count: markers, content: stripQuoteMarkers(line, markers) };
  }

  if (!canStartBlock(context)) return { kind: "plain" };

  const heading = parseAtxHeading(line);
  if (heading) return { kind: "atx_heading", ...heading };

  const fence = parseFenceStart(line);
  if (fence) return { kind: "fence_start", ...fence };

  if (isMathOpen(line)) {
    const rest = line.trimStart().slice(2);
    const closeAt = rest.indexOf("\\]");
    if (closeAt !== -1) {
      return { kind: "math_delimiter", inline: rest.slice(0, closeAt), rest: "" };
    }
    return { kind: "math_delimiter", rest };
  }

  if (isHtmlBlockStart(line)) return { kind: "html_block_start" };

  const footnote = parseFootnoteDefinition(line);
  if (footnote) return { kind: "footnote_definition_start", ...footnote };

  return { kind: "plain" };
}

export function classifyFenceLine(line: string, fence: string): LineClass {
  return isFenceEnd(line, fence) ? { kind: "fence_end" } : { kind: "plain" };
}

export function classifyMathLine(line: string): LineClass {
  return isMathClose(line) ? { kind: "math_delimiter", rest: "" } : { kind: "plain" };
}

/** The region a line opens, if it starts a multi-line fence or math block. */
export function opensVerbatimRegion(line: string, context: LineContext): VerbatimRegion | null {
  const cls = classifyLine(line, context);
  if (cls.kind === "fence_start") return { fence: cls.fence, level: context.quoteLevel };
  if (cls.kind === "math_delimiter" && cls.inline === undefined) {
    return { fence: null, level: context.quoteLevel };
  }
  return null;
}

export function closesVerbatimRegion(line: string, region: VerbatimRegion): boolean {
  if (region.fence === null) return classifyMathLine(line).kind === "math_delimiter";
  return classifyFenceLine(line, region.fence).kind === "fence_end";
}

/**
 * A quoted region only runs while the quote does: up to a blank line or a
 * line with fewer markers.
 */
export function continuesVerbatimRegion(line: string, region: VerbatimRegion): boolean {
  if (region.level === 0) return true;
  return !isBlankLine(line) && countQuoteMarkers(line) >= region.level;
}

/**
 * Removes `<!-- ... -->` spans from one line. `inComment` says whether the
 * line starts inside a comment opened on an earlier line.
 */
export function scanComment(line: string, inComment: boolean): CommentScan {
  let text = "";
  let pos = 0;
  let open = inComment;
  let opened = false;
  let closed = false;

  while (pos <= line.length) {
    if (open) {
      const end = line.indexOf("-->", pos);
      if (end === -1) break;
      pos = end + 3;
      open = false;
      closed = true;
      continue;
    }
    const start = line.indexOf("<!--", pos);
    if (start === -1) {
      text += line.slice(pos);
      break;
    }
    text += line.slice(pos, start);
    pos = start + 4;
    open = true;
    opened = true;
  }

  if (inComment) {
    return { kind: closed ? "comment_end" : "comment_body", text, inComment: open };
  }
  if (!opened) return { kind: "none", text: line };
  return { kind: "comment_start", text, inComment: open };
}

interface VisibleLine {
  text: string;
  inner: string;
  level: number;
}

/** Opens or leaves quotes for a line with `count` markers; true when a new quote starts. */
function enterQuote(open: number[], count: number): boolean {
  while (open.length && open[open.length - 1] > count) open.pop();
  if (count < 2) return false;
  if (open.length && open[open.length - 1] === count) return false;
  open.push(count);
  return true;
}

function contextFor(previous: VisibleLine | null, level: number, opensQuote: boolean): LineContext {
  if (previous === null || opensQuote) {
    return { previousLine: null, previousBlank: false, quoteLevel: level };
  }
  return {
    previousLine: previous.text,
    previousBlank: previous.level === level && isBlankLine(previous.inner),
    quoteLevel: level,
  };
}

/**
 * First pass over the document: drops comment text before anything else is
 * classified. Fenced code and math regions pass through untouched, quoted
 * ones included. A line that held nothing but comment text is removed
 * outright, so it neither splits nor joins the blocks around it.
 */
export function discardComments(lines: SourceLine[]): SourceLine[] {
  const visible: SourceLine[] = [];
  const openQuotes: number[] = [];
  let inComment = false;
  let region: VerbatimRegion | null = null;
  let previous: VisibleLine | null = null;

  for (const line of lines) {
    if (region !== null) {
      if (continuesVerbatimRegion(line.text, region)) {
        visible.push(line);
        const inner = region.level === 0 ? line.text : stripQuoteMarkers(line.text, region.level);
        previous = { text: line.text, inner, level: region.level };
        if (closesVerbatimRegion(inner, region)) region = null;
        continue;
      }
      region = null;
    }

    const scan = scanComment(line.text, inComment);
    const text = scan.kind === "none" ? line.text : scan.text;
    const { level, inner } = splitQuoteLine(text);
    if (scan.kind !== "none") {
      inComment = scan.inComment;
      if (isBlankLine(inner)) continue;
    }

    if (isBlankLine(text)) {
      openQuotes.length = 0;
    }
    const opensQuote = enterQuote(openQuotes, level);
    region = opensVerbatimRegion(inner, contextFor(previous, level, opensQuote));

    visible.push(scan.kind === "none" ? line : { text, number: line.number });
    previous = { text, inner, level };
  }

  return visible;
}
