import type { FootnoteDefinitionNode, HeadingNode, ParagraphNode } from "./ast";
import { isDebugMode, logDebug } from "./debug";
import type { ParseContext } from "./parse-options";

type RawCarrier = ParagraphNode | HeadingNode | FootnoteDefinitionNode;

export function getRawContent(node: RawCarrier) {
  return node._raw || "";
}

export function setRawContent(node: RawCarrier, text: string) {
  node._raw = text;
}

export function getParagraphContent(node: ParagraphNode) {
  return getRawContent(node);
}

export function setParagraphContent(node: ParagraphNode, text: string) {
  setRawContent(node, text);
}

export function appendParagraphLine(node: ParagraphNode, line: string) {
  const current = getParagraphContent(node);
  setParagraphContent(node, current ? current + "\n" + line : line);
}

/**
 * Adds a definition to the footnote table being built for a document. A label
 * seen twice is reported and settled by the `duplicateFootnotes` option.
 */
export function registerFootnote(
  footnotes: Map<string, FootnoteDefinitionNode>,
  def: FootnoteDefinitionNode,
  line: number,
  ctx: ParseContext,
) {
  const policy = ctx.options.duplicateFootnotes;
  if (footnotes.has(def.label)) {
    ctx.diagnostics.push({
      kind: "duplicate_footnote",
      label: def.label,
      line,
      message: `Footnote [^${def.label}] is defined more than once (line ${line}); keeping the ${policy === "last-wins" ? "last" : "first"} definition`,
    });
    if (policy === "first-wins") return;
  }
  if (isDebugMode(ctx.debug)) {
    logDebug(ctx.debug, `Registered footnote definition [^${def.label}] from line ${line}`);
  }
  footnotes.set(def.label, def);
}
