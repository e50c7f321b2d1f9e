import { blockPhase } from "./block-parser";
import { walkBlockTreeAndParseInlines } from "./inline-parser";
import { renderAstToHtml } from "./renderer";
import type { DocumentNode, FootnoteDefinitionNode } from "./ast";
import { pluginName } from "./plugin-system";
import { captureSnapshot, getDebugSnapshots, isDebugMode } from "./debug";
import type { DebugSnapshot } from "./debug";
import type { Diagnostic } from "./errors";
import { InvalidInputError } from "./errors";
import type { FootnoteBinding } from "./footnote-resolver";
import { resolveFootnotes } from "./footnote-resolver";
import type { ParseOptions } from "./parse-options";
import { createParseContext, resolveParseOptions } from "./parse-options";

export interface ParseResult {
  document: DocumentNode;
  diagnostics: Diagnostic[];
  footnoteBindings: FootnoteBinding[];
  snapshots: DebugSnapshot[];
}

export function parseMarkdown(markdown: string, options: ParseOptions = {}): string {
  return renderParsed(parseMarkdownToAst(markdown, options), options);
}

export function parseMarkdownToAst(markdown: string, options: ParseOptions = {}): ParseResult {
  if (typeof markdown !== "string") {
    throw new InvalidInputError(`Expected the document as a string, got ${markdown === null ? "null" : typeof markdown}`);
  }
  const ctx = createParseContext(options);
  const plugins = ctx.options.plugins;

  const doc = blockPhase(markdown, ctx);
  captureSnapshot(ctx.debug, "afterBlockPhase", doc);

  for (const plugin of plugins) {
    if (plugin.onParseBlock) {
      plugin.onParseBlock(doc);
      if (isDebugMode(ctx.debug)) {
        captureSnapshot(ctx.debug, `afterPluginOnParseBlock(${pluginName(plugin)})`, doc);
      }
    }
  }

  walkBlockTreeAndParseInlines(doc, ctx);
  captureSnapshot(ctx.debug, "afterInlinePhase", doc);

  for (const plugin of plugins) {
    if (plugin.onParseInline) {
      plugin.onParseInline(doc);
      if (isDebugMode(ctx.debug)) {
        captureSnapshot(ctx.debug, `afterPluginOnParseInline(${pluginName(plugin)})`, doc);
      }
    }
  }

  for (const plugin of plugins) {
    if (plugin.onTransform) {
      plugin.onTransform(doc);
      if (isDebugMode(ctx.debug)) {
        captureSnapshot(ctx.debug, `afterPluginOnTransform(${pluginName(plugin)})`, doc);
      }
    }
  }

  const footnoteBindings = resolveFootnotes(doc, ctx);
  captureSnapshot(ctx.debug, "afterFootnoteResolution", doc);

  freezeDocument(doc);
  captureSnapshot(ctx.debug, "finalAST", doc);

  return {
    document: doc,
    diagnostics: ctx.diagnostics,
    footnoteBindings,
    snapshots: getDebugSnapshots(ctx.debug),
  };
}

export function parseMarkdownWithDebug(markdown: string, options: ParseOptions = {}): {
  html: string;
  snapshots: DebugSnapshot[];
  diagnostics: Diagnostic[];
} {
  const result = parseMarkdownToAst(markdown, { ...options, debug: true });
  const html = renderParsed(result, options);
  return { html, snapshots: result.snapshots, diagnostics: result.diagnostics };
}

function renderParsed(result: ParseResult, options: ParseOptions): string {
  const doc = result.document;
  let html = renderAstToHtml(doc);
  for (const plugin of resolveParseOptions(options).plugins) {
    if (plugin.onRender) {
      html = plugin.onRender(html, doc);
    }
  }
  return html;
}

/** A footnote table whose writers throw once the document is finished. */
class FrozenFootnoteTable extends Map<string, FootnoteDefinitionNode> {
  constructor(source: ReadonlyMap<string, FootnoteDefinitionNode>) {
    super();
    for (const [label, def] of source) {
      super.set(label, def);
    }
    Object.freeze(this);
  }

  set(label: string): never {
    throw new TypeError(`Cannot set footnote [^${label}]: the footnote table of a parsed document is read-only`);
  }

  delete(label: string): never {
    throw new TypeError(`Cannot delete footnote [^${label}]: the footnote table of a parsed document is read-only`);
  }

  clear(): never {
    throw new TypeError("Cannot clear the footnote table of a parsed document: it is read-only");
  }
}

/** Locks the finished tree, footnote definitions and table included. */
export function freezeDocument(doc: DocumentNode): DocumentNode {
  if (Object.isFrozen(doc)) return doc;
  deepFreeze(doc.children);
  for (const def of doc.footnotes.values()) {
    deepFreeze(def);
  }
  doc.footnotes = new FrozenFootnoteTable(doc.footnotes);
  return Object.freeze(doc);
}

function deepFreeze(value: unknown) {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}
