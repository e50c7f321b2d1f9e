export type * from "./ast";
export { parseMarkdown, parseMarkdownToAst, parseMarkdownWithDebug, freezeDocument } from "./parse-markdown";
export type { ParseResult } from "./parse-markdown";
export type { ParseOptions, DuplicateFootnotePolicy } from "./parse-options";
export { InvalidInputError, DiagnosticsError, assertNoDiagnostics } from "./errors";
export type { Diagnostic, DiagnosticKind } from "./errors";
export type { FootnoteBinding } from "./footnote-resolver";
export type { MarkdownPlugin, PluginEntry, PluginInput } from "./plugin-system";
export type { DebugSnapshot } from "./debug";
export { renderAstToHtml, applyTemplate, escapeHtml } from "./renderer";
export { parseInlineString } from "./inline-parser";
export { classifyLine } from "./line-classifier";
export type { LineClass, LineContext } from "./line-classifier";
