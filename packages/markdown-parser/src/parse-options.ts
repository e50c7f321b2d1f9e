import type { DebugState } from "./debug";
import { createDebugState } from "./debug";
import type { Diagnostic } from "./errors";
import { InvalidInputError } from "./errors";
import type { MarkdownPlugin, PluginInput } from "./plugin-system";
import { orderPlugins } from "./plugin-system";

export type DuplicateFootnotePolicy = "last-wins" | "first-wins";

export interface ParseOptions {
  debug?: boolean;
  plugins?: readonly PluginInput[];
  /** Attribute name a bare `{token}` after an image is stored under. */
  imageAttributeKey?: string;
  duplicateFootnotes?: DuplicateFootnotePolicy;
}

export interface ResolvedParseOptions {
  debug: boolean;
  plugins: MarkdownPlugin[];
  imageAttributeKey: string;
  duplicateFootnotes: DuplicateFootnotePolicy;
}

/** Scratch state owned by a single parse. */
export interface ParseContext {
  options: ResolvedParseOptions;
  debug: DebugState;
  diagnostics: Diagnostic[];
}

export const DEFAULT_IMAGE_ATTRIBUTE_KEY = "width";

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  if (typeof options !== "object" || options === null) {
    throw new InvalidInputError("Parse options must be an object");
  }

  const imageAttributeKey = options.imageAttributeKey ?? DEFAULT_IMAGE_ATTRIBUTE_KEY;
  if (typeof imageAttributeKey !== "string" || !/^[A-Za-z_][\w-]*$/.test(imageAttributeKey)) {
    throw new InvalidInputError(
      `imageAttributeKey must be an attribute name, got ${JSON.stringify(imageAttributeKey)}`,
    );
  }

  const duplicateFootnotes = options.duplicateFootnotes ?? "last-wins";
  if (duplicateFootnotes !== "last-wins" && duplicateFootnotes !== "first-wins") {
    throw new InvalidInputError(
      `duplicateFootnotes must be "last-wins" or "first-wins", got ${JSON.stringify(duplicateFootnotes)}`,
    );
  }

  const plugins = options.plugins ?? [];
  if (!Array.isArray(plugins)) {
    throw new InvalidInputError("plugins must be an array");
  }

  return {
    debug: !!options.debug,
    plugins: orderPlugins(plugins),
    imageAttributeKey,
    duplicateFootnotes,
  };
}

export function createParseContext(options: ParseOptions = {}): ParseContext {
  const resolved = resolveParseOptions(options);
  return {
    options: resolved,
    debug: createDebugState(resolved.debug),
    diagnostics: [],
  };
}
