import type {
  BlockNode,
  DocumentNode,
  FootnoteDefinitionNode,
  FootnoteReferenceNode,
  InlineNode,
} from "./ast";
import { isDebugMode, logDebug } from "./debug";
import type { ParseContext } from "./parse-options";

export interface FootnoteBinding {
  reference: FootnoteReferenceNode;
  definition: FootnoteDefinitionNode | null;
}

export function collectFootnoteReferences(nodes: InlineNode[], out: FootnoteReferenceNode[] = []) {
  for (const node of nodes) {
    if (node.type === "footnote_reference") {
      out.push(node);
    } else if (node.type === "emphasis" || node.type === "link") {
      collectFootnoteReferences(node.children, out);
    }
  }
  return out;
}

function collectFromBlocks(blocks: BlockNode[], out: FootnoteReferenceNode[]) {
  for (const block of blocks) {
    switch (block.type) {
      case "paragraph":
      case "heading":
        collectFootnoteReferences(block.children, out);
        break;
      case "blockquote":
        collectFromBlocks(block.children, out);
        break;
      default:
        break;
    }
  }
}

/**
 * Binds every footnote reference in the tree, definition bodies included, to
 * the document's footnote table. Runs after the whole tree exists, so a
 * definition may sit anywhere relative to its references. Misses stay in the
 * tree and are reported as diagnostics.
 */
export function resolveFootnotes(doc: DocumentNode, ctx: ParseContext): FootnoteBinding[] {
  const references: FootnoteReferenceNode[] = [];
  collectFromBlocks(doc.children, references);
  for (const def of doc.footnotes.values()) {
    collectFootnoteReferences(def.children, references);
  }

  const reported = new Set<string>();
  const bindings: FootnoteBinding[] = [];
  for (const reference of references) {
    const definition = doc.footnotes.get(reference.label) ?? null;
    bindings.push({ reference, definition });
    if (definition) continue;

    if (isDebugMode(ctx.debug)) {
      logDebug(ctx.debug, `Unresolved footnote reference [^${reference.label}]`);
    }
    if (!reported.has(reference.label)) {
      reported.add(reference.label);
      ctx.diagnostics.push({
        kind: "unresolved_footnote",
        label: reference.label,
        message: `Footnote reference [^${reference.label}] has no matching definition`,
      });
    }
  }
  return bindings;
}
