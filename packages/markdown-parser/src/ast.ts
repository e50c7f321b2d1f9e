type NodeBase<T extends string> = { type: T }
type NodeWithChildren<T extends string, U extends MarkdownNode[]> = NodeBase<T> & { children: U }
type NodeWithOptionalRaw<T extends string, U extends MarkdownNode[]> = NodeWithChildren<T, U> & { _raw?: string }
type NodeWithValue<T extends string> = NodeBase<T> & { value: string }
type NodeWithCode<T extends string> = NodeBase<T> & { code: string }

export type EmphasisKind = "bold" | "italic"

export type DocumentNode = NodeWithChildren<"document", BlockNode[]> & {
  footnotes: ReadonlyMap<string, FootnoteDefinitionNode>
}

export type ParagraphNode = NodeWithOptionalRaw<"paragraph", InlineNode[]>
export type HeadingNode = NodeWithOptionalRaw<"heading", InlineNode[]> & { level: number }
export type BlockquoteNode = NodeWithChildren<"blockquote", BlockNode[]> & { level: number }
export type CodeBlockNode = NodeBase<"code_block"> & {
  info?: string
  lines: string[]
  fence: string
}
export type MathBlockNode = NodeWithValue<"math_block">
export type HtmlBlockNode = NodeBase<"html_block"> & { lines: string[] }
export type FootnoteDefinitionNode = NodeWithOptionalRaw<"footnote_definition", InlineNode[]> & {
  label: string
}

export type TextNode = NodeWithValue<"text">
export type EmphasisNode = NodeWithChildren<"emphasis", InlineNode[]> & { kind: EmphasisKind }
export type CodeSpanNode = NodeWithCode<"code_span">
export type MathSpanNode = NodeWithValue<"math_span">
export type LinkNode = NodeWithChildren<"link", InlineNode[]> & { url: string }
export type ImageNode = NodeBase<"image"> & {
  url: string
  alt: string
  attributes: Record<string, string>
}
export type FootnoteReferenceNode = NodeBase<"footnote_reference"> & { label: string }

export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | BlockquoteNode
  | CodeBlockNode
  | MathBlockNode
  | HtmlBlockNode

export type InlineNode =
  | TextNode
  | EmphasisNode
  | CodeSpanNode
  | MathSpanNode
  | LinkNode
  | ImageNode
  | FootnoteReferenceNode

export type MarkdownNode =
  | DocumentNode
  | BlockNode
  | FootnoteDefinitionNode
  | InlineNode
