import type { FootnoteDefinitionNode, MarkdownNode } from "./ast";

type FootnoteTable = ReadonlyMap<string, FootnoteDefinitionNode>;

/**
 * Serialises a node to HTML. `footnotes` decides whether a footnote reference
 * is linked or printed back as literal text; a document always uses its own
 * table, and `null` treats every reference as resolved.
 */
export function renderAstToHtml(
  node: MarkdownNode,
  footnotes: FootnoteTable | null = null,
  isTop = true,
  idx = 0,
  count = 1,
): string {
  const renderChildren = (children: MarkdownNode[]) =>
    children.map((c, i) => renderAstToHtml(c, footnotes, false, i, children.length)).join("");

  switch (node.type) {
    case "document": {
      let html = node.children
        .map((c, i) => renderAstToHtml(c, node.footnotes, true, i, node.children.length))
        .join("");
      const notes = renderFootnoteSection(node.footnotes);
      if (notes) html = html ? html + "\n" + notes : notes;
      return html;
    }
    case "paragraph":
      return wrapBlock(`<p>${renderChildren(node.children)}</p>`, isTop, idx, count);
    case "heading":
      return wrapBlock(`<h${node.level}>${renderChildren(node.children)}</h${node.level}>`, isTop, idx, count);
    case "blockquote":
      return wrapBlock(
        `<blockquote class="quote-${node.level}">${renderChildren(node.children)}</blockquote>`,
        isTop,
        idx,
        count,
      );
    case "code_block": {
      const lang = node.info ? ` class="language-${escapeHtmlAttr(node.info)}"` : "";
      const escaped = escapeHtml(node.lines.join("\n"));
      return wrapBlock(`<pre><code${lang}>${escaped}</code></pre>`, isTop, idx, count);
    }
    case "math_block":
      return wrapBlock(`<div class="display-math">\\[${escapeHtml(node.value)}\\]</div>`, isTop, idx, count);
    case "html_block":
      return wrapBlock(node.lines.join("\n"), isTop, idx, count);
    case "footnote_definition": {
      const id = escapeHtmlAttr(node.label);
      return `<p id="fn-${id}"><a href="#fnref-${id}">[${escapeHtml(node.label)}]</a> ${renderChildren(node.children)}</p>`;
    }
    case "text":
      return escapeHtml(node.value);
    case "emphasis": {
      const tag = node.kind === "bold" ? "strong" : "em";
      return `<${tag}>${renderChildren(node.children)}</${tag}>`;
    }
    case "code_span":
      return `<code>${escapeHtml(node.code)}</code>`;
    case "math_span":
      return `<span class="inline-math">\\(${escapeHtml(node.value)}\\)</span>`;
    case "link":
      return `<a href="${escapeUrl(node.url)}">${renderChildren(node.children)}</a>`;
    case "image": {
      const attrs = Object.entries(node.attributes)
        .map(([key, value]) => renderImageAttribute(key, value))
        .join("");
      return `<img src="${escapeUrl(node.url)}" alt="${escapeHtmlAttr(node.alt)}"${attrs} />`;
    }
    case "footnote_reference": {
      if (footnotes && !footnotes.has(node.label)) {
        return escapeHtml(`[^${node.label}]`);
      }
      const id = escapeHtmlAttr(node.label);
      return `<sup id="fnref-${id}"><a href="#fn-${id}">[${escapeHtml(node.label)}]</a></sup>`;
    }
  }
}

/** `width` is a percentage of the text column; 100 is the default and needs no style. */
export function renderImageAttribute(key: string, value: string): string {
  if (key !== "width") return ` ${key}="${escapeHtmlAttr(value)}"`;
  if (value === "100") return "";
  return ` style="width: ${escapeHtmlAttr(value)}%;"`;
}

export function renderFootnoteSection(footnotes: FootnoteTable): string {
  if (footnotes.size === 0) return "";
  const items = [...footnotes.values()].map((def) => renderAstToHtml(def, footnotes, false)).join("");
  return `<section class="footnotes">${items}</section>`;
}

export function wrapBlock(html: string, isTop: boolean, idx: number, count: number) {
  if (isTop && idx < count - 1) return html + "\n";
  return html;
}

export function escapeHtml(str: string) {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function escapeHtmlAttr(str: string) {
  return escapeHtml(str);
}

export function escapeUrl(str: string) {
  return str.replace(/"/g, "%22");
}

/** Fills a page template's `{{title}}` and `{{content}}` placeholders. */
export function applyTemplate(template: string, page: { title: string; content: string }): string {
  return template.replace(/\{\{(title|content)\}\}/g, (_, key: string) =>
    key === "title" ? escapeHtml(page.title) : page.content,
  );
}
