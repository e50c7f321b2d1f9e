import type { EmphasisKind, InlineNode } from "../ast"
import type { InlineToken } from "../inline-parser"

interface DelimiterFrame {
  char: string
  length: number
  content: string
  children: InlineNode[]
}

/**
 * Turns tokens into inline nodes. Emphasis runs are paired with a pushdown of
 * open delimiters: a closing run matches the nearest open run of the same
 * character and length, and every run opened after that one and still
 * unclosed falls back to literal text.
 */
export function parseInlinesWithDelimiterStack(inlineTokens: InlineToken[]): InlineNode[] {
  const root: InlineNode[] = []
  const stack: DelimiterFrame[] = []

  const current = () => (stack.length ? stack[stack.length - 1].children : root)

  for (const token of inlineTokens) {
    switch (token.type) {
      case "text":
      case "escaped_literal":
        appendInline(current(), { type: "text", value: token.content })
        break
      case "code_span":
        current().push({ type: "code_span", code: token.code })
        break
      case "math_span":
        current().push({ type: "math_span", value: token.value })
        break
      case "image":
        current().push({
          type: "image",
          url: token.url,
          alt: token.alt,
          attributes: token.attributes,
        })
        break
      case "link":
        current().push({
          type: "link",
          url: token.url,
          children: parseInlinesWithDelimiterStack(token.tokens),
        })
        break
      case "footnote_reference":
        current().push({ type: "footnote_reference", label: token.label })
        break
      case "delim": {
        const runChar = token.content[0]
        const canOpen = isLeftFlankingDelimiterRun(runChar, token.before, token.after)
        const canClose = isRightFlankingDelimiterRun(runChar, token.before, token.after)

        if (canClose) {
          const openerIndex = findOpener(stack, runChar, token.content.length)
          if (openerIndex !== -1) {
            while (stack.length - 1 > openerIndex) {
              unwindFrame(stack, root)
            }
            const frame = stack.pop()
            if (frame) {
              current().push({
                type: "emphasis",
                kind: emphasisKind(frame.char),
                children: frame.children,
              })
            }
            break
          }
        }

        if (canOpen) {
          stack.push({
            char: runChar,
            length: token.content.length,
            content: token.content,
            children: [],
          })
          break
        }

        appendInline(current(), { type: "text", value: token.content })
        break
      }
    }
  }

  while (stack.length) {
    unwindFrame(stack, root)
  }
  return root
}

export function emphasisKind(char: string): EmphasisKind {
  return char === "*" ? "bold" : "italic"
}

function findOpener(stack: DelimiterFrame[], char: string, length: number): number {
  for (let i = stack.length - 1; i >= 0; i--) {
    if (stack[i].char === char && stack[i].length === length) return i
  }
  return -1
}

/** Pops an unmatched opener and spills it, as text, into its parent. */
function unwindFrame(stack: DelimiterFrame[], root: InlineNode[]) {
  const frame = stack.pop()
  if (!frame) return
  const parent = stack.length ? stack[stack.length - 1].children : root
  appendInline(parent, { type: "text", value: frame.content })
  for (const child of frame.children) {
    appendInline(parent, child)
  }
}

/** Pushes a node, folding adjacent text nodes into one. */
export function appendInline(target: InlineNode[], node: InlineNode) {
  const last = target[target.length - 1]
  if (node.type === "text" && last && last.type === "text") {
    last.value += node.value
    return
  }
  target.push(node)
}

export function isRightFlankingDelimiterRun(
  runChar: string,
  previousChar: string,
  nextChar: string,
): boolean {
  if (runChar === "*") {
    return !!previousChar && !/\s/.test(previousChar)
  }
  if (runChar === "_") {
    if (!previousChar || /\s/.test(previousChar)) return false
    if (/[a-zA-Z0-9]/.test(previousChar) && nextChar && /[a-zA-Z0-9]/.test(nextChar)) {
      return false
    }
    return true
  }
  return false
}

export function isLeftFlankingDelimiterRun(
  runChar: string,
  previousChar: string,
  nextChar: string,
): boolean {
  if (runChar === "*") {
    return !!nextChar && !/\s/.test(nextChar)
  }
  if (runChar === "_") {
    if (nextChar === "_" || !nextChar || /\s/.test(nextChar)) return false
    if (/[a-zA-Z0-9]/.test(nextChar)) {
      if (/[a-zA-Z0-9]/.test(previousChar || "")) return false
    }
    return true
  }
  return false
}
