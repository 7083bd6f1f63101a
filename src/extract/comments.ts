import type { ClangNode } from '../clang/dump'
import { childrenOf, childrenOfKind } from '../clang/dump'

function paragraphs(node: ClangNode): string[] {
  if (node.kind === 'ParagraphComment') {
    const text = childrenOfKind(node, 'TextComment')
      .map((comment) => (comment.text ?? '').trim())
      .filter((piece) => piece !== '')
      .join(' ')
    return text === '' ? [] : [text]
  }
  return childrenOf(node).flatMap(paragraphs)
}

// Text of the doc comment clang attached to a declaration, if any.
export function extractDocumentation(node: ClangNode): string | null {
  const full = childrenOfKind(node, 'FullComment')[0]
  if (full === undefined) return null
  const text = paragraphs(full).join('\n')
  return text === '' ? null : text
}
