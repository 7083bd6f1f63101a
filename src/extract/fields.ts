import type { FieldDeclaration } from '../ast/nodes'
import type { ClangNode } from '../clang/dump'
import { nameOf, qualTypeOf } from '../clang/dump'

// CMSIS register access qualifiers. __I/__IM are read-only (volatile const),
// the rest are volatile.
const READ_ONLY_QUALIFIERS = ['__I', '__IM']
const HARDWARE_QUALIFIERS = ['__I', '__O', '__IO', '__IM', '__OM', '__IOM']
const QUALIFIERS = ['volatile', 'const', ...HARDWARE_QUALIFIERS]

const ARRAY_SUFFIX = /\[(\d+)\]/
const ARRAY_SUFFIX_ALL = /\s*\[\d+\]/g
const QUALIFIER_WORDS = new RegExp(`(?<![\\w])(?:${QUALIFIERS.join('|')})(?![\\w])`, 'g')
const ANONYMOUS_RECORD = /^(?:struct|union) \((?:anonymous|unnamed) /

function hasWord(typeStr: string, words: string[]): boolean {
  return words.some((word) => new RegExp(`(?<![\\w])${word}(?![\\w])`).test(typeStr))
}

/** Split a field's qualType into its base type and qualifier/array flags. */
export function parseFieldType(typeStr: string): Omit<FieldDeclaration, 'name'> {
  const isVolatile = hasWord(typeStr, ['volatile', ...HARDWARE_QUALIFIERS])
  const isConst = hasWord(typeStr, ['const', ...READ_ONLY_QUALIFIERS])

  const arrayMatch = ARRAY_SUFFIX.exec(typeStr)
  const isArray = arrayMatch !== null
  const arraySize = arrayMatch !== null ? Number.parseInt(arrayMatch[1], 10) : null

  const type = typeStr
    .replace(ARRAY_SUFFIX_ALL, '')
    .replace(QUALIFIER_WORDS, '')
    .replace(/\s+/g, ' ')
    .trim()

  return { type, isVolatile, isConst, isArray, arraySize }
}

export function buildField(node: ClangNode): FieldDeclaration | null {
  const typeStr = qualTypeOf(node)
  const name = nameOf(node)
  if (name === null) {
    // The implicit member clang adds for `struct { union { ... }; }`
    if (ANONYMOUS_RECORD.test(typeStr)) return { name: '', ...parseFieldType(typeStr) }
    return null
  }
  return { name, ...parseFieldType(typeStr) }
}
