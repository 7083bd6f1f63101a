import { z } from 'zod'
import { TreeDecodeError } from '../errors'

// ---------------------------------------------------------------------------
// clang -Xclang -ast-dump=json -- decoded node tree
// ---------------------------------------------------------------------------

// A single printed source location. `file` and `includedFrom` appear only when
// the file differs from the previously printed location.
export interface BareLocation {
  offset?: number
  file?: string
  line?: number
  col?: number
  tokLen?: number
  includedFrom?: { file?: string }
  isMacroArgExpansion?: boolean
}

export interface ClangLocation extends BareLocation {
  spellingLoc?: BareLocation
  expansionLoc?: BareLocation
  begin?: BareLocation
}

export interface ClangRange {
  begin?: ClangLocation
  end?: ClangLocation
}

export interface ClangQualType {
  qualType: string
  desugaredQualType?: string
}

export interface ClangNode {
  id?: string
  kind: string
  name?: string
  type?: ClangQualType
  loc?: ClangLocation
  range?: ClangRange
  inner?: ClangNode[]
  isImplicit?: boolean
  tagUsed?: string
  storageClass?: string
  inline?: boolean
  virtual?: boolean
  pure?: boolean
  variadic?: boolean
  fixedUnderlyingType?: ClangQualType
  // IntegerLiteral / ConstantExpr print integers as strings,
  // CXXBoolLiteralExpr prints a boolean
  value?: string | number | boolean
  // TextComment
  text?: string
}

const bareLocationSchema = z.object({
  offset: z.number().optional(),
  file: z.string().optional(),
  line: z.number().optional(),
  col: z.number().optional(),
  tokLen: z.number().optional(),
  includedFrom: z.object({ file: z.string().optional() }).optional(),
  isMacroArgExpansion: z.boolean().optional(),
})

const locationSchema = bareLocationSchema.extend({
  spellingLoc: bareLocationSchema.optional(),
  expansionLoc: bareLocationSchema.optional(),
  begin: bareLocationSchema.optional(),
})

const qualTypeSchema = z.object({
  qualType: z.string(),
  desugaredQualType: z.string().optional(),
})

// One node with its attributes. Children stay raw here and are checked one
// at a time by decodeAstDump: expression chains can nest thousands of levels.
export const clangNodeSchema = z.object({
  id: z.string().optional(),
  kind: z.string(),
  name: z.string().optional(),
  type: qualTypeSchema.optional(),
  loc: locationSchema.optional(),
  range: z
    .object({
      begin: locationSchema.optional(),
      end: locationSchema.optional(),
    })
    .optional(),
  inner: z.array(z.unknown()).optional(),
  isImplicit: z.boolean().optional(),
  tagUsed: z.string().optional(),
  storageClass: z.string().optional(),
  inline: z.boolean().optional(),
  virtual: z.boolean().optional(),
  pure: z.boolean().optional(),
  variadic: z.boolean().optional(),
  fixedUnderlyingType: qualTypeSchema.optional(),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
  text: z.string().optional(),
})

// Path of a node inside the dump, kept as a parent chain until an error needs it.
interface NodePath {
  parent: NodePath | null
  index: number
}

interface PendingNode {
  node: ClangNode
  rawInner: unknown[]
  path: NodePath | null
}

function formatPath(path: NodePath | null, tail: (string | number)[]): string {
  const segments: (string | number)[] = []
  for (let link = path; link !== null; link = link.parent) segments.unshift('inner', link.index)
  segments.push(...tail)
  return segments.length > 0 ? segments.join('.') : '(root)'
}

function decodeNode(raw: unknown, path: NodePath | null): PendingNode {
  const result = clangNodeSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new TreeDecodeError(`${issue.message} at ${formatPath(path, issue.path)}`, { cause: result.error })
  }
  const { inner, ...attributes } = result.data
  const node: ClangNode = attributes
  return { node, rawInner: inner ?? [], path }
}

export function decodeAstDump(text: string): ClangNode {
  if (text.trim() === '') {
    throw new TreeDecodeError('clang produced no AST output')
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new TreeDecodeError(err instanceof Error ? err.message : String(err), { cause: err })
  }

  const root = decodeNode(raw, null)
  const pending: PendingNode[] = [root]
  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    if (current.rawInner.length === 0) continue
    const children: ClangNode[] = []
    for (let index = 0; index < current.rawInner.length; index++) {
      const child = decodeNode(current.rawInner[index], { parent: current.path, index })
      children.push(child.node)
      pending.push(child)
    }
    current.node.inner = children
  }
  return root.node
}

// ---- Accessors ----

export function childrenOf(node: ClangNode): ClangNode[] {
  return node.inner ?? []
}

export function childrenOfKind(node: ClangNode, ...kinds: string[]): ClangNode[] {
  return childrenOf(node).filter((child) => kinds.includes(child.kind))
}

export function qualTypeOf(node: ClangNode): string {
  return node.type?.qualType ?? 'unknown'
}

export function nameOf(node: ClangNode): string | null {
  return node.name !== undefined && node.name !== '' ? node.name : null
}
