import type {
  ClassDeclaration,
  Declaration,
  EnumDeclaration,
  EnumValue,
  FieldDeclaration,
  FunctionDeclaration,
  NamespaceDeclaration,
  Parameter,
  StructDeclaration,
  TypedefDeclaration,
} from '../ast/nodes'
import type { ClangNode } from '../clang/dump'
import { childrenOf, childrenOfKind, nameOf, qualTypeOf } from '../clang/dump'
import { extractDocumentation } from './comments'
import { buildField } from './fields'

// ---------------------------------------------------------------------------
// Per-kind declaration builders
// ---------------------------------------------------------------------------

export interface BuildContext {
  groupNamespaces: boolean
}

// `members` holds what the node's children produced, already in order. A
// builder that returns a Namespace takes ownership of them.
export type DeclarationBuilder = (
  node: ClangNode,
  members: Declaration[],
  context: BuildContext,
) => Declaration | null

export function extractReturnType(typeStr: string): string {
  const paren = typeStr.indexOf('(')
  return (paren === -1 ? typeStr : typeStr.slice(0, paren)).trim()
}

function buildParameters(node: ClangNode): Parameter[] {
  return childrenOfKind(node, 'ParmVarDecl').map((param, index) => ({
    name: nameOf(param) ?? `param${index}`,
    type: qualTypeOf(param),
  }))
}

export function buildFunction(node: ClangNode): FunctionDeclaration | null {
  const name = nameOf(node)
  if (name === null) return null
  return {
    type: 'Function',
    name,
    returnType: extractReturnType(qualTypeOf(node)),
    params: buildParameters(node),
    isVirtual: node.virtual === true,
    isStatic: node.storageClass === 'static',
    isInline: node.inline === true,
    isVariadic: node.variadic === true,
    documentation: extractDocumentation(node),
  }
}

function buildFields(node: ClangNode): FieldDeclaration[] {
  return childrenOfKind(node, 'FieldDecl')
    .map(buildField)
    .filter((field): field is FieldDeclaration => field !== null)
}

export function buildRecord(node: ClangNode): StructDeclaration | null {
  const fields = buildFields(node)
  const name = nameOf(node)
  // Anonymous and memberless: a forward reference or structural noise
  if (name === null && fields.length === 0) return null
  return {
    type: 'Struct',
    name: name ?? '',
    fields,
    isUnion: node.tagUsed === 'union',
    documentation: extractDocumentation(node),
  }
}

function parseInteger(value: ClangNode['value']): bigint | null {
  if (typeof value === 'number') return Number.isInteger(value) ? BigInt(value) : null
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return BigInt(value.trim())
  return null
}

// The evaluated value sits on the initializer (ConstantExpr) or one level below it.
function findConstantValue(node: ClangNode): bigint | null {
  for (const child of childrenOf(node)) {
    const direct = parseInteger(child.value)
    if (direct !== null) return direct
    for (const nested of childrenOf(child)) {
      const value = parseInteger(nested.value)
      if (value !== null) return value
    }
  }
  return null
}

export function buildEnumValues(node: ClangNode): EnumValue[] {
  const values: EnumValue[] = []
  let next = 0n
  for (const constant of childrenOfKind(node, 'EnumConstantDecl')) {
    const name = nameOf(constant)
    if (name === null) continue
    const value = findConstantValue(constant) ?? next
    values.push({ name, value, documentation: extractDocumentation(constant) })
    next = value + 1n
  }
  return values
}

export function buildEnum(node: ClangNode): EnumDeclaration | null {
  const values = buildEnumValues(node)
  const name = nameOf(node)
  if (name === null && values.length === 0) return null
  return {
    type: 'Enum',
    name: name ?? '',
    values,
    underlyingType: node.fixedUnderlyingType?.qualType ?? null,
    documentation: extractDocumentation(node),
  }
}

export function buildTypedef(node: ClangNode): TypedefDeclaration | null {
  const name = nameOf(node)
  if (name === null) return null
  return {
    type: 'Typedef',
    name,
    underlyingType: qualTypeOf(node),
    documentation: extractDocumentation(node),
  }
}

export function buildClass(node: ClangNode): ClassDeclaration | null {
  const name = nameOf(node)
  if (name === null) return null
  const methods = childrenOfKind(node, 'CXXMethodDecl', 'FunctionDecl')
    .filter((method) => method.isImplicit !== true)
    .map(buildFunction)
    .filter((method): method is FunctionDeclaration => method !== null)
  return {
    type: 'Class',
    name,
    methods,
    fields: buildFields(node),
    isAbstract: childrenOfKind(node, 'CXXMethodDecl').some((method) => method.pure === true),
    documentation: extractDocumentation(node),
  }
}

export function buildNamespace(
  node: ClangNode,
  members: Declaration[],
  context: BuildContext,
): NamespaceDeclaration | null {
  const name = nameOf(node)
  if (!context.groupNamespaces || name === null) return null
  return { type: 'Namespace', name, declarations: members }
}

// ---- Dispatch ----

export const BUILDERS = {
  FunctionDecl: buildFunction,
  RecordDecl: buildRecord,
  EnumDecl: buildEnum,
  TypedefDecl: buildTypedef,
  CXXRecordDecl: buildClass,
  NamespaceDecl: buildNamespace,
} satisfies Record<string, DeclarationBuilder>

export type DeclarationNodeKind = keyof typeof BUILDERS

const DECLARATION_KINDS: ReadonlySet<string> = new Set(Object.keys(BUILDERS))

export function isDeclarationNodeKind(kind: string): kind is DeclarationNodeKind {
  return DECLARATION_KINDS.has(kind)
}
