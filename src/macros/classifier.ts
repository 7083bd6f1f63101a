import type { MacroDeclaration, MacroKind } from '../ast/nodes'

// ---------------------------------------------------------------------------
// clang -E -dM output, one `#define` per line
// ---------------------------------------------------------------------------

const DEFINE = '#define '

// NAME(args) BODY -- no space between the name and the parameter list
const FUNCTION_LIKE = /^(\w+)\(([^)]*)\)(?:\s+(.*))?$/
const OBJECT_LIKE = /^(\w+)\s+(.+)$/
const BARE = /^(\w+)$/
// ((Type *) EXPR)
const POINTER_CAST = /^\(\((\w+)\s*\*\)\s*(.+)\)$/
const OPERATOR = /<<|>>|[+\-*/%|&^~]/
const QUOTED = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/g

export function classifyMacroValue(value: string): MacroKind {
  const cast = POINTER_CAST.exec(value)
  if (cast !== null) {
    return { kind: 'TypeCast', targetType: cast[1], address: cast[2].trim() }
  }
  if (OPERATOR.test(value.replace(QUOTED, '""'))) {
    return { kind: 'Expression', expression: value }
  }
  return { kind: 'SimpleValue', value }
}

export function parseMacroLine(line: string): MacroDeclaration | null {
  if (!line.startsWith(DEFINE)) return null
  const rest = line.slice(DEFINE.length).trim()

  const fn = FUNCTION_LIKE.exec(rest)
  if (fn !== null) {
    const argText = fn[2].trim()
    const body = (fn[3] ?? '').trim()
    return {
      type: 'Macro',
      name: fn[1],
      kind: {
        kind: 'FunctionLike',
        args: argText === '' ? [] : argText.split(',').map((arg) => arg.trim()),
        body,
      },
      rawValue: body,
    }
  }

  const obj = OBJECT_LIKE.exec(rest)
  if (obj !== null) {
    const value = obj[2].trim()
    return { type: 'Macro', name: obj[1], kind: classifyMacroValue(value), rawValue: value }
  }

  const bare = BARE.exec(rest)
  if (bare !== null) {
    return { type: 'Macro', name: bare[1], kind: { kind: 'SimpleValue', value: '' }, rawValue: '' }
  }

  return null
}

// Compiler built-ins (__GNUC__) and reserved identifiers (_Bool, _WIN32) never
// count as user macros, whatever the prefix list says.
export function isReservedMacroName(name: string): boolean {
  if (name.length > 4 && name.startsWith('__') && name.endsWith('__')) return true
  return name.length > 1 && name[0] === '_' && name[1] >= 'A' && name[1] <= 'Z'
}

export function isUserMacro(name: string, prefixes: readonly string[]): boolean {
  if (isReservedMacroName(name)) return false
  if (prefixes.length === 0) return true
  return prefixes.some((prefix) => name.startsWith(prefix))
}

export function classifyMacros(text: string, prefixes: readonly string[] = []): MacroDeclaration[] {
  const macros: MacroDeclaration[] = []
  for (const line of text.split(/\r?\n|\r/)) {
    if (line.trim() === '') continue
    const macro = parseMacroLine(line)
    if (macro !== null && isUserMacro(macro.name, prefixes)) macros.push(macro)
  }
  return macros
}
