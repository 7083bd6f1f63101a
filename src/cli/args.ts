import { parseArgs } from 'node:util'
import type { HeaderParserInput, SourceLanguage } from '../config'

export const USAGE = `Usage: c-header-decls <header> [options]

Options:
  -I, --include <dir>       Add an include search path (repeatable)
  -D, --define <name[=v]>   Define a preprocessor macro (repeatable)
      --macro-prefix <p>    Keep only macros starting with <p> (repeatable)
      --no-macros           Skip the macro pass
      --group-namespaces    Nest C++ namespace members under Namespace entries
      --lang <c|c++>        Force the source language
      --clang <path>        clang binary (default: $CLANG_PATH or clang)
      --compact             Print JSON on a single line
  -v, --verbose             Log progress to stderr
  -h, --help                Show this help`

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'parse'; input: HeaderParserInput; compact: boolean }
  | { kind: 'error'; message: string }

function isLanguage(value: string): value is SourceLanguage {
  return value === 'c' || value === 'c++'
}

const OPTIONS = {
  include: { type: 'string', short: 'I', multiple: true },
  define: { type: 'string', short: 'D', multiple: true },
  'macro-prefix': { type: 'string', multiple: true },
  'no-macros': { type: 'boolean' },
  'group-namespaces': { type: 'boolean' },
  lang: { type: 'string' },
  clang: { type: 'string' },
  compact: { type: 'boolean' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const

function readArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS })
}

export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof readArgs>
  try {
    parsed = readArgs(argv)
  } catch (err) {
    return { kind: 'error', message: err instanceof Error ? err.message : String(err) }
  }

  const { values, positionals } = parsed
  if (values.help === true) return { kind: 'help' }

  if (positionals.length !== 1) {
    return {
      kind: 'error',
      message: positionals.length === 0 ? 'missing header file' : `expected one header file, got ${positionals.length}`,
    }
  }

  let language: SourceLanguage | undefined
  if (values.lang !== undefined) {
    if (!isLanguage(values.lang)) return { kind: 'error', message: `unknown language: ${values.lang}` }
    language = values.lang
  }

  return {
    kind: 'parse',
    compact: values.compact === true,
    input: {
      headerFile: positionals[0],
      includePaths: values.include ?? [],
      defines: values.define ?? [],
      macroPrefixes: values['macro-prefix'] ?? [],
      includeMacros: values['no-macros'] !== true,
      groupNamespaces: values['group-namespaces'] === true,
      verbose: values.verbose === true,
      clangPath: values.clang,
      language,
    },
  }
}
