import { existsSync } from 'node:fs'
import { basename } from 'node:path'
import type { Declaration, MacroDeclaration } from './ast/nodes'
import { decodeAstDump } from './clang/dump'
import type { ClangRunner } from './clang/invoke'
import { astDumpArgs, createClangRunner, macroDumpArgs } from './clang/invoke'
import { createFileMatcher } from './clang/provenance'
import type { HeaderParserInput, HeaderParserOptions } from './config'
import { resolveOptions } from './config'
import { EmptyResultError, HeaderNotFoundError, HeaderParseError } from './errors'
import { extractDeclarations } from './extract/walk'
import type { Logger } from './logger'
import { createLogger } from './logger'
import { classifyMacros } from './macros/classifier'

export type PassResult<T> = { ok: true; value: T } | { ok: false; error: HeaderParseError }

export interface ParseResult {
  declarations: Declaration[]
  macros: MacroDeclaration[]
  // Set when the macro pass failed and was skipped
  macroFailure: HeaderParseError | null
}

// Collaborators a caller or a test may swap out.
export interface ParserDependencies {
  logger?: Logger
  runner?: ClangRunner
  // Directory clang reports relative file names against
  cwd?: string
}

export interface PassContext {
  runner: ClangRunner
  logger: Logger
  cwd: string
}

async function runPass<T>(pass: () => Promise<T>): Promise<PassResult<T>> {
  try {
    return { ok: true, value: await pass() }
  } catch (err) {
    if (err instanceof HeaderParseError) return { ok: false, error: err }
    throw err
  }
}

export function runAstPass(
  options: HeaderParserOptions,
  context: PassContext,
): Promise<PassResult<Declaration[]>> {
  return runPass(async () => {
    const output = await context.runner(astDumpArgs(options))
    context.logger.debug('decoding JSON AST')
    const root = decodeAstDump(output)
    const declarations = extractDeclarations(root, {
      matcher: createFileMatcher(options.headerFile, context.cwd),
      groupNamespaces: options.groupNamespaces,
      logger: context.logger,
    })
    context.logger.debug({ count: declarations.length }, 'extracted AST declarations')
    return declarations
  })
}

export function runMacroPass(
  options: HeaderParserOptions,
  context: PassContext,
): Promise<PassResult<MacroDeclaration[]>> {
  return runPass(async () => {
    const output = await context.runner(macroDumpArgs(options))
    const macros = classifyMacros(output, options.macroPrefixes)
    context.logger.debug({ count: macros.length }, 'extracted macros')
    return macros
  })
}

function prepare(input: HeaderParserInput, deps: ParserDependencies) {
  const options = resolveOptions(input)
  if (!existsSync(options.headerFile)) throw new HeaderNotFoundError(options.headerFile)
  const logger = deps.logger ?? createLogger({ verbose: options.verbose })
  const context: PassContext = {
    logger,
    runner: deps.runner ?? createClangRunner({ clangPath: options.clangPath, logger }),
    cwd: deps.cwd ?? process.cwd(),
  }
  return { options, context }
}

/** Parse a header and return AST declarations and macros separately. */
export async function parseHeaderFull(
  input: HeaderParserInput,
  deps: ParserDependencies = {},
): Promise<ParseResult> {
  const { options, context } = prepare(input, deps)
  context.logger.debug({ headerFile: options.headerFile }, 'parsing header')

  const noMacros: PassResult<MacroDeclaration[]> = { ok: true, value: [] }
  const [ast, macros] = await Promise.all([
    runAstPass(options, context),
    options.includeMacros ? runMacroPass(options, context) : noMacros,
  ])

  if (!ast.ok) throw ast.error

  if (!macros.ok) {
    context.logger.warn({ err: macros.error }, `failed to extract macros: ${macros.error.message}`)
    return { declarations: ast.value, macros: [], macroFailure: macros.error }
  }

  return { declarations: ast.value, macros: macros.value, macroFailure: null }
}

/**
 * Parse a header into one ordered list: AST declarations first, then macros.
 * Throws EmptyResultError when nothing was found.
 */
export async function parseHeader(
  input: HeaderParserInput,
  deps: ParserDependencies = {},
): Promise<Declaration[]> {
  const result = await parseHeaderFull(input, deps)
  const declarations: Declaration[] = [...result.declarations, ...result.macros]
  if (declarations.length === 0) {
    throw new EmptyResultError(basename(input.headerFile))
  }
  return declarations
}

export function parse(
  headerFile: string,
  includePaths: string[] = [],
  verbose = false,
  deps: ParserDependencies = {},
): Promise<Declaration[]> {
  return parseHeader({ headerFile, includePaths, verbose }, deps)
}

// Device headers such as CMSIS ones need their part number defined.
export function parseWithDefines(
  headerFile: string,
  includePaths: string[],
  defines: string[],
  verbose = false,
  deps: ParserDependencies = {},
): Promise<Declaration[]> {
  return parseHeader({ headerFile, includePaths, defines, verbose }, deps)
}

/**
 * Parse a CMSIS device header. Every non-reserved macro is kept, and macros
 * come back apart from the AST declarations.
 */
export function parseCMSIS(
  headerFile: string,
  includePaths: string[],
  defines: string[],
  verbose = false,
  deps: ParserDependencies = {},
): Promise<ParseResult> {
  return parseHeaderFull(
    { headerFile, includePaths, defines, verbose, includeMacros: true, macroPrefixes: [] },
    deps,
  )
}
