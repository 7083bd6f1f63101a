// Public API for the header declaration extractor.
// Usage: import { parseHeader } from 'c-header-decls';

import type * as AST from './ast/nodes'

export {
  parse,
  parseCMSIS,
  parseHeader,
  parseHeaderFull,
  parseWithDefines,
  runAstPass,
  runMacroPass,
} from './pipeline'
export type { ParseResult, ParserDependencies, PassResult } from './pipeline'

export { defaultOptions, resolveOptions, DEFAULT_CLANG } from './config'
export type { HeaderParserInput, HeaderParserOptions, SourceLanguage } from './config'

export {
  astDumpArgs,
  buildClangArgs,
  createClangRunner,
  macroDumpArgs,
  runClang,
} from './clang/invoke'
export type { ClangRunner, RunClangSettings, SpawnedProcess, SpawnProcess } from './clang/invoke'

export { decodeAstDump } from './clang/dump'
export type { ClangNode, ClangLocation } from './clang/dump'
export { createFileMatcher, isLocalOrigin, trackLocation } from './clang/provenance'
export type { FileMatcher, Origin } from './clang/provenance'

export { extractDeclarations } from './extract/walk'
export type { ExtractOptions } from './extract/walk'
export { parseFieldType } from './extract/fields'

export { classifyMacros, classifyMacroValue, isUserMacro, parseMacroLine } from './macros/classifier'

export { serializeDeclarations } from './adapter/json'
export { createLogger } from './logger'
export type { Logger } from './logger'

export {
  EmptyResultError,
  HeaderNotFoundError,
  HeaderParseError,
  InvalidOptionsError,
  ToolInvocationError,
  ToolLaunchError,
  TreeDecodeError,
} from './errors'
export type { HeaderParseErrorCode } from './errors'

// Re-export types for consumers
export type { AST }
export type {
  Declaration,
  FieldDeclaration,
  FunctionDeclaration,
  MacroDeclaration,
  MacroKind,
} from './ast/nodes'
