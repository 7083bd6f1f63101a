// Error taxonomy for a header parse. Every failure the pipeline reports is a
// HeaderParseError; callers can switch on `code` instead of instanceof.

export type HeaderParseErrorCode =
  | 'HEADER_NOT_FOUND'
  | 'INVALID_OPTIONS'
  | 'TOOL_INVOCATION'
  | 'TOOL_LAUNCH'
  | 'TREE_DECODE'
  | 'EMPTY_RESULT'

export class HeaderParseError extends Error {
  readonly code: HeaderParseErrorCode

  constructor(code: HeaderParseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HeaderParseError'
    this.code = code
  }
}

export class HeaderNotFoundError extends HeaderParseError {
  readonly headerFile: string

  constructor(headerFile: string) {
    super('HEADER_NOT_FOUND', `Header file not found: ${headerFile}`)
    this.name = 'HeaderNotFoundError'
    this.headerFile = headerFile
  }
}

export class InvalidOptionsError extends HeaderParseError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('INVALID_OPTIONS', `Invalid parser options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

/** clang ran but exited non-zero. */
export class ToolInvocationError extends HeaderParseError {
  readonly exitCode: number | null
  readonly stderr: string

  constructor(
    message: string,
    details: { exitCode: number | null; stderr: string; code?: HeaderParseErrorCode; cause?: unknown },
  ) {
    super(details.code ?? 'TOOL_INVOCATION', message, { cause: details.cause })
    this.name = 'ToolInvocationError'
    this.exitCode = details.exitCode
    this.stderr = details.stderr
  }
}

/** clang could not be started at all. */
export class ToolLaunchError extends ToolInvocationError {
  readonly command: string

  constructor(command: string, cause: unknown) {
    const reason =
      isErrnoException(cause) && cause.code === 'ENOENT'
        ? 'not found'
        : cause instanceof Error
          ? cause.message
          : String(cause)
    super(`Failed to run ${command}: ${reason}`, {
      exitCode: null,
      stderr: '',
      code: 'TOOL_LAUNCH',
      cause,
    })
    this.name = 'ToolLaunchError'
    this.command = command
  }
}

export class TreeDecodeError extends HeaderParseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TREE_DECODE', `Failed to parse clang output: ${message}`, options)
    this.name = 'TreeDecodeError'
  }
}

export class EmptyResultError extends HeaderParseError {
  readonly headerFile: string

  constructor(headerFile: string) {
    super('EMPTY_RESULT', `Parse succeeded but no declarations found in ${headerFile}.`)
    this.name = 'EmptyResultError'
    this.headerFile = headerFile
  }
}

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value
}
