import { spawn } from 'node:child_process'
import type { Readable } from 'node:stream'
import type { HeaderParserOptions } from '../config'
import { ToolInvocationError, ToolLaunchError } from '../errors'
import type { Logger } from '../logger'
import { silentLogger } from '../logger'

// Runs clang with a full argument vector and returns its stdout.
export type ClangRunner = (args: readonly string[]) => Promise<string>

// The slice of ChildProcess the runner relies on.
export interface SpawnedProcess {
  stdout: Readable | null
  stderr: Readable | null
  on(event: 'error', listener: (err: Error) => void): unknown
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
}

export type SpawnProcess = (command: string, args: readonly string[]) => SpawnedProcess

export interface RunClangSettings {
  clangPath: string
  logger?: Logger
  spawnProcess?: SpawnProcess
}

type ArgOptions = Pick<HeaderParserOptions, 'includePaths' | 'defines' | 'language' | 'extraArgs'>

// Flags shared by both passes, placed before the mode flags and the header.
export function buildClangArgs(options: ArgOptions): string[] {
  const args: string[] = []
  for (const includePath of options.includePaths) args.push(`-I${includePath}`)
  for (const define of options.defines) args.push(`-D${define}`)
  if (options.language !== undefined) args.push('-x', options.language)
  args.push(...options.extraArgs)
  return args
}

export function astDumpArgs(options: ArgOptions & Pick<HeaderParserOptions, 'headerFile'>): string[] {
  return [...buildClangArgs(options), '-Xclang', '-ast-dump=json', '-fsyntax-only', options.headerFile]
}

export function macroDumpArgs(options: ArgOptions & Pick<HeaderParserOptions, 'headerFile'>): string[] {
  return [...buildClangArgs(options), '-E', '-dM', options.headerFile]
}

const defaultSpawn: SpawnProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true })

/**
 * Run clang once and collect its standard output.
 *
 * stdout and stderr are both drained as data arrives; reading one to the end
 * before touching the other can stall clang once the unread pipe fills up,
 * which happens with vendor headers that dump tens of thousands of lines.
 */
export function runClang(args: readonly string[], settings: RunClangSettings): Promise<string> {
  const { clangPath } = settings
  const logger = settings.logger ?? silentLogger
  const spawnProcess = settings.spawnProcess ?? defaultSpawn

  logger.debug({ command: clangPath, args }, 'running clang')

  return new Promise<string>((resolve, reject) => {
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      fn()
    }

    let child: SpawnedProcess
    try {
      child = spawnProcess(clangPath, args)
    } catch (err) {
      reject(new ToolLaunchError(clangPath, err))
      return
    }

    child.stdout?.on('data', (chunk: Buffer | string) => {
      stdoutChunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })
    child.stderr?.on('data', (chunk: Buffer | string) => {
      stderrChunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })

    child.on('error', (err) => {
      settle(() => reject(new ToolLaunchError(clangPath, err)))
    })

    child.on('close', (code, signal) => {
      settle(() => {
        const stdoutBytes = Buffer.concat(stdoutChunks)
        const stderr = Buffer.concat(stderrChunks).toString('utf8')

        if (code === 0) {
          logger.debug({ bytes: stdoutBytes.length }, 'clang completed')
          resolve(stdoutBytes.toString('utf8'))
          return
        }

        const detail =
          stderr.trim() !== ''
            ? stderr.trim()
            : code === null
              ? `${clangPath} terminated by signal ${signal ?? 'unknown'}`
              : `${clangPath} exited with code ${code}`
        reject(new ToolInvocationError(`clang failed: ${detail}`, { exitCode: code, stderr }))
      })
    })
  })
}

export function createClangRunner(settings: RunClangSettings): ClangRunner {
  return (args) => runClang(args, settings)
}
