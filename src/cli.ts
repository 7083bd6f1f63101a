#!/usr/bin/env node
import { serializeDeclarations } from './adapter/json'
import { parseCliArgs, USAGE } from './cli/args'
import { createLogger } from './logger'
import { parseHeader } from './pipeline'

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv)

  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`)
    return 0
  }
  if (command.kind === 'error') {
    process.stderr.write(`c-header-decls: ${command.message}\n\n${USAGE}\n`)
    return 2
  }

  const logger = createLogger({ verbose: command.input.verbose })
  try {
    const declarations = await parseHeader(command.input, { logger })
    process.stdout.write(`${serializeDeclarations(declarations, command.compact ? 0 : 2)}\n`)
    return 0
  } catch (err) {
    logger.error({ err }, err instanceof Error ? err.message : String(err))
    return 1
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`)
    process.exitCode = 1
  },
)
