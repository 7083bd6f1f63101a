import { z } from 'zod'
import { InvalidOptionsError } from './errors'

// ---------------------------------------------------------------------------
// Parser options
// ---------------------------------------------------------------------------

const HeaderParserOptionsSchema = z.object({
  headerFile: z.string().min(1, 'headerFile is required'),
  includePaths: z.array(z.string().min(1)).default([]),
  // Preprocessor definitions without the -D, e.g. "STM32L552xx" or "DEBUG=1"
  defines: z.array(z.string().min(1)).default([]),
  verbose: z.boolean().default(false),
  // The macro pass can be slow on large vendor headers.
  includeMacros: z.boolean().default(true),
  // Empty means every non-reserved macro.
  macroPrefixes: z.array(z.string().min(1)).default([]),
  clangPath: z.string().min(1).optional(),
  language: z.enum(['c', 'c++']).optional(),
  extraArgs: z.array(z.string()).default([]),
  groupNamespaces: z.boolean().default(false),
})

export type HeaderParserInput = z.input<typeof HeaderParserOptionsSchema>

export type HeaderParserOptions = Omit<z.output<typeof HeaderParserOptionsSchema>, 'clangPath'> & {
  clangPath: string
}

export type SourceLanguage = NonNullable<HeaderParserOptions['language']>

export const DEFAULT_CLANG = 'clang'

export function resolveOptions(
  input: HeaderParserInput,
  env: NodeJS.ProcessEnv = process.env,
): HeaderParserOptions {
  const parsed = HeaderParserOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return {
    ...parsed.data,
    clangPath: parsed.data.clangPath ?? (env.CLANG_PATH || DEFAULT_CLANG),
  }
}

export function defaultOptions(headerFile: string): HeaderParserOptions {
  return resolveOptions({ headerFile })
}
