import { parseCliArgs, USAGE } from '../src/cli/args'

describe('parseCliArgs', () => {
  it('shows help', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['device.h', '-h'])).toEqual({ kind: 'help' })
  })

  it('parses a bare header', () => {
    expect(parseCliArgs(['device.h'])).toEqual({
      kind: 'parse',
      compact: false,
      input: {
        headerFile: 'device.h',
        includePaths: [],
        defines: [],
        macroPrefixes: [],
        includeMacros: true,
        groupNamespaces: false,
        verbose: false,
        clangPath: undefined,
        language: undefined,
      },
    })
  })

  it('parses every option', () => {
    const command = parseCliArgs([
      'stm32l552xx.h',
      '-I',
      'inc',
      '-Icmsis/Include',
      '--define',
      'STM32L552xx',
      '-D',
      'USE_HAL=1',
      '--macro-prefix',
      'GPIO',
      '--no-macros',
      '--group-namespaces',
      '--lang',
      'c++',
      '--clang',
      '/opt/llvm/bin/clang',
      '--compact',
      '-v',
    ])
    expect(command).toEqual({
      kind: 'parse',
      compact: true,
      input: {
        headerFile: 'stm32l552xx.h',
        includePaths: ['inc', 'cmsis/Include'],
        defines: ['STM32L552xx', 'USE_HAL=1'],
        macroPrefixes: ['GPIO'],
        includeMacros: false,
        groupNamespaces: true,
        verbose: true,
        clangPath: '/opt/llvm/bin/clang',
        language: 'c++',
      },
    })
  })

  it('requires exactly one header', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'error', message: 'missing header file' })
    expect(parseCliArgs(['a.h', 'b.h'])).toEqual({ kind: 'error', message: 'expected one header file, got 2' })
  })

  it('rejects an unknown language', () => {
    expect(parseCliArgs(['a.h', '--lang', 'rust'])).toEqual({ kind: 'error', message: 'unknown language: rust' })
  })

  it('rejects an unknown option', () => {
    expect(parseCliArgs(['a.h', '--bogus']).kind).toBe('error')
  })

  it('documents every option in the usage text', () => {
    for (const flag of ['--include', '--define', '--macro-prefix', '--no-macros', '--group-namespaces', '--lang', '--clang', '--compact', '--verbose', '--help']) {
      expect(USAGE).toContain(flag)
    }
  })
})
