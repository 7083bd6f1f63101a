import { DEFAULT_CLANG, defaultOptions, resolveOptions } from '../src/config'
import { InvalidOptionsError } from '../src/errors'

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    expect(resolveOptions({ headerFile: 'device.h' }, {})).toEqual({
      headerFile: 'device.h',
      includePaths: [],
      defines: [],
      verbose: false,
      includeMacros: true,
      macroPrefixes: [],
      extraArgs: [],
      groupNamespaces: false,
      clangPath: 'clang',
    })
  })

  it('keeps what the caller set', () => {
    const options = resolveOptions(
      {
        headerFile: 'device.h',
        includePaths: ['inc'],
        defines: ['STM32L552xx'],
        includeMacros: false,
        language: 'c++',
        groupNamespaces: true,
      },
      {},
    )
    expect(options).toMatchObject({
      includePaths: ['inc'],
      defines: ['STM32L552xx'],
      includeMacros: false,
      language: 'c++',
      groupNamespaces: true,
    })
  })

  it('reads the clang binary from CLANG_PATH', () => {
    expect(resolveOptions({ headerFile: 'device.h' }, { CLANG_PATH: '/opt/llvm/bin/clang' }).clangPath).toBe(
      '/opt/llvm/bin/clang',
    )
  })

  it('ignores an empty CLANG_PATH', () => {
    expect(resolveOptions({ headerFile: 'device.h' }, { CLANG_PATH: '' }).clangPath).toBe(DEFAULT_CLANG)
  })

  it('prefers an explicit clang path over the environment', () => {
    const options = resolveOptions({ headerFile: 'device.h', clangPath: 'clang-17' }, { CLANG_PATH: 'clang-15' })
    expect(options.clangPath).toBe('clang-17')
  })

  it('rejects a missing header file', () => {
    expect(() => resolveOptions({ headerFile: '' }, {})).toThrow(
      'Invalid parser options: headerFile: headerFile is required',
    )
  })

  it('lists every invalid entry', () => {
    try {
      resolveOptions({ headerFile: '', defines: ['DEBUG', ''] }, {})
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOptionsError)
      if (!(err instanceof InvalidOptionsError)) return
      expect(err.code).toBe('INVALID_OPTIONS')
      expect(err.issues).toHaveLength(2)
      expect(err.issues[0]).toBe('headerFile: headerFile is required')
      expect(err.issues[1]).toMatch(/^defines\.1: /)
    }
  })
})

describe('defaultOptions', () => {
  it('turns macros on and leaves the rest empty', () => {
    expect(defaultOptions('device.h')).toMatchObject({
      headerFile: 'device.h',
      includePaths: [],
      defines: [],
      verbose: false,
      includeMacros: true,
    })
  })
})
