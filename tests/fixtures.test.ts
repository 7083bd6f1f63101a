import { readdirSync, readFileSync } from 'fs'
import { join } from 'path'
import { decodeAstDump } from '../src/clang/dump'
import { createFileMatcher } from '../src/clang/provenance'
import { extractDeclarations } from '../src/extract/walk'

const root = join(__dirname, '..')
const astDir = join(root, 'fixtures', 'ast')
const fixtureFiles = readdirSync(astDir).filter((f) => f.endsWith('.json'))

// Header each dump was taken from
const headers: Record<string, string> = {
  'basic-struct.json': 'device.h',
  'include-filter.json': 'device.h',
  'typedef-anonymous.json': 'point.h',
  'irq.json': 'irq.h',
  'cpp-namespace.json': 'driver.hpp',
}

describe('fixtures', () => {
  it('has a header for every dump', () => {
    expect(fixtureFiles.slice().sort()).toEqual(Object.keys(headers).sort())
  })

  for (const file of fixtureFiles) {
    describe(file, () => {
      const text = readFileSync(join(astDir, file), 'utf8')
      const matcher = createFileMatcher(join(root, 'fixtures', 'headers', headers[file] ?? file), root)

      it('decodes without throwing', () => {
        expect(() => decodeAstDump(text)).not.toThrow()
      })

      it('produces a TranslationUnitDecl', () => {
        const tree = decodeAstDump(text)
        expect(tree.kind).toBe('TranslationUnitDecl')
        expect(tree.inner).toBeInstanceOf(Array)
      })

      it('extracts declarations of a known type', () => {
        const decls = extractDeclarations(decodeAstDump(text), { matcher })
        expect(decls.length).toBeGreaterThan(0)
        for (const decl of decls) {
          expect(['Function', 'Struct', 'Enum', 'Typedef', 'Namespace', 'Class']).toContain(decl.type)
        }
      })

      it('never reports builtin typedefs', () => {
        const names = extractDeclarations(decodeAstDump(text), { matcher }).map((d) => d.name)
        expect(names).not.toContain('__int128_t')
        expect(names).not.toContain('__builtin_va_list')
      })
    })
  }
})
