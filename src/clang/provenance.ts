import { realpathSync } from 'node:fs'
import { basename, resolve } from 'node:path'
import type { BareLocation, ClangLocation, ClangNode } from './dump'

// ---------------------------------------------------------------------------
// File provenance
//
// clang prints `file` on a location only when it changed since the previously
// printed location, in document order across the whole dump. The file of an
// unstamped location is therefore whatever the last stamp said, so the walk
// has to thread the current file through every node it visits.
// ---------------------------------------------------------------------------

export interface Origin {
  // File of the node's own location, null if no stamp has been seen yet
  file: string | null
  // Set when the location was reached through an #include
  includedFrom: string | null
}

export interface TrackedLocation {
  currentFile: string | null
  // null when the node has no `loc` at all
  origin: Origin | null
}

export type FileMatcher = (file: string) => boolean

function stamp(location: BareLocation | undefined, currentFile: string | null): string | null {
  return location?.file ?? currentFile
}

// Locations inside `loc`, in the order clang writes them.
function readLocation(loc: ClangLocation, currentFile: string | null): string | null {
  let file = stamp(loc, currentFile)
  file = stamp(loc.spellingLoc, file)
  file = stamp(loc.expansionLoc, file)
  file = stamp(loc.begin, file)
  return file
}

// Macro-expanded declarations live where they were expanded.
function effectiveLocation(loc: ClangLocation): BareLocation {
  return loc.expansionLoc ?? loc.begin ?? loc
}

export function trackLocation(node: ClangNode, currentFile: string | null): TrackedLocation {
  let file = currentFile
  let origin: Origin | null = null

  if (node.loc !== undefined) {
    file = readLocation(node.loc, file)
    const effective = effectiveLocation(node.loc)
    origin = {
      file,
      includedFrom: effective.includedFrom !== undefined ? effective.includedFrom.file ?? '' : null,
    }
  }

  if (node.range !== undefined) {
    if (node.range.begin !== undefined) file = readLocation(node.range.begin, file)
    if (node.range.end !== undefined) file = readLocation(node.range.end, file)
  }

  return { currentFile: file, origin }
}

export function isLocalOrigin(origin: Origin | null, matcher: FileMatcher): boolean {
  if (origin === null || origin.includedFrom !== null) return false
  return origin.file !== null && matcher(origin.file)
}

function nameMatches(file: string, name: string): boolean {
  return file === name || file.endsWith(`/${name}`) || file.endsWith(`\\${name}`)
}

/**
 * Decide whether a file reported by clang is the target header.
 *
 * Real paths are compared when both files exist on disk. Otherwise only the
 * base name is compared, which cannot tell apart two headers with the same
 * name in different include directories.
 */
export function createFileMatcher(target: string, baseDir: string = process.cwd()): FileMatcher {
  const name = basename(target)
  const realpaths = new Map<string, string | null>()

  const canonical = (file: string): string | null => {
    const cached = realpaths.get(file)
    if (cached !== undefined) return cached
    let real: string | null
    try {
      real = realpathSync(resolve(baseDir, file))
    } catch {
      real = null
    }
    realpaths.set(file, real)
    return real
  }

  const canonicalTarget = canonical(target)

  return (file) => {
    if (canonicalTarget !== null) {
      const real = canonical(file)
      if (real !== null) return real === canonicalTarget
    }
    return nameMatches(file, name)
  }
}
