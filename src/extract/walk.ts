import type { Declaration } from '../ast/nodes'
import type { ClangNode } from '../clang/dump'
import { childrenOf } from '../clang/dump'
import type { FileMatcher, Origin } from '../clang/provenance'
import { isLocalOrigin, trackLocation } from '../clang/provenance'
import type { Logger } from '../logger'
import { silentLogger } from '../logger'
import type { DeclarationBuilder } from './declarations'
import { BUILDERS, isDeclarationNodeKind } from './declarations'

export interface ExtractOptions {
  matcher: FileMatcher
  groupNamespaces?: boolean
  logger?: Logger
}

interface WalkContext {
  matcher: FileMatcher
  groupNamespaces: boolean
  logger: Logger
}

// A node whose children are still being visited.
interface Frame {
  node: ClangNode
  origin: Origin | null
  children: ClangNode[]
  next: number
  members: Declaration[]
}

// What a finished node contributes to its parent, given what its children produced.
function finishNode(frame: Frame, context: WalkContext): Declaration[] {
  const { node, members } = frame
  const local = node.isImplicit !== true && isLocalOrigin(frame.origin, context.matcher)
  if (!local || !isDeclarationNodeKind(node.kind)) return members

  context.logger.debug(
    { kind: node.kind, name: node.name ?? '<anonymous>', file: frame.origin?.file },
    'processing declaration',
  )

  const builder: DeclarationBuilder = BUILDERS[node.kind]
  const own = builder(node, members, { groupNamespaces: context.groupNamespaces })
  if (own === null) return members
  if (own.type === 'Namespace') return [own]
  return [own, ...members]
}

/**
 * Walk a decoded AST dump in document order and build the declarations whose
 * provenance is the target header.
 */
export function extractDeclarations(root: ClangNode, options: ExtractOptions): Declaration[] {
  const context: WalkContext = {
    matcher: options.matcher,
    groupNamespaces: options.groupNamespaces ?? false,
    logger: options.logger ?? silentLogger,
  }

  // Every location clang prints, in document order, moves the current file.
  // An explicit stack: expression chains nest far deeper than the call stack allows.
  let currentFile: string | null = null
  const enter = (node: ClangNode): Frame => {
    const tracked = trackLocation(node, currentFile)
    currentFile = tracked.currentFile
    return { node, origin: tracked.origin, children: childrenOf(node), next: 0, members: [] }
  }

  const result: Declaration[] = []
  const stack: Frame[] = [enter(root)]
  for (let frame = stack.at(-1); frame !== undefined; frame = stack.at(-1)) {
    if (frame.next < frame.children.length) {
      stack.push(enter(frame.children[frame.next]))
      frame.next += 1
      continue
    }
    stack.pop()
    const target = stack.at(-1)?.members ?? result
    for (const declaration of finishNode(frame, context)) target.push(declaration)
  }
  return result
}
