import type { Declaration } from '../ast/nodes'

// Enum values are bigint. JSON has no bigint, so values that fit a double go
// out as numbers and the rest as decimal strings.
function replacer(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') return value
  const asNumber = Number(value)
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString()
}

export function serializeDeclarations(declarations: Declaration[], indent: number = 2): string {
  return JSON.stringify(declarations, replacer, indent === 0 ? undefined : indent)
}
