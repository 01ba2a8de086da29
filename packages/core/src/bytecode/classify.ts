// =============================================================================
// Traversal Translator - Argument Classification
// Every translator dispatches on this variant, never on raw runtime checks
// =============================================================================

import { isBytecode, type BytecodeLike } from './Bytecode'
import { EnumValue } from '../values/EnumValue'
import { P } from '../values/P'
import { Binding } from '../values/Binding'
import { TraversalStrategy } from '../values/TraversalStrategy'

export type ArgumentNode =
  | { readonly kind: 'missing' }
  | { readonly kind: 'null' }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'bigint'; readonly value: bigint }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'enum'; readonly value: EnumValue }
  | { readonly kind: 'predicate'; readonly value: P }
  | { readonly kind: 'binding'; readonly value: Binding }
  | { readonly kind: 'strategy'; readonly value: TraversalStrategy }
  | { readonly kind: 'bytecode'; readonly value: BytecodeLike }
  | { readonly kind: 'list'; readonly items: readonly unknown[] }
  | { readonly kind: 'set'; readonly items: readonly unknown[] }
  | { readonly kind: 'map'; readonly entries: readonly (readonly [unknown, unknown])[] }
  | { readonly kind: 'record'; readonly entries: readonly (readonly [string, unknown])[] }
  | { readonly kind: 'opaque'; readonly value: unknown; readonly typeName: string }

export type ArgumentKind = ArgumentNode['kind']

/**
 * Classify an instruction argument.
 *
 * Arrays are lists, `Set` and `Map` keep their kind, plain objects are records.
 * Objects exposing `getBytecode()` (recorded traversals) classify as their bytecode.
 * `undefined` is `missing`: an instruction never legitimately carries it.
 */
export function classifyArgument(value: unknown): ArgumentNode {
  if (value === undefined) return { kind: 'missing' }
  if (value === null) return { kind: 'null' }

  switch (typeof value) {
    case 'string':
      return { kind: 'string', value }
    case 'number':
      return { kind: 'number', value }
    case 'bigint':
      return { kind: 'bigint', value }
    case 'boolean':
      return { kind: 'boolean', value }
    case 'function':
    case 'symbol':
      return { kind: 'opaque', value, typeName: typeof value }
  }

  if (typeof value !== 'object') {
    return { kind: 'opaque', value, typeName: typeof value }
  }

  if (value instanceof Date) return { kind: 'date', value }
  if (value instanceof EnumValue) return { kind: 'enum', value }
  if (value instanceof P) return { kind: 'predicate', value }
  if (value instanceof Binding) return { kind: 'binding', value }
  if (value instanceof TraversalStrategy) return { kind: 'strategy', value }
  if (isBytecode(value)) return { kind: 'bytecode', value }
  if (Array.isArray(value)) return { kind: 'list', items: value }
  if (value instanceof Set) return { kind: 'set', items: [...value] }
  if (value instanceof Map) return { kind: 'map', entries: [...value.entries()] }

  const recorded = recordedBytecode(value)
  if (recorded) return { kind: 'bytecode', value: recorded }

  if (isPlainObject(value)) return { kind: 'record', entries: Object.entries(value) }

  return { kind: 'opaque', value, typeName: typeNameOf(value) }
}

// --- Internal Functions ---

function recordedBytecode(value: object): BytecodeLike | undefined {
  if (!('getBytecode' in value) || typeof value.getBytecode !== 'function') return undefined
  // Instructions are checked by the walker, not here
  const bytecode: unknown = value.getBytecode()
  return isBytecode(bytecode) ? bytecode : undefined
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function typeNameOf(value: object): string {
  const ctor: unknown = value.constructor
  if (typeof ctor === 'function' && ctor.name !== '') return ctor.name
  return 'Object'
}
