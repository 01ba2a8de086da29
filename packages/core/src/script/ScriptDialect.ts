// =============================================================================
// Traversal Translator - Script Dialect
// =============================================================================

import type { InstructionSection } from '../bytecode/Bytecode'
import type { EnumValue } from '../values/EnumValue'
import type { PredicateType } from '../values/P'

export type RenderedEntry = readonly [key: string, value: string]

/**
 * Formatting rules for one scripting language.
 *
 * The translator owns the walk and all recursion; a dialect only formats
 * values and fragments that are already rendered. Nothing here may hold state.
 */
export interface ScriptDialect {
  readonly targetLanguage: string
  /** Receiver for anonymous traversals, e.g. `__` */
  readonly anonymousSource: string

  methodName(operator: string, section: InstructionSection): string
  call(receiver: string, method: string, args: readonly string[]): string
  /** A nested traversal with no steps */
  emptyAnonymous(): string

  nullValue(): string
  string(value: string): string
  number(value: number): string
  bigint(value: bigint): string
  boolean(value: boolean): string
  date(value: Date): string
  enumValue(value: EnumValue): string
  /** For `and` / `or` the operands are the two rendered predicates */
  predicate(typeName: PredicateType, operator: string, operands: readonly string[]): string
  binding(key: string): string
  strategy(name: string, configuration: readonly RenderedEntry[]): string

  list(items: readonly string[]): string
  set(items: readonly string[]): string
  /** Keys and values both rendered */
  map(entries: readonly RenderedEntry[]): string
  /** Keys are raw property names, values rendered */
  record(entries: readonly RenderedEntry[]): string
}
