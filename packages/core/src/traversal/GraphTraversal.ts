// =============================================================================
// Traversal Translator - Recording Traversal
// =============================================================================

import { Bytecode } from '../bytecode/Bytecode'

/**
 * A traversal that records its steps as bytecode.
 *
 * Persistent: every step returns a new traversal and leaves the receiver as it
 * was, so a prefix can be reused to build several traversals.
 */
export class GraphTraversal {
  constructor(readonly bytecode: Bytecode = new Bytecode()) {}

  getBytecode(): Bytecode {
    return this.bytecode
  }

  /**
   * Record any step by name. Nested traversals are recorded as their bytecode.
   */
  step(operator: string, ...args: unknown[]): GraphTraversal {
    return new GraphTraversal(this.bytecode.addStep(operator, ...args.map(toArgument)))
  }

  toString(): string {
    return this.bytecode.toString()
  }

  // --- Steps ---

  V(...ids: unknown[]): GraphTraversal {
    return this.step('V', ...ids)
  }

  E(...ids: unknown[]): GraphTraversal {
    return this.step('E', ...ids)
  }

  addE(label: string | GraphTraversal): GraphTraversal {
    return this.step('addE', label)
  }

  addV(...label: (string | GraphTraversal)[]): GraphTraversal {
    return this.step('addV', ...label)
  }

  aggregate(...args: unknown[]): GraphTraversal {
    return this.step('aggregate', ...args)
  }

  and(...traversals: GraphTraversal[]): GraphTraversal {
    return this.step('and', ...traversals)
  }

  as(label: string, ...labels: string[]): GraphTraversal {
    return this.step('as', label, ...labels)
  }

  barrier(...args: unknown[]): GraphTraversal {
    return this.step('barrier', ...args)
  }

  both(...edgeLabels: string[]): GraphTraversal {
    return this.step('both', ...edgeLabels)
  }

  bothE(...edgeLabels: string[]): GraphTraversal {
    return this.step('bothE', ...edgeLabels)
  }

  bothV(): GraphTraversal {
    return this.step('bothV')
  }

  branch(traversal: GraphTraversal): GraphTraversal {
    return this.step('branch', traversal)
  }

  by(...args: unknown[]): GraphTraversal {
    return this.step('by', ...args)
  }

  cap(key: string, ...keys: string[]): GraphTraversal {
    return this.step('cap', key, ...keys)
  }

  choose(...args: unknown[]): GraphTraversal {
    return this.step('choose', ...args)
  }

  coalesce(...traversals: GraphTraversal[]): GraphTraversal {
    return this.step('coalesce', ...traversals)
  }

  coin(probability: number): GraphTraversal {
    return this.step('coin', probability)
  }

  constant(value: unknown): GraphTraversal {
    return this.step('constant', value)
  }

  count(...args: unknown[]): GraphTraversal {
    return this.step('count', ...args)
  }

  cyclicPath(): GraphTraversal {
    return this.step('cyclicPath')
  }

  dedup(...args: unknown[]): GraphTraversal {
    return this.step('dedup', ...args)
  }

  drop(): GraphTraversal {
    return this.step('drop')
  }

  elementMap(...keys: string[]): GraphTraversal {
    return this.step('elementMap', ...keys)
  }

  emit(...args: unknown[]): GraphTraversal {
    return this.step('emit', ...args)
  }

  filter(predicate: unknown): GraphTraversal {
    return this.step('filter', predicate)
  }

  flatMap(traversal: GraphTraversal): GraphTraversal {
    return this.step('flatMap', traversal)
  }

  fold(...args: unknown[]): GraphTraversal {
    return this.step('fold', ...args)
  }

  from(from: unknown): GraphTraversal {
    return this.step('from', from)
  }

  group(...args: unknown[]): GraphTraversal {
    return this.step('group', ...args)
  }

  groupCount(...args: unknown[]): GraphTraversal {
    return this.step('groupCount', ...args)
  }

  has(...args: unknown[]): GraphTraversal {
    return this.step('has', ...args)
  }

  hasId(id: unknown, ...ids: unknown[]): GraphTraversal {
    return this.step('hasId', id, ...ids)
  }

  hasKey(key: unknown, ...keys: unknown[]): GraphTraversal {
    return this.step('hasKey', key, ...keys)
  }

  hasLabel(label: unknown, ...labels: unknown[]): GraphTraversal {
    return this.step('hasLabel', label, ...labels)
  }

  hasNot(key: string): GraphTraversal {
    return this.step('hasNot', key)
  }

  hasValue(value: unknown, ...values: unknown[]): GraphTraversal {
    return this.step('hasValue', value, ...values)
  }

  id(): GraphTraversal {
    return this.step('id')
  }

  identity(): GraphTraversal {
    return this.step('identity')
  }

  in(...edgeLabels: string[]): GraphTraversal {
    return this.step('in', ...edgeLabels)
  }

  inE(...edgeLabels: string[]): GraphTraversal {
    return this.step('inE', ...edgeLabels)
  }

  inV(): GraphTraversal {
    return this.step('inV')
  }

  inject(...values: unknown[]): GraphTraversal {
    return this.step('inject', ...values)
  }

  is(value: unknown): GraphTraversal {
    return this.step('is', value)
  }

  key(): GraphTraversal {
    return this.step('key')
  }

  label(): GraphTraversal {
    return this.step('label')
  }

  limit(...args: unknown[]): GraphTraversal {
    return this.step('limit', ...args)
  }

  local(traversal: GraphTraversal): GraphTraversal {
    return this.step('local', traversal)
  }

  loops(...args: unknown[]): GraphTraversal {
    return this.step('loops', ...args)
  }

  map(traversal: GraphTraversal): GraphTraversal {
    return this.step('map', traversal)
  }

  math(expression: string): GraphTraversal {
    return this.step('math', expression)
  }

  max(...args: unknown[]): GraphTraversal {
    return this.step('max', ...args)
  }

  mean(...args: unknown[]): GraphTraversal {
    return this.step('mean', ...args)
  }

  mergeE(...args: unknown[]): GraphTraversal {
    return this.step('mergeE', ...args)
  }

  mergeV(...args: unknown[]): GraphTraversal {
    return this.step('mergeV', ...args)
  }

  min(...args: unknown[]): GraphTraversal {
    return this.step('min', ...args)
  }

  not(traversal: GraphTraversal): GraphTraversal {
    return this.step('not', traversal)
  }

  option(...args: unknown[]): GraphTraversal {
    return this.step('option', ...args)
  }

  optional(traversal: GraphTraversal): GraphTraversal {
    return this.step('optional', traversal)
  }

  or(...traversals: GraphTraversal[]): GraphTraversal {
    return this.step('or', ...traversals)
  }

  order(...args: unknown[]): GraphTraversal {
    return this.step('order', ...args)
  }

  otherV(): GraphTraversal {
    return this.step('otherV')
  }

  out(...edgeLabels: string[]): GraphTraversal {
    return this.step('out', ...edgeLabels)
  }

  outE(...edgeLabels: string[]): GraphTraversal {
    return this.step('outE', ...edgeLabels)
  }

  outV(): GraphTraversal {
    return this.step('outV')
  }

  path(): GraphTraversal {
    return this.step('path')
  }

  project(key: string, ...keys: string[]): GraphTraversal {
    return this.step('project', key, ...keys)
  }

  properties(...keys: string[]): GraphTraversal {
    return this.step('properties', ...keys)
  }

  property(...args: unknown[]): GraphTraversal {
    return this.step('property', ...args)
  }

  range(...args: unknown[]): GraphTraversal {
    return this.step('range', ...args)
  }

  repeat(...args: unknown[]): GraphTraversal {
    return this.step('repeat', ...args)
  }

  sack(...args: unknown[]): GraphTraversal {
    return this.step('sack', ...args)
  }

  sample(...args: unknown[]): GraphTraversal {
    return this.step('sample', ...args)
  }

  select(...args: unknown[]): GraphTraversal {
    return this.step('select', ...args)
  }

  sideEffect(traversal: GraphTraversal): GraphTraversal {
    return this.step('sideEffect', traversal)
  }

  simplePath(): GraphTraversal {
    return this.step('simplePath')
  }

  skip(...args: unknown[]): GraphTraversal {
    return this.step('skip', ...args)
  }

  store(key: string): GraphTraversal {
    return this.step('store', key)
  }

  sum(...args: unknown[]): GraphTraversal {
    return this.step('sum', ...args)
  }

  tail(...args: unknown[]): GraphTraversal {
    return this.step('tail', ...args)
  }

  timeLimit(millis: number): GraphTraversal {
    return this.step('timeLimit', millis)
  }

  times(count: number): GraphTraversal {
    return this.step('times', count)
  }

  to(to: unknown): GraphTraversal {
    return this.step('to', to)
  }

  tree(...args: unknown[]): GraphTraversal {
    return this.step('tree', ...args)
  }

  unfold(): GraphTraversal {
    return this.step('unfold')
  }

  union(...traversals: GraphTraversal[]): GraphTraversal {
    return this.step('union', ...traversals)
  }

  until(condition: unknown): GraphTraversal {
    return this.step('until', condition)
  }

  value(): GraphTraversal {
    return this.step('value')
  }

  valueMap(...args: unknown[]): GraphTraversal {
    return this.step('valueMap', ...args)
  }

  values(...keys: string[]): GraphTraversal {
    return this.step('values', ...keys)
  }

  where(...args: unknown[]): GraphTraversal {
    return this.step('where', ...args)
  }

  with(key: string, ...value: unknown[]): GraphTraversal {
    return this.step('with', key, ...value)
  }
}

/** Traversal arguments are recorded as their bytecode */
export function toArgument(value: unknown): unknown {
  return value instanceof GraphTraversal ? value.getBytecode() : value
}
