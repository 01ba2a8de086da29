import { GraphTraversal } from './GraphTraversal'

const start = (): GraphTraversal => new GraphTraversal()

/**
 * Spawns anonymous traversals for use as step arguments:
 * `g.V().where(__.out('knows'))`.
 */
export const __ = {
  start,
  V: (...ids: unknown[]): GraphTraversal => start().V(...ids),
  E: (...ids: unknown[]): GraphTraversal => start().E(...ids),
  addE: (label: string | GraphTraversal): GraphTraversal => start().addE(label),
  addV: (...label: (string | GraphTraversal)[]): GraphTraversal => start().addV(...label),
  aggregate: (...args: unknown[]): GraphTraversal => start().aggregate(...args),
  and: (...traversals: GraphTraversal[]): GraphTraversal => start().and(...traversals),
  as: (label: string, ...labels: string[]): GraphTraversal => start().as(label, ...labels),
  both: (...edgeLabels: string[]): GraphTraversal => start().both(...edgeLabels),
  bothE: (...edgeLabels: string[]): GraphTraversal => start().bothE(...edgeLabels),
  bothV: (): GraphTraversal => start().bothV(),
  choose: (...args: unknown[]): GraphTraversal => start().choose(...args),
  coalesce: (...traversals: GraphTraversal[]): GraphTraversal => start().coalesce(...traversals),
  constant: (value: unknown): GraphTraversal => start().constant(value),
  count: (...args: unknown[]): GraphTraversal => start().count(...args),
  dedup: (...args: unknown[]): GraphTraversal => start().dedup(...args),
  drop: (): GraphTraversal => start().drop(),
  elementMap: (...keys: string[]): GraphTraversal => start().elementMap(...keys),
  emit: (...args: unknown[]): GraphTraversal => start().emit(...args),
  filter: (predicate: unknown): GraphTraversal => start().filter(predicate),
  fold: (...args: unknown[]): GraphTraversal => start().fold(...args),
  group: (...args: unknown[]): GraphTraversal => start().group(...args),
  groupCount: (...args: unknown[]): GraphTraversal => start().groupCount(...args),
  has: (...args: unknown[]): GraphTraversal => start().has(...args),
  hasId: (id: unknown, ...ids: unknown[]): GraphTraversal => start().hasId(id, ...ids),
  hasLabel: (label: unknown, ...labels: unknown[]): GraphTraversal => start().hasLabel(label, ...labels),
  hasNot: (key: string): GraphTraversal => start().hasNot(key),
  id: (): GraphTraversal => start().id(),
  identity: (): GraphTraversal => start().identity(),
  in: (...edgeLabels: string[]): GraphTraversal => start().in(...edgeLabels),
  inE: (...edgeLabels: string[]): GraphTraversal => start().inE(...edgeLabels),
  inV: (): GraphTraversal => start().inV(),
  is: (value: unknown): GraphTraversal => start().is(value),
  label: (): GraphTraversal => start().label(),
  limit: (...args: unknown[]): GraphTraversal => start().limit(...args),
  local: (traversal: GraphTraversal): GraphTraversal => start().local(traversal),
  loops: (...args: unknown[]): GraphTraversal => start().loops(...args),
  map: (traversal: GraphTraversal): GraphTraversal => start().map(traversal),
  max: (...args: unknown[]): GraphTraversal => start().max(...args),
  mean: (...args: unknown[]): GraphTraversal => start().mean(...args),
  min: (...args: unknown[]): GraphTraversal => start().min(...args),
  not: (traversal: GraphTraversal): GraphTraversal => start().not(traversal),
  optional: (traversal: GraphTraversal): GraphTraversal => start().optional(traversal),
  or: (...traversals: GraphTraversal[]): GraphTraversal => start().or(...traversals),
  order: (...args: unknown[]): GraphTraversal => start().order(...args),
  otherV: (): GraphTraversal => start().otherV(),
  out: (...edgeLabels: string[]): GraphTraversal => start().out(...edgeLabels),
  outE: (...edgeLabels: string[]): GraphTraversal => start().outE(...edgeLabels),
  outV: (): GraphTraversal => start().outV(),
  path: (): GraphTraversal => start().path(),
  project: (key: string, ...keys: string[]): GraphTraversal => start().project(key, ...keys),
  properties: (...keys: string[]): GraphTraversal => start().properties(...keys),
  property: (...args: unknown[]): GraphTraversal => start().property(...args),
  range: (...args: unknown[]): GraphTraversal => start().range(...args),
  repeat: (...args: unknown[]): GraphTraversal => start().repeat(...args),
  select: (...args: unknown[]): GraphTraversal => start().select(...args),
  sideEffect: (traversal: GraphTraversal): GraphTraversal => start().sideEffect(traversal),
  simplePath: (): GraphTraversal => start().simplePath(),
  sum: (...args: unknown[]): GraphTraversal => start().sum(...args),
  tail: (...args: unknown[]): GraphTraversal => start().tail(...args),
  times: (count: number): GraphTraversal => start().times(count),
  unfold: (): GraphTraversal => start().unfold(),
  union: (...traversals: GraphTraversal[]): GraphTraversal => start().union(...traversals),
  until: (condition: unknown): GraphTraversal => start().until(condition),
  value: (): GraphTraversal => start().value(),
  valueMap: (...args: unknown[]): GraphTraversal => start().valueMap(...args),
  values: (...keys: string[]): GraphTraversal => start().values(...keys),
  where: (...args: unknown[]): GraphTraversal => start().where(...args)
}
