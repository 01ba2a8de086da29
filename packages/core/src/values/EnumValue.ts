// =============================================================================
// Traversal Translator - Symbolic Tokens
// =============================================================================

/**
 * A symbolic constant such as `T.id` or `Order.desc`.
 * Dialects render it qualified by its type name.
 */
export class EnumValue {
  constructor(
    public readonly typeName: string,
    public readonly elementName: string
  ) {
    Object.freeze(this)
  }

  toString(): string {
    return this.elementName
  }
}

export const T = {
  id: new EnumValue('T', 'id'),
  key: new EnumValue('T', 'key'),
  label: new EnumValue('T', 'label'),
  value: new EnumValue('T', 'value')
} as const

export const Order = {
  asc: new EnumValue('Order', 'asc'),
  desc: new EnumValue('Order', 'desc'),
  shuffle: new EnumValue('Order', 'shuffle')
} as const

export const Scope = {
  global: new EnumValue('Scope', 'global'),
  local: new EnumValue('Scope', 'local')
} as const

export const Column = {
  keys: new EnumValue('Column', 'keys'),
  values: new EnumValue('Column', 'values')
} as const

export const Direction = {
  OUT: new EnumValue('Direction', 'OUT'),
  IN: new EnumValue('Direction', 'IN'),
  BOTH: new EnumValue('Direction', 'BOTH')
} as const

export const Cardinality = {
  single: new EnumValue('Cardinality', 'single'),
  list: new EnumValue('Cardinality', 'list'),
  set: new EnumValue('Cardinality', 'set')
} as const

export const Pop = {
  first: new EnumValue('Pop', 'first'),
  last: new EnumValue('Pop', 'last'),
  all: new EnumValue('Pop', 'all'),
  mixed: new EnumValue('Pop', 'mixed')
} as const

export const Operator = {
  sum: new EnumValue('Operator', 'sum'),
  minus: new EnumValue('Operator', 'minus'),
  mult: new EnumValue('Operator', 'mult'),
  div: new EnumValue('Operator', 'div'),
  min: new EnumValue('Operator', 'min'),
  max: new EnumValue('Operator', 'max'),
  assign: new EnumValue('Operator', 'assign'),
  and: new EnumValue('Operator', 'and'),
  or: new EnumValue('Operator', 'or'),
  addAll: new EnumValue('Operator', 'addAll')
} as const

export const Pick = {
  any: new EnumValue('Pick', 'any'),
  none: new EnumValue('Pick', 'none')
} as const

export const Barrier = {
  normSack: new EnumValue('Barrier', 'normSack')
} as const
