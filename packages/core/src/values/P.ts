// =============================================================================
// Traversal Translator - Predicates
// =============================================================================

export type PredicateType = 'P' | 'TextP'

/**
 * A comparison predicate, e.g. `P.gt(30)` or `TextP.startingWith('ma')`.
 * `and` / `or` compose two predicates; the composite keeps both as operands.
 */
export class P {
  readonly operands: readonly unknown[]

  constructor(
    public readonly typeName: PredicateType,
    public readonly operator: string,
    operands: readonly unknown[]
  ) {
    this.operands = Object.freeze([...operands])
    Object.freeze(this)
  }

  and(other: P): P {
    return new P('P', 'and', [this, other])
  }

  or(other: P): P {
    return new P('P', 'or', [this, other])
  }

  toString(): string {
    return `${this.operator}(${this.operands.map(String).join(', ')})`
  }

  static eq(value: unknown): P {
    return new P('P', 'eq', [value])
  }

  static neq(value: unknown): P {
    return new P('P', 'neq', [value])
  }

  static lt(value: unknown): P {
    return new P('P', 'lt', [value])
  }

  static lte(value: unknown): P {
    return new P('P', 'lte', [value])
  }

  static gt(value: unknown): P {
    return new P('P', 'gt', [value])
  }

  static gte(value: unknown): P {
    return new P('P', 'gte', [value])
  }

  static inside(first: unknown, second: unknown): P {
    return new P('P', 'inside', [first, second])
  }

  static outside(first: unknown, second: unknown): P {
    return new P('P', 'outside', [first, second])
  }

  static between(first: unknown, second: unknown): P {
    return new P('P', 'between', [first, second])
  }

  /** Accepts either varargs or a single array; both record one list operand */
  static within(...values: unknown[]): P {
    return new P('P', 'within', [collect(values)])
  }

  static without(...values: unknown[]): P {
    return new P('P', 'without', [collect(values)])
  }
}

export const TextP = {
  containing: (value: string): P => new P('TextP', 'containing', [value]),
  notContaining: (value: string): P => new P('TextP', 'notContaining', [value]),
  startingWith: (value: string): P => new P('TextP', 'startingWith', [value]),
  notStartingWith: (value: string): P => new P('TextP', 'notStartingWith', [value]),
  endingWith: (value: string): P => new P('TextP', 'endingWith', [value]),
  notEndingWith: (value: string): P => new P('TextP', 'notEndingWith', [value]),
  regex: (pattern: string): P => new P('TextP', 'regex', [pattern]),
  notRegex: (pattern: string): P => new P('TextP', 'notRegex', [pattern])
}

function collect(values: unknown[]): unknown[] {
  if (values.length === 1 && Array.isArray(values[0])) return [...values[0]]
  return values
}
