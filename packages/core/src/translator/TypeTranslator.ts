// =============================================================================
// Traversal Translator - Type Translation Hook
// =============================================================================

/**
 * A completed translation of one argument. The text is used verbatim and the
 * original value is not rendered any further.
 */
export class Handled {
  readonly kind = 'handled'

  constructor(private readonly translation: string) {
    Object.freeze(this)
  }

  getTranslation(): string {
    return this.translation
  }
}

/** Render the value the normal way */
export interface Continue {
  readonly kind: 'continue'
}

/** Render `value` the normal way in place of the original */
export interface Substitute {
  readonly kind: 'substitute'
  readonly value: unknown
}

export type TypeTranslation = Continue | Substitute | Handled

/**
 * Customizes how argument values are rendered by a script translator.
 * Called for every argument, including collection elements and predicate operands.
 * Must be pure: the same value must always get the same answer.
 */
export type TypeTranslator = (value: unknown) => TypeTranslation

const CONTINUE: Continue = { kind: 'continue' }

export const TypeTranslation = {
  continue: (): Continue => CONTINUE,
  substitute: (value: unknown): Substitute => ({ kind: 'substitute', value }),
  handled: (translation: string): Handled => new Handled(translation)
}

export const TypeTranslator = {
  /** Leaves every value to the dialect's own rendering */
  identity(): TypeTranslator {
    return () => CONTINUE
  },

  /**
   * Adapt a plain value-to-value function. A `Handled` result short-circuits,
   * returning the input unchanged continues, anything else is a substitution.
   */
  fromUnaryOperator(operator: (value: unknown) => unknown): TypeTranslator {
    return value => {
      const result = operator(value)
      if (result instanceof Handled) return result
      if (Object.is(result, value)) return CONTINUE
      return { kind: 'substitute', value: result }
    }
  },

  /**
   * Run translators left to right. A substitution is what the next translator
   * sees; the first `Handled` ends the chain.
   */
  compose(...translators: TypeTranslator[]): TypeTranslator {
    return value => {
      let current: TypeTranslation = CONTINUE
      let subject = value
      for (const translator of translators) {
        const next = translator(subject)
        if (next.kind === 'handled') return next
        if (next.kind === 'substitute') {
          current = next
          subject = next.value
        }
      }
      return current
    }
  }
}
