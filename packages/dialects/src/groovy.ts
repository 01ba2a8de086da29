// =============================================================================
// Traversal Translator - Groovy Dialect
// =============================================================================

import { quoteString, ScriptTranslator, type ScriptDialect, type ScriptTranslatorOptions } from '@traversal-translator/core'

const INT_MIN = -(2 ** 31)
const INT_MAX = 2 ** 31 - 1
const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

const join = (items: readonly string[]): string => items.join(', ')

/** Map keys other than string and number literals need parentheses */
function mapKey(key: string): string {
  return key.startsWith("'") || /^-?\d/.test(key) ? key : `(${key})`
}

export const groovy: ScriptDialect = {
  targetLanguage: 'gremlin-groovy',
  anonymousSource: '__',

  methodName: operator => operator,
  call: (receiver, method, args) => `${receiver}.${method}(${join(args)})`,
  emptyAnonymous: () => '__.start()',

  nullValue: () => 'null',
  string: value => quoteString(value, "'"),
  number: value => {
    if (Number.isNaN(value)) return 'Double.NaN'
    if (value === Infinity) return 'Double.POSITIVE_INFINITY'
    if (value === -Infinity) return 'Double.NEGATIVE_INFINITY'
    if (Object.is(value, -0)) return '-0.0d'
    if (Number.isSafeInteger(value)) {
      return value >= INT_MIN && value <= INT_MAX ? String(value) : `${value}L`
    }
    return `${value}d`
  },
  bigint: value => (value >= LONG_MIN && value <= LONG_MAX ? `${value}L` : `new BigInteger('${value}')`),
  boolean: value => String(value),
  date: value => `new Date(${value.getTime()}L)`,
  enumValue: value => `${value.typeName}.${value.elementName}`,
  predicate: (typeName, operator, operands) => {
    if (operator === 'and' || operator === 'or') {
      return `${operands[0]}.${operator}(${operands[1]})`
    }
    return `${typeName}.${operator}(${join(operands)})`
  },
  binding: key => key,
  strategy: (name, configuration) => {
    if (configuration.length === 0) return `new ${name}()`
    return `new ${name}(${join(configuration.map(([key, value]) => `${key}: ${value}`))})`
  },

  list: items => `[${join(items)}]`,
  set: items => `[${join(items)}] as Set`,
  map: entries =>
    entries.length === 0 ? '[:]' : `[${join(entries.map(([key, value]) => `${mapKey(key)}: ${value}`))}]`,
  record: entries =>
    entries.length === 0 ? '[:]' : `[${join(entries.map(([key, value]) => `${quoteString(key, "'")}: ${value}`))}]`
}

export class GroovyTranslator extends ScriptTranslator {
  constructor(traversalSource = 'g', options?: ScriptTranslatorOptions) {
    super(traversalSource, groovy, options)
  }
}
