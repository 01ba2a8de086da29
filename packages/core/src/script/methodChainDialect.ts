// =============================================================================
// Traversal Translator - Method-Chain Dialect
// `g.V().has('name', 'marko')` style, with configurable quoting and spacing
// =============================================================================

import type { ScriptDialect } from './ScriptDialect'
import { isIdentifier, quoteString } from './literals'

/**
 * Options for the generic method-chain dialect.
 */
export interface MethodChainDialectOptions {
  /** Identifier reported by `getTargetLanguage()` (default: 'method-chain') */
  targetLanguage?: string
  /** Quote character for strings (default: single quote) */
  quote?: '"' | "'"
  /** Separator between arguments and collection items (default: ', ') */
  argumentSeparator?: string
  /** Receiver of anonymous traversals (default: '__') */
  anonymousSource?: string
}

const DEFAULT_OPTIONS: Required<MethodChainDialectOptions> = {
  targetLanguage: 'method-chain',
  quote: "'",
  argumentSeparator: ', ',
  anonymousSource: '__'
}

/**
 * Create a dialect that renders bytecode as chained method calls with
 * JavaScript literal syntax. Other dialects start from this and override
 * what differs.
 */
export function createMethodChainDialect(options?: MethodChainDialectOptions): ScriptDialect {
  const opts = { ...DEFAULT_OPTIONS, ...options }
  const sep = opts.argumentSeparator
  const q = opts.quote

  return {
    targetLanguage: opts.targetLanguage,
    anonymousSource: opts.anonymousSource,

    methodName: operator => operator,
    call: (receiver, method, args) => `${receiver}.${method}(${args.join(sep)})`,
    emptyAnonymous: () => `${opts.anonymousSource}.start()`,

    nullValue: () => 'null',
    string: value => quoteString(value, q),
    number: value => {
      if (Number.isNaN(value)) return 'NaN'
      if (value === Infinity) return 'Infinity'
      if (value === -Infinity) return '-Infinity'
      return Object.is(value, -0) ? '-0' : String(value)
    },
    bigint: value => `${value}n`,
    boolean: value => String(value),
    date: value => `new Date(${value.getTime()})`,
    enumValue: value => `${value.typeName}.${value.elementName}`,
    predicate: (typeName, operator, operands) => {
      if (operator === 'and' || operator === 'or') {
        return `${operands[0]}.${operator}(${operands[1]})`
      }
      return `${typeName}.${operator}(${operands.join(sep)})`
    },
    binding: key => key,
    strategy: (name, configuration) => {
      if (configuration.length === 0) return `new ${name}()`
      const fields = configuration.map(([key, value]) => `${key}: ${value}`)
      return `new ${name}({${fields.join(sep)}})`
    },

    list: items => `[${items.join(sep)}]`,
    set: items => `new Set([${items.join(sep)}])`,
    map: entries => `new Map([${entries.map(([key, value]) => `[${key}${sep}${value}]`).join(sep)}])`,
    record: entries => {
      const fields = entries.map(([key, value]) =>
        `${isIdentifier(key) ? key : quoteString(key, q)}: ${value}`)
      return `{${fields.join(sep)}}`
    }
  }
}
