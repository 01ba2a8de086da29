// =============================================================================
// Traversal Translator - Python Dialect
// snake_case method names, reserved words suffixed with '_'
// =============================================================================

import {
  quoteString,
  ScriptTranslator,
  toSnakeCase,
  type ScriptDialect,
  type ScriptTranslatorOptions
} from '@traversal-translator/core'

const RESERVED_METHODS = new Set([
  'all', 'and', 'any', 'as', 'filter', 'format', 'from', 'id', 'in', 'is',
  'map', 'max', 'min', 'not', 'or', 'range', 'sum', 'with'
])

const RESERVED_TOKENS = new Set([
  'all', 'and', 'any', 'global', 'list', 'max', 'min', 'or', 'set', 'sum'
])

function pythonName(name: string, reserved: ReadonlySet<string>): string {
  const snake = toSnakeCase(name)
  return reserved.has(snake) ? `${snake}_` : snake
}

const join = (items: readonly string[]): string => items.join(', ')

export const python: ScriptDialect = {
  targetLanguage: 'gremlin-python',
  anonymousSource: '__',

  methodName: operator => pythonName(operator, RESERVED_METHODS),
  call: (receiver, method, args) => `${receiver}.${method}(${join(args)})`,
  emptyAnonymous: () => '__.start()',

  nullValue: () => 'None',
  string: value => quoteString(value, "'"),
  number: value => {
    if (Number.isNaN(value)) return "float('nan')"
    if (value === Infinity) return "float('inf')"
    if (value === -Infinity) return "float('-inf')"
    return Object.is(value, -0) ? '-0.0' : String(value)
  },
  bigint: value => String(value),
  boolean: value => (value ? 'True' : 'False'),
  date: value => `datetime.datetime.utcfromtimestamp(${value.getTime() / 1000})`,
  enumValue: value => `${value.typeName}.${pythonName(value.elementName, RESERVED_TOKENS)}`,
  predicate: (typeName, operator, operands) => {
    if (operator === 'and' || operator === 'or') {
      return `${operands[0]}.${operator}_(${operands[1]})`
    }
    return `${typeName}.${pythonName(operator, RESERVED_METHODS)}(${join(operands)})`
  },
  binding: key => key,
  strategy: (name, configuration) =>
    `${name}(${join(configuration.map(([key, value]) => `${key}=${value}`))})`,

  list: items => `[${join(items)}]`,
  set: items => (items.length === 0 ? 'set()' : `{${join(items)}}`),
  map: entries => `{${join(entries.map(([key, value]) => `${key}: ${value}`))}}`,
  record: entries => `{${join(entries.map(([key, value]) => `${quoteString(key, "'")}: ${value}`))}}`
}

export class PythonTranslator extends ScriptTranslator {
  constructor(traversalSource = 'g', options?: ScriptTranslatorOptions) {
    super(traversalSource, python, options)
  }
}
