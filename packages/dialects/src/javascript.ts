// =============================================================================
// Traversal Translator - JavaScript Dialect
// =============================================================================

import { createMethodChainDialect, ScriptTranslator, type ScriptDialect, type ScriptTranslatorOptions } from '@traversal-translator/core'

/** Operations the JavaScript driver exposes under a suffixed name */
const RENAMED_STEPS = new Map([
  ['from', 'from_'],
  ['in', 'in_'],
  ['with', 'with_']
])

const base = createMethodChainDialect({
  targetLanguage: 'gremlin-javascript',
  quote: "'",
  argumentSeparator: ', '
})

export const javascript: ScriptDialect = {
  ...base,
  methodName: operator => RENAMED_STEPS.get(operator) ?? operator
}

export class JavaScriptTranslator extends ScriptTranslator {
  constructor(traversalSource = 'g', options?: ScriptTranslatorOptions) {
    super(traversalSource, javascript, options)
  }
}
