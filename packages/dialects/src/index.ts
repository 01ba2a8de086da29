// =============================================================================
// @traversal-translator/dialects - Public API
// =============================================================================

export { javascript, JavaScriptTranslator } from './javascript'
export { python, PythonTranslator } from './python'
export { groovy, GroovyTranslator } from './groovy'
export { TranslatorRegistry, createDefaultRegistry } from './registry'
export type { TranslatorFactory } from './registry'
