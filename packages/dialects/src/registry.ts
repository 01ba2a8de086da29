import type { ScriptTranslator, ScriptTranslatorOptions } from '@traversal-translator/core'
import { JavaScriptTranslator } from './javascript'
import { PythonTranslator } from './python'
import { GroovyTranslator } from './groovy'

export type TranslatorFactory = (traversalSource: string, options?: ScriptTranslatorOptions) => ScriptTranslator

/**
 * Registry for selecting a script translator by target language.
 */
export class TranslatorRegistry {
  private factories = new Map<string, TranslatorFactory>()

  /**
   * Register a factory under a target-language id.
   */
  register(targetLanguage: string, factory: TranslatorFactory): void {
    const existing = this.factories.get(targetLanguage)
    if (existing) {
      // Re-registering the same factory is a no-op
      if (existing === factory) return

      throw new Error(`Translator for "${targetLanguage}" already registered`)
    }
    this.factories.set(targetLanguage, factory)
  }

  has(targetLanguage: string): boolean {
    return this.factories.has(targetLanguage)
  }

  create(targetLanguage: string, traversalSource = 'g', options?: ScriptTranslatorOptions): ScriptTranslator {
    const factory = this.factories.get(targetLanguage)
    if (!factory) {
      throw new Error(`No translator registered for target language ${targetLanguage}`)
    }
    return factory(traversalSource, options)
  }

  listTargetLanguages(): string[] {
    return [...this.factories.keys()]
  }
}

/**
 * A registry holding the bundled JavaScript, Python and Groovy translators.
 */
export function createDefaultRegistry(): TranslatorRegistry {
  const registry = new TranslatorRegistry()
  registry.register('gremlin-javascript', (source, options) => new JavaScriptTranslator(source, options))
  registry.register('gremlin-python', (source, options) => new PythonTranslator(source, options))
  registry.register('gremlin-groovy', (source, options) => new GroovyTranslator(source, options))
  return registry
}
