// =============================================================================
// Traversal Translator - Translator Registry Tests
// =============================================================================

import { describe, it, expect } from '@jest/globals'
import { ScriptTranslator, createMethodChainDialect, traversal } from '@traversal-translator/core'
import { GroovyTranslator, PythonTranslator, TranslatorRegistry, createDefaultRegistry, type TranslatorFactory } from '../index'

describe('TranslatorRegistry', () => {
  const g = traversal()
  const demo: TranslatorFactory = (source, options) =>
    new ScriptTranslator(source, createMethodChainDialect({ targetLanguage: 'demo' }), options)

  it('lists the bundled target languages', () => {
    expect(createDefaultRegistry().listTargetLanguages())
      .toEqual(['gremlin-javascript', 'gremlin-python', 'gremlin-groovy'])
  })

  it('creates translators by target language', () => {
    const registry = createDefaultRegistry()

    expect(registry.create('gremlin-python')).toBeInstanceOf(PythonTranslator)
    expect(registry.create('gremlin-groovy', 'graph')).toBeInstanceOf(GroovyTranslator)
    expect(registry.create('gremlin-groovy', 'graph').translate(g.V().getBytecode())).toBe('graph.V()')
  })

  it('passes options to the factory', () => {
    const registry = createDefaultRegistry()
    const translator = registry.create('gremlin-javascript', 'g', { operations: false })

    expect(translator.translate(g.V().step('frobnicate').getBytecode())).toBe('g.V().frobnicate()')
  })

  it('registers custom factories', () => {
    const registry = new TranslatorRegistry()
    registry.register('demo', demo)

    expect(registry.has('demo')).toBe(true)
    expect(registry.create('demo').getTargetLanguage()).toBe('demo')
  })

  it('accepts the same factory twice', () => {
    const registry = new TranslatorRegistry()
    registry.register('demo', demo)
    registry.register('demo', demo)

    expect(registry.listTargetLanguages()).toEqual(['demo'])
  })

  it('rejects a different factory for a taken target language', () => {
    const registry = createDefaultRegistry()
    expect(() => registry.register('gremlin-python', demo))
      .toThrow('Translator for "gremlin-python" already registered')
  })

  it('rejects unknown target languages', () => {
    expect(() => createDefaultRegistry().create('gremlin-go'))
      .toThrow('No translator registered for target language gremlin-go')
  })
})
