// =============================================================================
// Traversal Translator - Python Dialect Tests
// =============================================================================

import { describe, it, expect } from '@jest/globals'
import { Column, Order, P, Scope, T, TextP, TraversalStrategy, traversal, __ } from '@traversal-translator/core'
import { PythonTranslator } from '../index'

describe('PythonTranslator', () => {
  const g = traversal()
  const translator = new PythonTranslator()

  it('identifies as gremlin-python', () => {
    expect(translator.getTargetLanguage()).toBe('gremlin-python')
  })

  it('renders snake_case method names', () => {
    const bytecode = g.V().hasLabel('person').outE('knows').inV().valueMap('name').getBytecode()
    expect(translator.translate(bytecode)).toBe("g.V().has_label('person').out_e('knows').in_v().value_map('name')")
  })

  it('suffixes reserved words', () => {
    const bytecode = g.V().as('a').in('knows').id().is(P.gt(1)).getBytecode()
    expect(translator.translate(bytecode)).toBe("g.V().as_('a').in_('knows').id_().is_(P.gt(1))")
  })

  it('renders Python literals', () => {
    const bytecode = g.inject(null, true, false, NaN, Infinity, 12345678901234567890n).getBytecode()
    expect(translator.translate(bytecode))
      .toBe("g.inject(None, True, False, float('nan'), float('inf'), 12345678901234567890)")
  })

  it('keeps the sign of negative zero', () => {
    expect(translator.translate(g.inject(-0, 0).getBytecode())).toBe('g.inject(-0.0, 0)')
  })

  it('renders dates as UTC timestamps', () => {
    expect(translator.translate(g.inject(new Date(1500)).getBytecode()))
      .toBe('g.inject(datetime.datetime.utcfromtimestamp(1.5))')
  })

  it('renders collections', () => {
    const bytecode = g.inject([1, 2], new Set(['a']), new Set(), new Map([[T.id, 1]]), { name: 'marko' }).getBytecode()
    expect(translator.translate(bytecode))
      .toBe("g.inject([1, 2], {'a'}, set(), {T.id: 1}, {'name': 'marko'})")
  })

  it('renders predicates and enum tokens', () => {
    const bytecode = g.V()
      .has('name', TextP.startingWith('ma').or(P.within('x', 'y')))
      .order().by(Column.values, Order.desc)
      .fold().unfold()
      .local(__.count(Scope.local))
      .getBytecode()

    expect(translator.translate(bytecode)).toBe(
      "g.V().has('name', TextP.starting_with('ma').or_(P.within(['x', 'y'])))" +
      '.order().by(Column.values, Order.desc)' +
      '.fold().unfold()' +
      '.local(__.count(Scope.local))'
    )
  })

  it('suffixes reserved enum tokens', () => {
    expect(translator.translate(g.V().count(Scope.global).getBytecode())).toBe('g.V().count(Scope.global_)')
  })

  it('renders strategies with keyword arguments', () => {
    const strategy = new TraversalStrategy('SubgraphStrategy', { vertices: __.hasLabel('person') })
    expect(translator.translate(g.withStrategies(strategy).V().getBytecode()))
      .toBe("g.with_strategies(SubgraphStrategy(vertices=__.has_label('person'))).V()")
  })
})
