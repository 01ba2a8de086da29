// =============================================================================
// Traversal Translator - Argument Classification Tests
// =============================================================================

import { describe, it, expect } from '@jest/globals'
import {
  Binding,
  Bytecode,
  classifyArgument,
  P,
  T,
  TraversalStrategy,
  __
} from '../index'

class Widget {
  constructor(readonly name: string) {}
}

describe('classifyArgument', () => {
  it.each<[string, unknown]>([
    ['null', null],
    ['string', 'marko'],
    ['number', 29],
    ['bigint', 10n],
    ['boolean', false],
    ['date', new Date(0)],
    ['enum', T.id],
    ['predicate', P.gt(30)],
    ['binding', new Binding('age', 30)],
    ['strategy', new TraversalStrategy('ReadOnlyStrategy')],
    ['bytecode', new Bytecode()],
    ['list', [1, 2]],
    ['set', new Set([1])],
    ['map', new Map([['k', 1]])],
    ['record', { name: 'marko' }]
  ])('classifies %s', (kind, value) => {
    expect(classifyArgument(value).kind).toBe(kind)
  })

  it('treats undefined as a missing argument', () => {
    expect(classifyArgument(undefined)).toEqual({ kind: 'missing' })
  })

  it('classifies recorded traversals as their bytecode', () => {
    const node = classifyArgument(__.out('knows'))
    expect(node).toEqual({ kind: 'bytecode', value: new Bytecode().addStep('out', 'knows') })
  })

  it('classifies prototype-less objects as records', () => {
    const record: Record<string, unknown> = Object.create(null)
    record.name = 'marko'

    expect(classifyArgument(record)).toEqual({ kind: 'record', entries: [['name', 'marko']] })
  })

  it('spreads set items and map entries in insertion order', () => {
    expect(classifyArgument(new Set(['b', 'a']))).toEqual({ kind: 'set', items: ['b', 'a'] })
    expect(classifyArgument(new Map([[2, 'two'], [1, 'one']]))).toEqual({
      kind: 'map',
      entries: [[2, 'two'], [1, 'one']]
    })
  })

  it('names the class of opaque objects', () => {
    const widget = new Widget('gizmo')
    expect(classifyArgument(widget)).toEqual({ kind: 'opaque', value: widget, typeName: 'Widget' })
  })

  it('treats functions and symbols as opaque', () => {
    expect(classifyArgument(() => 1)).toMatchObject({ kind: 'opaque', typeName: 'function' })
    expect(classifyArgument(Symbol('s'))).toMatchObject({ kind: 'opaque', typeName: 'symbol' })
  })
})
