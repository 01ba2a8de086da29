// =============================================================================
// Traversal Translator - Recording Traversal Tests
// =============================================================================

import { describe, it, expect } from '@jest/globals'
import { Bytecode, GraphTraversal, Order, P, T, traversal, __ } from '../index'

describe('Recording traversals', () => {
  const g = traversal()

  it('records source instructions and steps in order', () => {
    const bytecode = g.withBulk(false).withPath().V().out('knows').values('name').getBytecode()

    expect(bytecode.sourceInstructions).toEqual([
      { operator: 'withBulk', arguments: [false] },
      { operator: 'withPath', arguments: [] }
    ])
    expect(bytecode.stepInstructions).toEqual([
      { operator: 'V', arguments: [] },
      { operator: 'out', arguments: ['knows'] },
      { operator: 'values', arguments: ['name'] }
    ])
  })

  it('leaves the receiver untouched', () => {
    const people = g.V().hasLabel('person')
    const names = people.values('name')
    const ages = people.values('age')

    expect(people.getBytecode().stepInstructions).toHaveLength(2)
    expect(names.toString()).toBe('[[], [V(), hasLabel(person), values(name)]]')
    expect(ages.toString()).toBe('[[], [V(), hasLabel(person), values(age)]]')
  })

  it('records the source name', () => {
    expect(g.withSource('x').V().toString()).toBe('[[withSource(x)], [V()]]')
  })

  it('configures a new source each time', () => {
    const withPath = g.withPath()
    expect(g.getBytecode().isEmpty).toBe(true)
    expect(withPath.toString()).toBe('[[withPath()], []]')
  })

  it('records nested traversals as bytecode', () => {
    const bytecode = g.V().where(__.out('knows')).getBytecode()
    const nested = bytecode.stepInstructions[1].arguments[0]

    expect(nested).toBeInstanceOf(Bytecode)
    expect(nested).toEqual(new Bytecode().addStep('out', 'knows'))
  })

  it('records anonymous traversals from an empty start', () => {
    expect(__.start().getBytecode().isEmpty).toBe(true)
    expect(__.has('age', P.gt(30)).toString()).toBe('[[], [has(age, gt(30))]]')
  })

  it('records any step by name', () => {
    expect(g.V().step('pageRank', 0.85).toString()).toBe('[[], [V(), pageRank(0.85)]]')
  })

  it('keeps enum and predicate arguments as values', () => {
    const bytecode = g.V().order().by(T.id, Order.desc).getBytecode()
    expect(bytecode.stepInstructions[2].arguments).toEqual([T.id, Order.desc])
  })

  it('returns traversals from every step', () => {
    expect(g.V().in('knows')).toBeInstanceOf(GraphTraversal)
    expect(g.inject(1, 2).count()).toBeInstanceOf(GraphTraversal)
  })
})
