// =============================================================================
// Traversal Translator - Bytecode Tests
// =============================================================================

import { describe, it, expect } from '@jest/globals'
import { Bytecode, isBytecode, isInstruction } from '../index'

describe('Bytecode', () => {
  it('addStep returns a new bytecode and leaves the receiver unchanged', () => {
    const empty = new Bytecode()
    const withV = empty.addStep('V')

    expect(empty.stepInstructions).toHaveLength(0)
    expect(withV.stepInstructions).toEqual([{ operator: 'V', arguments: [] }])
    expect(withV).not.toBe(empty)
  })

  it('keeps source and step instructions apart', () => {
    const bytecode = new Bytecode()
      .addSource('withBulk', false)
      .addStep('V')
      .addSource('withPath')

    expect(bytecode.sourceInstructions.map(i => i.operator)).toEqual(['withBulk', 'withPath'])
    expect(bytecode.stepInstructions.map(i => i.operator)).toEqual(['V'])
  })

  it('freezes instruction lists and argument lists', () => {
    const bytecode = new Bytecode().addStep('has', 'name', 'marko')

    expect(Object.isFrozen(bytecode.stepInstructions)).toBe(true)
    expect(Object.isFrozen(bytecode.stepInstructions[0])).toBe(true)
    expect(Object.isFrozen(bytecode.stepInstructions[0].arguments)).toBe(true)
  })

  it('copies externally supplied argument arrays', () => {
    const args: unknown[] = ['name']
    const bytecode = new Bytecode([], [{ operator: 'has', arguments: args }])
    args.push('marko')

    expect(bytecode.stepInstructions[0].arguments).toEqual(['name'])
  })

  it('from() returns Bytecode instances unchanged', () => {
    const bytecode = new Bytecode().addStep('V')
    expect(Bytecode.from(bytecode)).toBe(bytecode)
  })

  it('from() converts bytecode-shaped objects', () => {
    const converted = Bytecode.from({
      sourceInstructions: [],
      stepInstructions: [{ operator: 'V', arguments: [1] }]
    })

    expect(converted).toBeInstanceOf(Bytecode)
    expect(converted.stepInstructions).toEqual([{ operator: 'V', arguments: [1] }])
  })

  it('isEmpty is true only without instructions', () => {
    expect(new Bytecode().isEmpty).toBe(true)
    expect(new Bytecode().addSource('withPath').isEmpty).toBe(false)
  })

  it('toString lists both sections', () => {
    const bytecode = new Bytecode()
      .addSource('withBulk', false)
      .addStep('V')
      .addStep('has', 'name', 'marko')

    expect(bytecode.toString()).toBe('[[withBulk(false)], [V(), has(name, marko)]]')
  })

  it('toString renders nested bytecode', () => {
    const bytecode = new Bytecode().addStep('where', new Bytecode().addStep('out', 'knows'))
    expect(bytecode.toString()).toBe('[[], [where([[], [out(knows)]])]]')
  })

  it('toString tolerates broken nested instructions', () => {
    const bytecode = new Bytecode().addStep('where', { sourceInstructions: [], stepInstructions: [null] })
    expect(bytecode.toString()).toBe('[[], [where([[], [null]])]]')
  })
})

describe('isBytecode', () => {
  it('accepts any object with both instruction lists', () => {
    expect(isBytecode(new Bytecode())).toBe(true)
    expect(isBytecode({ sourceInstructions: [], stepInstructions: [] })).toBe(true)
  })

  it('rejects everything else', () => {
    expect(isBytecode({ sourceInstructions: [] })).toBe(false)
    expect(isBytecode({ sourceInstructions: [], stepInstructions: 'V()' })).toBe(false)
    expect(isBytecode(null)).toBe(false)
    expect(isBytecode('g.V()')).toBe(false)
  })
})

describe('isInstruction', () => {
  it('requires a non-empty operator and an argument array', () => {
    expect(isInstruction({ operator: 'V', arguments: [] })).toBe(true)
    expect(isInstruction({ operator: '', arguments: [] })).toBe(false)
    expect(isInstruction({ operator: 'V' })).toBe(false)
    expect(isInstruction({ operator: 42, arguments: [] })).toBe(false)
  })
})
