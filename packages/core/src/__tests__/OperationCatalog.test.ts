import { describe, it, expect } from '@jest/globals'
import { DEFAULT_OPERATIONS, OperationCatalog } from '../index'

describe('OperationCatalog', () => {
  it('knows step arities', () => {
    expect(DEFAULT_OPERATIONS.lookup('step', 'has')).toEqual({ minArgs: 1 })
    expect(DEFAULT_OPERATIONS.lookup('step', 'V')).toEqual({ minArgs: 0 })
    expect(DEFAULT_OPERATIONS.lookup('step', 'range')).toEqual({ minArgs: 2 })
  })

  it('keeps source and step operations apart', () => {
    expect(DEFAULT_OPERATIONS.has('source', 'withSack')).toBe(true)
    expect(DEFAULT_OPERATIONS.has('step', 'withSack')).toBe(false)
    expect(DEFAULT_OPERATIONS.has('source', 'V')).toBe(false)
  })

  it('attaches deprecation notes', () => {
    expect(DEFAULT_OPERATIONS.lookup('step', 'store')).toEqual({
      minArgs: 1,
      deprecation: 'use aggregate(Scope.local, key) instead'
    })
  })

  it('extend returns a new catalog', () => {
    const extended = DEFAULT_OPERATIONS.extend('step', { people: 0 })

    expect(extended.has('step', 'people')).toBe(true)
    expect(extended.has('step', 'out')).toBe(true)
    expect(DEFAULT_OPERATIONS.has('step', 'people')).toBe(false)
  })

  it('can be built from a custom definition', () => {
    const catalog = new OperationCatalog({
      source: { withTenant: 1 },
      step: { people: 0 },
      deprecated: { people: 'use persons()' }
    })

    expect(catalog.names('source')).toEqual(['withTenant'])
    expect(catalog.lookup('step', 'people')).toEqual({ minArgs: 0, deprecation: 'use persons()' })
    expect(catalog.lookup('step', 'out')).toBeUndefined()
  })
})
