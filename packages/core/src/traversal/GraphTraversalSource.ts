// =============================================================================
// Traversal Translator - Recording Traversal Source
// =============================================================================

import { Bytecode } from '../bytecode/Bytecode'
import type { TraversalStrategy } from '../values/TraversalStrategy'
import { GraphTraversal, toArgument } from './GraphTraversal'

/**
 * Entry point for recorded traversals. Configuration methods return a new
 * source carrying the extra source instruction; start steps spawn a traversal.
 */
export class GraphTraversalSource {
  constructor(readonly bytecode: Bytecode = new Bytecode()) {}

  getBytecode(): Bytecode {
    return this.bytecode
  }

  // --- Configuration ---

  with(key: string, ...value: unknown[]): GraphTraversalSource {
    return this.configure('with', key, ...value)
  }

  withBulk(useBulk: boolean): GraphTraversalSource {
    return this.configure('withBulk', useBulk)
  }

  withComputer(...args: unknown[]): GraphTraversalSource {
    return this.configure('withComputer', ...args)
  }

  withPath(): GraphTraversalSource {
    return this.configure('withPath')
  }

  withSack(initialValue: unknown, ...args: unknown[]): GraphTraversalSource {
    return this.configure('withSack', initialValue, ...args)
  }

  withSideEffect(key: string, initialValue: unknown, ...args: unknown[]): GraphTraversalSource {
    return this.configure('withSideEffect', key, initialValue, ...args)
  }

  /** Name the source variable scripts are rendered on */
  withSource(name: string): GraphTraversalSource {
    return this.configure('withSource', name)
  }

  withStrategies(...strategies: TraversalStrategy[]): GraphTraversalSource {
    return this.configure('withStrategies', ...strategies)
  }

  withoutStrategies(...strategies: TraversalStrategy[]): GraphTraversalSource {
    return this.configure('withoutStrategies', ...strategies)
  }

  // --- Start Steps ---

  V(...ids: unknown[]): GraphTraversal {
    return this.spawn('V', ids)
  }

  E(...ids: unknown[]): GraphTraversal {
    return this.spawn('E', ids)
  }

  addV(...label: (string | GraphTraversal)[]): GraphTraversal {
    return this.spawn('addV', label)
  }

  addE(label: string | GraphTraversal): GraphTraversal {
    return this.spawn('addE', [label])
  }

  inject(...values: unknown[]): GraphTraversal {
    return this.spawn('inject', values)
  }

  mergeV(...args: unknown[]): GraphTraversal {
    return this.spawn('mergeV', args)
  }

  mergeE(...args: unknown[]): GraphTraversal {
    return this.spawn('mergeE', args)
  }

  union(...traversals: GraphTraversal[]): GraphTraversal {
    return this.spawn('union', traversals)
  }

  toString(): string {
    return this.bytecode.toString()
  }

  private configure(operator: string, ...args: unknown[]): GraphTraversalSource {
    return new GraphTraversalSource(this.bytecode.addSource(operator, ...args.map(toArgument)))
  }

  private spawn(operator: string, args: unknown[]): GraphTraversal {
    return new GraphTraversal(this.bytecode.addStep(operator, ...args.map(toArgument)))
  }
}

/** A fresh traversal source with no configuration */
export function traversal(): GraphTraversalSource {
  return new GraphTraversalSource()
}
