import { ReflectiveStepTranslator, type StepTranslatorOptions } from '../step/ReflectiveStepTranslator'
import { GraphTraversal } from './GraphTraversal'
import type { GraphTraversalSource } from './GraphTraversalSource'
import { __ } from './anonymous'

export type NativeStepTranslatorOptions = Pick<
  StepTranslatorOptions<GraphTraversal>,
  'adaptArgument' | 'operations' | 'warn'
>

/**
 * A step translator that rebuilds recorded traversals against `g`.
 * Translating `g.V().out().getBytecode()` yields a traversal equal to `g.V().out()`.
 */
export function createNativeStepTranslator(
  g: GraphTraversalSource,
  options?: NativeStepTranslatorOptions
): ReflectiveStepTranslator<GraphTraversalSource, GraphTraversal> {
  return new ReflectiveStepTranslator<GraphTraversalSource, GraphTraversal>(g, {
    ...options,
    targetLanguage: 'native',
    anonymous: __.start,
    isTraversal: (value): value is GraphTraversal => value instanceof GraphTraversal
  })
}
