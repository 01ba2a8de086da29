// =============================================================================
// Traversal Translator - Reflective Step Translator
// Builds a live traversal by invoking each operation as a method
// =============================================================================

import type { BytecodeLike, Instruction, InstructionSection } from '../bytecode/Bytecode'
import { classifyArgument } from '../bytecode/classify'
import { DEFAULT_OPERATIONS, SOURCE_NAME_OPERATOR, type OperationCatalog } from '../operations/OperationCatalog'
import type { StepTranslator } from '../translator/Translator'
import { InstructionWalker, argumentFrames, sourceNameOf } from '../translator/InstructionWalker'
import { P } from '../values/P'
import { TraversalStrategy } from '../values/TraversalStrategy'
import {
  MalformedBytecodeError,
  StepApplicationError,
  UnsupportedArgumentTypeError,
  UnsupportedOperationError,
  type TranslationFrame
} from '../errors'
import { assertNever } from '../util/assert'

/**
 * Adapts one argument before it is passed to the engine. `next` applies the
 * default adaptation (nested bytecode becomes an anonymous traversal,
 * collections are adapted element by element, bindings resolve to their value).
 */
export type ArgumentAdapter = (value: unknown, next: (value: unknown) => unknown) => unknown

/**
 * Options for step translation.
 */
export interface StepTranslatorOptions<T extends object> {
  /** Spawns an unbound traversal for nested bytecode */
  anonymous: () => T
  /** Recognizes the engine's traversal objects */
  isTraversal: (value: unknown) => value is T
  /** Identifier reported by `getTargetLanguage()` (default: 'native') */
  targetLanguage?: string
  /** Maps an operator to the engine's method name (default: unchanged) */
  methodName?: (operator: string, section: InstructionSection) => string
  /** Per-argument adaptation hook (default: the built-in adaptation) */
  adaptArgument?: ArgumentAdapter
  /** Catalog used to reject unknown operations; `false` accepts any method (default: built-in catalog) */
  operations?: OperationCatalog | false
  /** Receives deprecation notices (default: console.warn) */
  warn?: (message: string) => void
}

type ResolvedOptions<T extends object> = Required<StepTranslatorOptions<T>>

/**
 * Translates bytecode into an executable traversal by calling each operation
 * on the object the previous one returned: source instructions on the
 * traversal source, the first step on the configured source, later steps on
 * the running traversal.
 *
 * If an engine call throws, translation stops and the error is reported as a
 * `StepApplicationError` with the engine's error as its cause. Nothing built
 * so far is returned; engines that return new objects per call are left
 * exactly as they were.
 */
export class ReflectiveStepTranslator<S extends object, T extends object> implements StepTranslator<S, T> {
  private readonly options: ResolvedOptions<T>
  private readonly walker: InstructionWalker

  constructor(
    private readonly traversalSource: S,
    options: StepTranslatorOptions<T>
  ) {
    this.options = {
      targetLanguage: 'native',
      methodName: operator => operator,
      adaptArgument: (value, next) => next(value),
      operations: DEFAULT_OPERATIONS,
      warn: message => console.warn(message),
      ...options
    }
    this.walker = new InstructionWalker({
      targetLanguage: this.options.targetLanguage,
      operations: this.options.operations,
      warn: this.options.warn
    })
  }

  getTraversalSource(): S {
    return this.traversalSource
  }

  getTargetLanguage(): string {
    return this.options.targetLanguage
  }

  translate(bytecode: BytecodeLike): T {
    let steps = 0
    const result = this.walker.fold<unknown>(
      bytecode,
      this.traversalSource,
      { frames: [], anonymous: false },
      (receiver, instruction, frame, parents) => {
        if (frame.section === 'step') steps++
        return this.apply(receiver, instruction, frame, parents)
      }
    )
    if (steps === 0) {
      throw new MalformedBytecodeError('no step instructions to build a traversal from', [])
    }
    return this.expectTraversal(result, [])
  }

  // --- Internal Functions ---

  private translateAnonymous(bytecode: BytecodeLike, frames: readonly TranslationFrame[]): T {
    const result = this.walker.fold<unknown>(
      bytecode,
      this.options.anonymous(),
      { frames, anonymous: true },
      (receiver, instruction, frame, parents) => this.apply(receiver, instruction, frame, parents)
    )
    return this.expectTraversal(result, frames)
  }

  private apply(
    receiver: unknown,
    instruction: Instruction,
    frame: TranslationFrame,
    parents: readonly TranslationFrame[]
  ): unknown {
    const { operator } = instruction
    const frames = [...parents, frame]

    // withSource only names the script variable
    if (frame.section === 'source' && operator === SOURCE_NAME_OPERATOR) {
      sourceNameOf(instruction, frame, parents)
      return receiver
    }

    const args = instruction.arguments.map((arg, i) =>
      this.adapt(arg, argumentFrames(parents, frame, i)))

    if (typeof receiver !== 'object' || receiver === null) {
      throw new StepApplicationError(
        `cannot apply '${operator}': the previous operation returned ${String(receiver)}`,
        frames
      )
    }

    const method = this.options.methodName(operator, frame.section)
    const member: unknown = Reflect.get(receiver, method)
    if (typeof member !== 'function') {
      throw new UnsupportedOperationError(operator, frame.section, this.options.targetLanguage, frames)
    }

    try {
      const result: unknown = Reflect.apply(member, receiver, args)
      return result
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new StepApplicationError(`'${operator}' failed: ${reason}`, frames, { cause: error })
    }
  }

  private adapt(value: unknown, frames: readonly TranslationFrame[]): unknown {
    return this.options.adaptArgument(value, v => this.adaptStructurally(v, frames))
  }

  private adaptStructurally(value: unknown, frames: readonly TranslationFrame[]): unknown {
    const node = classifyArgument(value)

    switch (node.kind) {
      case 'missing':
        throw new MalformedBytecodeError('argument is undefined', frames)

      case 'null':
        return null

      case 'string':
      case 'number':
      case 'bigint':
      case 'boolean':
      case 'date':
      case 'enum':
        return node.value

      case 'predicate': {
        const { typeName, operator, operands } = node.value
        return new P(typeName, operator, operands.map(o => this.adapt(o, frames)))
      }

      case 'binding':
        return this.adapt(node.value.value, frames)

      case 'strategy': {
        const { strategyName, configuration } = node.value
        const adapted = Object.fromEntries(
          Object.entries(configuration).map(([key, v]): [string, unknown] => [key, this.adapt(v, frames)])
        )
        return new TraversalStrategy(strategyName, adapted)
      }

      case 'bytecode':
        return this.translateAnonymous(node.value, frames)

      case 'list':
        return node.items.map(item => this.adapt(item, frames))

      case 'set':
        return new Set(node.items.map(item => this.adapt(item, frames)))

      case 'map':
        return new Map(node.entries.map(([k, v]): [unknown, unknown] => [this.adapt(k, frames), this.adapt(v, frames)]))

      case 'record':
        return Object.fromEntries(node.entries.map(([k, v]): [string, unknown] => [k, this.adapt(v, frames)]))

      case 'opaque':
        throw new UnsupportedArgumentTypeError(node.typeName, this.options.targetLanguage, frames)

      default:
        return assertNever(node, 'Unknown argument kind')
    }
  }

  private expectTraversal(value: unknown, frames: readonly TranslationFrame[]): T {
    if (!this.options.isTraversal(value)) {
      throw new StepApplicationError('the last operation did not produce a traversal', frames)
    }
    return value
  }
}
