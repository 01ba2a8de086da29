// =============================================================================
// Traversal Translator - Script Translator
// Renders bytecode as a script in a target dialect
// =============================================================================

import type { BytecodeLike, Instruction } from '../bytecode/Bytecode'
import { classifyArgument, type ArgumentNode } from '../bytecode/classify'
import { DEFAULT_OPERATIONS, SOURCE_NAME_OPERATOR, type OperationCatalog } from '../operations/OperationCatalog'
import type { Translator } from '../translator/Translator'
import { TypeTranslator } from '../translator/TypeTranslator'
import { InstructionWalker, argumentFrames, sourceNameOf } from '../translator/InstructionWalker'
import {
  MalformedBytecodeError,
  UnsupportedArgumentTypeError,
  type TranslationFrame
} from '../errors'
import { assertNever } from '../util/assert'
import type { RenderedEntry, ScriptDialect } from './ScriptDialect'
import { isIdentifier } from './literals'

/**
 * Options for script translation.
 */
export interface ScriptTranslatorOptions {
  /** Per-value rendering hook (default: TypeTranslator.identity()) */
  typeTranslator?: TypeTranslator
  /** Catalog used to reject unknown operations; `false` accepts any name (default: built-in catalog) */
  operations?: OperationCatalog | false
  /** Receives deprecation notices (default: console.warn) */
  warn?: (message: string) => void
}

const DEFAULT_OPTIONS: Required<ScriptTranslatorOptions> = {
  typeTranslator: TypeTranslator.identity(),
  operations: DEFAULT_OPERATIONS,
  warn: message => console.warn(message)
}

/**
 * Translates bytecode to a script. The traversal source is the name of the
 * source variable in the script, conventionally `g`.
 *
 * @example
 * const translator = new ScriptTranslator('g', createMethodChainDialect())
 * translator.translate(g.V().out('knows').getBytecode())
 * // => "g.V().out('knows')"
 */
export class ScriptTranslator implements Translator<string, string> {
  private readonly options: Required<ScriptTranslatorOptions>
  private readonly walker: InstructionWalker

  constructor(
    private readonly traversalSource: string,
    private readonly dialect: ScriptDialect,
    options?: ScriptTranslatorOptions
  ) {
    if (traversalSource.length === 0) {
      throw new Error('ScriptTranslator: traversal source name must not be empty')
    }
    if (dialect.targetLanguage.length === 0) {
      throw new Error('ScriptTranslator: dialect has no target language')
    }
    this.options = { ...DEFAULT_OPTIONS, ...options }
    this.walker = new InstructionWalker({
      targetLanguage: dialect.targetLanguage,
      operations: this.options.operations,
      warn: this.options.warn
    })
  }

  getTraversalSource(): string {
    return this.traversalSource
  }

  getTargetLanguage(): string {
    return this.dialect.targetLanguage
  }

  translate(bytecode: BytecodeLike): string {
    return this.renderTraversal(bytecode, this.traversalSource, [], false)
  }

  // --- Internal Functions ---

  private renderTraversal(
    bytecode: unknown,
    receiver: string,
    frames: readonly TranslationFrame[],
    anonymous: boolean
  ): string {
    const expression = this.walker.fold(
      bytecode,
      receiver,
      { frames, anonymous },
      (current, instruction, frame, parents) =>
        this.renderInstruction(current, instruction, frame, parents)
    )
    if (anonymous && expression === receiver) {
      return this.dialect.emptyAnonymous()
    }
    return expression
  }

  private renderInstruction(
    receiver: string,
    instruction: Instruction,
    frame: TranslationFrame,
    parents: readonly TranslationFrame[]
  ): string {
    if (frame.section === 'source' && instruction.operator === SOURCE_NAME_OPERATOR) {
      const name = sourceNameOf(instruction, frame, parents)
      this.requireIdentifier(name, 'traversal source name', argumentFrames(parents, frame, 0))
      return name
    }

    const args = instruction.arguments.map((arg, i) =>
      this.renderValue(arg, argumentFrames(parents, frame, i)))
    const method = this.dialect.methodName(instruction.operator, frame.section)
    return this.dialect.call(receiver, method, args)
  }

  /** Every value passes through the TypeTranslator before structural rendering */
  private renderValue(value: unknown, frames: readonly TranslationFrame[]): string {
    const translation = this.options.typeTranslator(value)
    switch (translation.kind) {
      case 'handled':
        return translation.getTranslation()
      case 'substitute':
        return this.renderNode(classifyArgument(translation.value), frames)
      case 'continue':
        return this.renderNode(classifyArgument(value), frames)
      default:
        return assertNever(translation, 'Unknown type translation')
    }
  }

  private renderNode(node: ArgumentNode, frames: readonly TranslationFrame[]): string {
    const { dialect } = this

    switch (node.kind) {
      case 'missing':
        throw new MalformedBytecodeError('argument is undefined', frames)

      case 'null':
        return dialect.nullValue()

      case 'string':
        return dialect.string(node.value)

      case 'number':
        return dialect.number(node.value)

      case 'bigint':
        return dialect.bigint(node.value)

      case 'boolean':
        return dialect.boolean(node.value)

      case 'date':
        if (Number.isNaN(node.value.getTime())) {
          throw new UnsupportedArgumentTypeError('Invalid Date', dialect.targetLanguage, frames)
        }
        return dialect.date(node.value)

      case 'enum':
        return dialect.enumValue(node.value)

      case 'predicate': {
        const { typeName, operator, operands } = node.value
        return dialect.predicate(typeName, operator, operands.map(o => this.renderValue(o, frames)))
      }

      case 'binding':
        this.requireIdentifier(node.value.key, 'binding key', frames)
        return dialect.binding(node.value.key)

      case 'strategy': {
        const { strategyName, configuration } = node.value
        this.requireIdentifier(strategyName, 'strategy name', frames)
        const entries = Object.entries(configuration).map(([key, value]): RenderedEntry => {
          this.requireIdentifier(key, `${strategyName} configuration key`, frames)
          return [key, this.renderValue(value, frames)]
        })
        return dialect.strategy(strategyName, entries)
      }

      case 'bytecode':
        return this.renderTraversal(node.value, dialect.anonymousSource, frames, true)

      case 'list':
        return dialect.list(node.items.map(item => this.renderValue(item, frames)))

      case 'set':
        return dialect.set(node.items.map(item => this.renderValue(item, frames)))

      case 'map':
        return dialect.map(node.entries.map(([key, value]): RenderedEntry =>
          [this.renderValue(key, frames), this.renderValue(value, frames)]))

      case 'record':
        return dialect.record(node.entries.map(([key, value]): RenderedEntry =>
          [key, this.renderValue(value, frames)]))

      case 'opaque':
        throw new UnsupportedArgumentTypeError(node.typeName, dialect.targetLanguage, frames)

      default:
        return assertNever(node, 'Unknown argument kind')
    }
  }

  private requireIdentifier(name: string, what: string, frames: readonly TranslationFrame[]): void {
    if (!isIdentifier(name)) {
      throw new MalformedBytecodeError(`${what} '${name}' is not a valid identifier`, frames)
    }
  }
}
