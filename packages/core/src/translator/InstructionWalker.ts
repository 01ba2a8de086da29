// =============================================================================
// Traversal Translator - Instruction Walk
// Shared by script and step translation: order, validation, error location
// =============================================================================

import { isBytecode, isInstruction, type Instruction, type InstructionSection } from '../bytecode/Bytecode'
import type { OperationCatalog } from '../operations/OperationCatalog'
import {
  MalformedBytecodeError,
  UnsupportedOperationError,
  type TranslationFrame
} from '../errors'

export interface WalkScope {
  /** Path from the root bytecode to the bytecode being walked */
  readonly frames: readonly TranslationFrame[]
  /** Anonymous (nested) traversals may not carry source instructions */
  readonly anonymous: boolean
}

export type InstructionVisitor<A> = (
  accumulator: A,
  instruction: Instruction,
  frame: TranslationFrame,
  parents: readonly TranslationFrame[]
) => A

export interface InstructionWalkerOptions {
  targetLanguage: string
  /** `false` skips name and arity checks */
  operations: OperationCatalog | false
  warn: (message: string) => void
}

/**
 * Folds over the source instructions and then the step instructions of a
 * bytecode, in recorded order, checking each against the operation catalog
 * before handing it to the visitor.
 */
export class InstructionWalker {
  private readonly warned = new Set<string>()

  constructor(private readonly options: InstructionWalkerOptions) {}

  fold<A>(bytecode: unknown, seed: A, scope: WalkScope, visit: InstructionVisitor<A>): A {
    const { frames, anonymous } = scope
    if (!isBytecode(bytecode)) {
      throw new MalformedBytecodeError('expected source and step instruction lists', frames)
    }
    if (anonymous && bytecode.sourceInstructions.length > 0) {
      throw new MalformedBytecodeError('an anonymous traversal cannot carry source instructions', frames)
    }

    const afterSource = this.foldSection('source', bytecode.sourceInstructions, seed, frames, visit)
    return this.foldSection('step', bytecode.stepInstructions, afterSource, frames, visit)
  }

  private foldSection<A>(
    section: InstructionSection,
    instructions: readonly unknown[],
    seed: A,
    parents: readonly TranslationFrame[],
    visit: InstructionVisitor<A>
  ): A {
    let accumulator = seed
    for (let index = 0; index < instructions.length; index++) {
      const instruction = instructions[index]
      if (!isInstruction(instruction)) {
        throw new MalformedBytecodeError(
          `${section} instruction ${index} needs an operator name and an argument list`,
          parents
        )
      }
      const frame: TranslationFrame = { section, index, operator: instruction.operator }
      this.check(instruction, frame, parents)
      accumulator = visit(accumulator, instruction, frame, parents)
    }
    return accumulator
  }

  private check(instruction: Instruction, frame: TranslationFrame, parents: readonly TranslationFrame[]): void {
    const { operations, targetLanguage } = this.options
    if (operations === false) return

    const { section, operator } = frame
    const signature = operations.lookup(section, operator)
    if (!signature) {
      throw new UnsupportedOperationError(operator, section, targetLanguage, [...parents, frame])
    }
    if (instruction.arguments.length < signature.minArgs) {
      throw new MalformedBytecodeError(
        `'${operator}' needs at least ${signature.minArgs} argument(s), got ${instruction.arguments.length}`,
        [...parents, frame]
      )
    }
    if (signature.deprecation !== undefined) {
      const key = `${section}:${operator}`
      if (!this.warned.has(key)) {
        this.warned.add(key)
        this.options.warn(
          `[traversal-translator] ${section} operation '${operator}' is deprecated: ${signature.deprecation}`
        )
      }
    }
  }
}

/** Frames locating argument `argumentIndex` of the instruction at `frame` */
export function argumentFrames(
  parents: readonly TranslationFrame[],
  frame: TranslationFrame,
  argumentIndex: number
): readonly TranslationFrame[] {
  return [...parents, { ...frame, argumentIndex }]
}

/**
 * The name carried by a `withSource` instruction. It must open the source
 * section so no configuration is recorded against a different name.
 */
export function sourceNameOf(
  instruction: Instruction,
  frame: TranslationFrame,
  parents: readonly TranslationFrame[]
): string {
  const { operator } = instruction
  if (frame.index !== 0) {
    throw new MalformedBytecodeError(`'${operator}' must be the first source instruction`, [...parents, frame])
  }
  const [name] = instruction.arguments
  if (typeof name !== 'string' || name.length === 0) {
    throw new MalformedBytecodeError(
      `'${operator}' takes the traversal source name as a string`,
      argumentFrames(parents, frame, 0)
    )
  }
  return name
}
