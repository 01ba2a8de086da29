// =============================================================================
// Traversal Translator - Translation Errors
// =============================================================================

import type { InstructionSection } from './bytecode/Bytecode'

/**
 * One step of the path from the root bytecode to the point of failure.
 * `argumentIndex` is set when the failure lies inside that instruction's argument.
 */
export interface TranslationFrame {
  readonly section: InstructionSection
  readonly index: number
  readonly operator: string
  readonly argumentIndex?: number
}

/** `step[1] has arg 1 > step[0] out` */
export function formatFrames(frames: readonly TranslationFrame[]): string {
  return frames
    .map(frame => {
      const arg = frame.argumentIndex !== undefined ? ` arg ${frame.argumentIndex}` : ''
      return `${frame.section}[${frame.index}] ${frame.operator}${arg}`
    })
    .join(' > ')
}

/**
 * Base class for every failure reported by `translate`.
 * Translation is all-or-nothing: when one of these is thrown, nothing was produced.
 */
export class TranslationError extends Error {
  constructor(
    message: string,
    public readonly frames: readonly TranslationFrame[],
    options?: ErrorOptions
  ) {
    super(frames.length > 0 ? `${message} (at ${formatFrames(frames)})` : message, options)
    this.name = 'TranslationError'
  }
}

/**
 * The operation name has no mapping in the target language or engine.
 */
export class UnsupportedOperationError extends TranslationError {
  constructor(
    public readonly operator: string,
    public readonly section: InstructionSection,
    public readonly targetLanguage: string,
    frames: readonly TranslationFrame[]
  ) {
    super(`${section} operation '${operator}' has no mapping in ${targetLanguage}`, frames)
    this.name = 'UnsupportedOperationError'
  }
}

/**
 * The argument's runtime type has no rendering or adaptation rule and no
 * TypeTranslator intercepted it.
 */
export class UnsupportedArgumentTypeError extends TranslationError {
  constructor(
    public readonly typeName: string,
    public readonly targetLanguage: string,
    frames: readonly TranslationFrame[]
  ) {
    super(`cannot translate argument of type ${typeName} to ${targetLanguage}`, frames)
    this.name = 'UnsupportedArgumentTypeError'
  }
}

/**
 * Structurally invalid input: a missing argument, a broken instruction,
 * source instructions inside an anonymous traversal.
 */
export class MalformedBytecodeError extends TranslationError {
  constructor(
    public readonly reason: string,
    frames: readonly TranslationFrame[]
  ) {
    super(`malformed bytecode: ${reason}`, frames)
    this.name = 'MalformedBytecodeError'
  }
}

/**
 * The execution engine rejected an operation while a traversal was being built,
 * or returned something that cannot carry the next operation.
 */
export class StepApplicationError extends TranslationError {
  constructor(message: string, frames: readonly TranslationFrame[], options?: ErrorOptions) {
    super(message, frames, options)
    this.name = 'StepApplicationError'
  }
}
