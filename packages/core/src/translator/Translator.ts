// =============================================================================
// Traversal Translator - Translator Contract
// =============================================================================

import type { BytecodeLike } from '../bytecode/Bytecode'

/**
 * Translates bytecode into another representation: a script in some language,
 * or a traversal object built directly against a traversal source.
 *
 * `S` is the traversal-source representation the translation is rooted at
 * (a variable name for scripts, a live source object for step translation);
 * `T` is the translation result.
 */
export interface Translator<S, T> {
  /** The traversal source this translator is rooted at; fixed for its lifetime */
  getTraversalSource(): S

  /**
   * Translate bytecode. Never mutates the input; the same bytecode always
   * produces an equivalent result. Throws a `TranslationError` rather than
   * returning a partial translation.
   */
  translate(bytecode: BytecodeLike): T

  /** Identifier of the target language, e.g. `gremlin-python` */
  getTargetLanguage(): string
}

/** Translates bytecode into an executable traversal bound to a traversal source */
export type StepTranslator<S extends object, T extends object> = Translator<S, T>
