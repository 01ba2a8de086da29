// =============================================================================
// @traversal-translator/core - Public API
// Bytecode, translator contract, script and step translation
// =============================================================================

// --- Bytecode ---
export { Bytecode, isBytecode, isInstruction } from './bytecode/Bytecode'
export type { BytecodeLike, Instruction, InstructionSection } from './bytecode/Bytecode'
export { classifyArgument } from './bytecode/classify'
export type { ArgumentNode, ArgumentKind } from './bytecode/classify'

// --- Argument Values ---
export { EnumValue, T, Order, Scope, Column, Direction, Cardinality, Pop, Operator, Pick, Barrier } from './values/EnumValue'
export { P, TextP } from './values/P'
export type { PredicateType } from './values/P'
export { Binding } from './values/Binding'
export { TraversalStrategy } from './values/TraversalStrategy'

// --- Operations ---
export { OperationCatalog, DEFAULT_OPERATIONS, SOURCE_NAME_OPERATOR } from './operations/OperationCatalog'
export type { OperationDefinition, OperationSignature } from './operations/OperationCatalog'

// --- Translator Contract ---
export type { Translator, StepTranslator } from './translator/Translator'
export { TypeTranslator, TypeTranslation, Handled } from './translator/TypeTranslator'
export type { Continue, Substitute } from './translator/TypeTranslator'

// --- Script Translation ---
export { ScriptTranslator } from './script/ScriptTranslator'
export type { ScriptTranslatorOptions } from './script/ScriptTranslator'
export type { ScriptDialect, RenderedEntry } from './script/ScriptDialect'
export { createMethodChainDialect } from './script/methodChainDialect'
export type { MethodChainDialectOptions } from './script/methodChainDialect'
export { quoteString, isIdentifier, toSnakeCase } from './script/literals'

// --- Step Translation ---
export { ReflectiveStepTranslator } from './step/ReflectiveStepTranslator'
export type { StepTranslatorOptions, ArgumentAdapter } from './step/ReflectiveStepTranslator'

// --- Recording Traversals ---
export { GraphTraversal } from './traversal/GraphTraversal'
export { GraphTraversalSource, traversal } from './traversal/GraphTraversalSource'
export { __ } from './traversal/anonymous'
export { createNativeStepTranslator } from './traversal/native'
export type { NativeStepTranslatorOptions } from './traversal/native'

// --- Errors ---
export {
  TranslationError,
  UnsupportedOperationError,
  UnsupportedArgumentTypeError,
  MalformedBytecodeError,
  StepApplicationError,
  formatFrames
} from './errors'
export type { TranslationFrame } from './errors'
