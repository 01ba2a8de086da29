// =============================================================================
// Traversal Translator - Bytecode
// Persistent instruction lists recorded by traversal builders
// =============================================================================

export type InstructionSection = 'source' | 'step'

/**
 * A single operation application: the operator name and its ordered arguments.
 */
export interface Instruction {
  readonly operator: string
  readonly arguments: readonly unknown[]
}

/**
 * The shape translators read. Anything with these two lists is accepted,
 * so bytecode produced by other libraries can be translated without conversion.
 */
export interface BytecodeLike {
  readonly sourceInstructions: readonly Instruction[]
  readonly stepInstructions: readonly Instruction[]
}

/**
 * Immutable bytecode. `addSource` and `addStep` return a new instance and
 * leave the receiver untouched, so a recorded traversal can be shared freely.
 */
export class Bytecode implements BytecodeLike {
  readonly sourceInstructions: readonly Instruction[]
  readonly stepInstructions: readonly Instruction[]

  constructor(
    sourceInstructions: readonly Instruction[] = [],
    stepInstructions: readonly Instruction[] = []
  ) {
    this.sourceInstructions = Object.freeze(sourceInstructions.map(freezeInstruction))
    this.stepInstructions = Object.freeze(stepInstructions.map(freezeInstruction))
    Object.freeze(this)
  }

  /** Copy any bytecode-shaped value into a `Bytecode` */
  static from(bytecode: BytecodeLike): Bytecode {
    if (bytecode instanceof Bytecode) return bytecode
    return new Bytecode(bytecode.sourceInstructions, bytecode.stepInstructions)
  }

  addSource(operator: string, ...args: unknown[]): Bytecode {
    return new Bytecode(
      [...this.sourceInstructions, { operator, arguments: args }],
      this.stepInstructions
    )
  }

  addStep(operator: string, ...args: unknown[]): Bytecode {
    return new Bytecode(
      this.sourceInstructions,
      [...this.stepInstructions, { operator, arguments: args }]
    )
  }

  get isEmpty(): boolean {
    return this.sourceInstructions.length === 0 && this.stepInstructions.length === 0
  }

  /** Diagnostic form: `[[withBulk(false)], [V(), has(name, marko)]]` */
  toString(): string {
    return formatBytecode(this)
  }
}

/**
 * Structural guard for bytecode-shaped values.
 */
export function isBytecode(value: unknown): value is BytecodeLike {
  if (value instanceof Bytecode) return true
  if (typeof value !== 'object' || value === null) return false
  return 'sourceInstructions' in value
    && Array.isArray(value.sourceInstructions)
    && 'stepInstructions' in value
    && Array.isArray(value.stepInstructions)
}

/**
 * Guard for a well-formed instruction: a non-empty operator name and an argument list.
 */
export function isInstruction(value: unknown): value is Instruction {
  if (typeof value !== 'object' || value === null) return false
  return 'operator' in value
    && typeof value.operator === 'string'
    && value.operator.length > 0
    && 'arguments' in value
    && Array.isArray(value.arguments)
}

// --- Internal Functions ---

function freezeInstruction(instruction: Instruction): Instruction {
  if (Object.isFrozen(instruction) && Object.isFrozen(instruction.arguments)) {
    return instruction
  }
  return Object.freeze({
    operator: instruction.operator,
    arguments: Object.freeze([...instruction.arguments])
  })
}

function formatBytecode(bytecode: BytecodeLike): string {
  return `[${formatInstructions(bytecode.sourceInstructions)}, ${formatInstructions(bytecode.stepInstructions)}]`
}

function formatInstructions(instructions: readonly unknown[]): string {
  return `[${instructions.map(formatInstruction).join(', ')}]`
}

function formatInstruction(instruction: unknown): string {
  if (!isInstruction(instruction)) return String(instruction)
  return `${instruction.operator}(${instruction.arguments.map(formatArgument).join(', ')})`
}

function formatArgument(arg: unknown): string {
  if (isBytecode(arg)) return formatBytecode(arg)
  if (Array.isArray(arg)) return `[${arg.map(formatArgument).join(', ')}]`
  return String(arg)
}
