// =============================================================================
// Traversal Translator - Operation Catalog
// Known source and step operations with their minimum argument counts
// =============================================================================

import type { InstructionSection } from '../bytecode/Bytecode'
import operations from './operations.json'

/**
 * Source instruction that names the traversal source. Script translation
 * renders the rest of the walk on that name; it is never applied as a call.
 */
export const SOURCE_NAME_OPERATOR = 'withSource'

export interface OperationSignature {
  readonly minArgs: number
  /** Present when the operation still translates but should not be used */
  readonly deprecation?: string
}

/**
 * The JSON shape of a catalog: operator name to minimum argument count,
 * per section, plus deprecation notes keyed by operator name.
 */
export interface OperationDefinition {
  readonly source: Readonly<Record<string, number>>
  readonly step: Readonly<Record<string, number>>
  readonly deprecated?: Readonly<Record<string, string>>
}

export class OperationCatalog {
  private readonly sections: Readonly<Record<InstructionSection, ReadonlyMap<string, OperationSignature>>>

  constructor(private readonly definition: OperationDefinition) {
    this.sections = {
      source: toSignatures(definition.source, definition.deprecated),
      step: toSignatures(definition.step, definition.deprecated)
    }
  }

  lookup(section: InstructionSection, operator: string): OperationSignature | undefined {
    return this.sections[section].get(operator)
  }

  names(section: InstructionSection): string[] {
    return [...this.sections[section].keys()]
  }

  /**
   * Return a new catalog that also knows the given operations.
   * Used to admit custom DSL steps without disabling checks altogether.
   */
  extend(section: InstructionSection, additions: Readonly<Record<string, number>>): OperationCatalog {
    const merged = { ...this.definition[section], ...additions }
    return new OperationCatalog(
      section === 'source'
        ? { ...this.definition, source: merged }
        : { ...this.definition, step: merged }
    )
  }
}

export const DEFAULT_OPERATIONS = new OperationCatalog(operations)

function toSignatures(
  entries: Readonly<Record<string, number>>,
  deprecated: Readonly<Record<string, string>> = {}
): ReadonlyMap<string, OperationSignature> {
  const signatures = new Map<string, OperationSignature>()
  for (const [operator, minArgs] of Object.entries(entries)) {
    const deprecation = deprecated[operator]
    signatures.set(operator, deprecation !== undefined ? { minArgs, deprecation } : { minArgs })
  }
  return signatures
}
