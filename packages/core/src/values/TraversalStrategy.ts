/**
 * A traversal strategy passed to `withStrategies` / `withoutStrategies`,
 * identified by name and carrying its configuration.
 */
export class TraversalStrategy {
  readonly configuration: Readonly<Record<string, unknown>>

  constructor(
    public readonly strategyName: string,
    configuration: Record<string, unknown> = {}
  ) {
    this.configuration = Object.freeze({ ...configuration })
    Object.freeze(this)
  }

  toString(): string {
    return this.strategyName
  }
}
