/**
 * A named parameter. Script translations print the key as a variable so the
 * value can be supplied separately; step translations pass the value itself.
 */
export class Binding<V = unknown> {
  constructor(
    public readonly key: string,
    public readonly value: V
  ) {
    Object.freeze(this)
  }

  toString(): string {
    return `binding[${this.key}=${String(this.value)}]`
  }
}
