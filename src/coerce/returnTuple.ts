/**
 * Fixed-arity aggregate of values returned by one remote call.
 *
 * Positions keep the order the engine returned them in; empty positions
 * are null.
 */
export class ReturnTuple<T extends readonly unknown[] = readonly unknown[]> implements Iterable<T[number]> {
  private readonly values: T;

  constructor(values: T) {
    this.values = values;
  }

  get size(): number {
    return this.values.length;
  }

  get<I extends number>(index: I): T[I] {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new RangeError(`ReturnTuple index ${index} out of range [0, ${this.values.length})`);
    }
    return this.values[index];
  }

  toArray(): T[number][] {
    return [...this.values];
  }

  [Symbol.iterator](): Iterator<T[number]> {
    return this.values[Symbol.iterator]();
  }
}
