import { raise } from "../diagnostics/index.js";

/** Cursor over a collection; `current` is valid after `moveNext()` returned true. */
export class Enumerator<T = unknown> {
  private value: T | undefined;
  private started = false;

  constructor(private readonly iterator: Iterator<T>) {}

  moveNext(): boolean {
    const next = this.iterator.next();
    this.started = true;
    if (next.done) {
      this.value = undefined;
      return false;
    }
    this.value = next.value;
    return true;
  }

  get current(): T | undefined {
    if (!this.started) return undefined;
    return this.value;
  }
}

const isCollection = (
  value: unknown
): value is readonly unknown[] | ReadonlyMap<unknown, unknown> =>
  Array.isArray(value) || value instanceof Map;

export const Enumerators = {
  /** Arrays yield their items; maps yield `[key, value]` entries. */
  of(collection: unknown): Enumerator {
    if (!isCollection(collection)) {
      return raise({
        code: "MP0001",
        params: {
          kind: "unexpected-token",
          expected: "array or map",
          actual: collection === null ? "null" : typeof collection,
        },
      });
    }
    return new Enumerator<unknown>(collection[Symbol.iterator]());
  },

  range(count: number): number[] {
    const indices: number[] = [];
    for (let index = 0; index < count; index++) indices.push(index);
    return indices;
  },
};
