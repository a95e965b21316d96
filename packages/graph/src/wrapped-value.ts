// packages/graph/src/wrapped-value.ts
import type { JsonValue, ParamSpec } from '@graphflow/core';
import { compareJson, jsonEquals } from '@graphflow/core';

/**
 * A widget value paired with the ParamSpec that declares it.
 * Equality and ordering delegate to the raw value, so a wrapped value
 * compares equal to its unwrapped form.
 */
export class WrappedValue {
  constructor(readonly value: JsonValue, readonly spec: ParamSpec) {
    Object.freeze(this);
  }

  static unwrap(x: JsonValue | WrappedValue): JsonValue {
    return x instanceof WrappedValue ? x.value : x;
  }

  get name(): string {
    return this.spec.name;
  }

  /** Enumerated domain, when the param declares one. */
  get choices(): readonly JsonValue[] | undefined {
    return this.spec.choices;
  }

  get tooltip(): string | undefined {
    return this.spec.tooltip;
  }

  equals(other: JsonValue | WrappedValue): boolean {
    return jsonEquals(this.value, WrappedValue.unwrap(other));
  }

  /** <0, 0, >0 like a sort comparator; NaN when the two values are unordered. */
  compare(other: JsonValue | WrappedValue): number {
    return compareJson(this.value, WrappedValue.unwrap(other));
  }

  valueOf(): JsonValue {
    return this.value;
  }

  toJSON(): JsonValue {
    return this.value;
  }

  toString(): string {
    return typeof this.value === 'string' ? this.value : JSON.stringify(this.value);
  }
}
