/**
 * Type-specific attribute parameters
 *
 * Whatever keys remain in an attribute payload after `attribute_type` and
 * `value` are removed are that type's parameters (`min`, `max`, `options`,
 * `many`, ...). Each attribute type takes the keys it understands; anything
 * left over is an error unless extras are tolerated.
 */

import { MissingParameterError, UnknownExtraParameterError } from "../errors";
import type { JsonValue } from "../types";

export class ParameterBag {
  private readonly remaining: Map<string, unknown>;

  private constructor(entries: Iterable<[string, unknown]>) {
    this.remaining = new Map(entries);
  }

  static empty(): ParameterBag {
    return new ParameterBag([]);
  }

  static from(params: Record<string, unknown>): ParameterBag {
    return new ParameterBag(Object.entries(params));
  }

  /**
   * Take an optional parameter, returning undefined when absent
   */
  take(key: string): unknown {
    const value = this.remaining.get(key);
    this.remaining.delete(key);
    return value;
  }

  /**
   * Take a parameter the attribute type cannot do without
   */
  require(key: string, typeTag: string): unknown {
    if (!this.remaining.has(key)) {
      throw new MissingParameterError(key, typeTag);
    }
    return this.take(key);
  }

  /**
   * Keys nobody has taken yet
   */
  leftovers(): string[] {
    return [...this.remaining.keys()];
  }

  /**
   * Fail if parameters remain, unless the caller tolerates extras
   */
  assertConsumed(typeTag: string, ignoreExtraKeys = false): void {
    const extras = this.leftovers();
    if (extras.length > 0 && !ignoreExtraKeys) {
      throw new UnknownExtraParameterError(extras, typeTag);
    }
  }
}

/**
 * A parameter value as it is written back out by `toJSON`
 */
export type ParameterJSON = Record<string, JsonValue>;
