/**
 * Base class for every attribute type
 *
 * An attribute is a value plus the rules it must satisfy. Concrete types
 * read their parameters from a ParameterBag, then hand the raw value to
 * `assign` together with a validator, then call `finish` so that unused
 * parameters are reported. Construction either completes or throws; there is
 * no partially built attribute.
 *
 * @module attributes/base
 */

import { NullValueError } from "../errors";
import type { AttributeJSON, AttributeOptions, JsonValue, TypeTag } from "../types";
import { jsonEquals } from "../types";
import type { ParameterBag, ParameterJSON } from "./parameters";

export abstract class BaseAttribute<V> {
  abstract readonly typeTag: TypeTag;

  /** Whether `null` is an acceptable value */
  readonly allowNull: boolean;

  /** Whether unrecognized keys are discarded instead of rejected */
  protected readonly ignoreExtraKeys: boolean;

  private current: V | null = null;

  protected constructor(options: AttributeOptions = {}) {
    this.allowNull = options.allowNull ?? false;
    this.ignoreExtraKeys = options.ignoreExtraKeys ?? false;
  }

  /**
   * The validated payload, or null for a null attribute
   */
  get value(): V | null {
    return this.current;
  }

  /**
   * Validate and store the raw value; `null` (or `undefined`) is handled here
   */
  protected assign(raw: unknown, validate: (raw: unknown) => V): void {
    if (raw === null || raw === undefined) {
      if (!this.allowNull) {
        throw new NullValueError(
          `Cannot set the value of a ${this.typeTag} attribute to null unless nulls are allowed.`,
          this.typeTag
        );
      }
      this.current = null;
      return;
    }
    this.current = validate(raw);
  }

  /**
   * Reject parameters the concrete type did not take
   */
  protected finish(params: ParameterBag): void {
    params.assertConsumed(this.typeTag, this.ignoreExtraKeys);
  }

  protected abstract serializeValue(value: V): JsonValue;

  /**
   * Type-specific parameters written alongside the value
   */
  protected parameterJSON(): ParameterJSON {
    return {};
  }

  toJSON(): AttributeJSON {
    return {
      attribute_type: this.typeTag,
      value: this.current === null ? null : this.serializeValue(this.current),
      ...this.parameterJSON(),
    };
  }

  /**
   * Same type, same value, same parameters
   */
  equals(other: BaseAttribute<unknown>): boolean {
    return jsonEquals(this.toJSON(), other.toJSON());
  }

  toString(): string {
    const serialized = this.current === null ? null : this.serializeValue(this.current);
    return typeof serialized === "string" ? serialized : JSON.stringify(serialized);
  }
}

/**
 * Quote a raw value for an error message
 */
export function describeValue(raw: unknown): string {
  if (typeof raw === "string") return raw;
  try {
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    return String(raw);
  }
}
