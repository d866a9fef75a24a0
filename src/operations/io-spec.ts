/**
 * Input/output specifications
 *
 * A spec describes the shape of an operation parameter without a concrete
 * value:
 *
 * ```json
 * { "attribute_type": "BoundedFloat", "min": 0, "max": 1, "default": 0.05 }
 * ```
 *
 * Construction checks the type's parameters and, when present, that the
 * default satisfies them. Without a default the attribute is built around a
 * null placeholder.
 *
 * @module operations/io-spec
 */

import { DEFAULT_KEY, VALUE_KEY } from "../constants";
import { StructuralError, UnknownExtraParameterError } from "../errors";
import { type Attribute, construct } from "../factory";
import { createLogger } from "../logger";
import type { InputOutputSpecJSON, JsonValue } from "../types";
import { isJsonValue, isRecord } from "../types";

const log = createLogger("io-spec");

export class InputOutputSpec {
  /** The attribute holding the default, or a null placeholder */
  readonly attribute: Attribute;
  private readonly defaultValue: JsonValue | undefined = undefined;

  constructor(raw: unknown) {
    if (!isRecord(raw)) {
      throw new StructuralError("An input or output specification must be a mapping.");
    }
    const hasDefault = Object.hasOwn(raw, DEFAULT_KEY);
    const { [DEFAULT_KEY]: submitted, [VALUE_KEY]: _value, ...params } = raw;
    const hasValue = Object.hasOwn(raw, VALUE_KEY);
    if (hasDefault) {
      if (!isJsonValue(submitted)) {
        throw new StructuralError("The default must be a plain JSON value.").prependPath(DEFAULT_KEY);
      }
      this.defaultValue = structuredClone(submitted);
    }

    try {
      this.attribute = construct(
        { ...params, [VALUE_KEY]: this.defaultValue ?? null },
        { allowNull: !hasDefault }
      );
    } catch (error) {
      log.debug(`Failed to validate an input/output specification: ${String(error)}`);
      throw error;
    }
    // A spec describes a value; the concrete one arrives later through checkValue
    if (hasValue) {
      throw new UnknownExtraParameterError([VALUE_KEY], this.attribute.typeTag);
    }
  }

  get hasDefault(): boolean {
    return this.defaultValue !== undefined;
  }

  /** A copy of the default exactly as submitted */
  get default(): JsonValue | undefined {
    return this.defaultValue === undefined ? undefined : structuredClone(this.defaultValue);
  }

  /**
   * The attribute's parameters, without its value, plus the default if one was given
   */
  toJSON(): InputOutputSpecJSON {
    const out: InputOutputSpecJSON = { attribute_type: this.attribute.typeTag };
    for (const [key, value] of Object.entries(this.attribute.toJSON())) {
      if (key !== VALUE_KEY) {
        out[key] = value;
      }
    }
    if (this.defaultValue !== undefined) {
      out[DEFAULT_KEY] = structuredClone(this.defaultValue);
    }
    return out;
  }

  /**
   * Compares the wrapped attributes only
   */
  equals(other: InputOutputSpec): boolean {
    return this.attribute.equals(other.attribute);
  }
}
