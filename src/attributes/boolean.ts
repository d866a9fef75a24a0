/**
 * Boolean attribute type
 *
 * @module attributes/boolean
 */

import { AttributeValueError } from "../errors";
import type { AttributeOptions, JsonValue } from "../types";
import { BaseAttribute, describeValue } from "./base";
import { ParameterBag } from "./parameters";

/**
 * Interpret the accepted boolean spellings
 *
 * `true`/`false`, 1/0, and the strings "true"/"false" in any case. Anything
 * else yields undefined.
 */
export function coerceBoolean(raw: unknown): boolean | undefined {
  if (typeof raw === "boolean") return raw;
  if (raw === 1) return true;
  if (raw === 0) return false;
  if (typeof raw === "string") {
    const lowered = raw.toLowerCase();
    if (lowered === "true") return true;
    if (lowered === "false") return false;
  }
  return undefined;
}

export class BooleanAttribute extends BaseAttribute<boolean> {
  readonly typeTag = "Boolean";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => {
      const parsed = coerceBoolean(v);
      if (parsed === undefined) {
        throw new AttributeValueError(
          `A boolean attribute was expected, but "${describeValue(v)}" cannot be interpreted as such.`,
          this.typeTag
        );
      }
      return parsed;
    });
    this.finish(params);
  }

  protected serializeValue(value: boolean): JsonValue {
    return value;
  }
}
