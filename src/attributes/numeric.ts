/**
 * Integer and float attribute types
 *
 * Integers must be integral numbers; there is no coercion from strings or
 * booleans. Floats accept any finite number plus the two infinity markers,
 * which are kept as tagged values and only turned back into marker strings
 * on output.
 *
 * @module attributes/numeric
 */

import { MAX_KEY, MIN_KEY, NEGATIVE_INF_MARKER, POSITIVE_INF_MARKER } from "../constants";
import { AttributeValueError, InvalidParameterError } from "../errors";
import type { AttributeOptions, JsonValue, NumericTypeTag } from "../types";
import { FloatValue } from "../types";
import { BaseAttribute, describeValue } from "./base";
import { ParameterBag, type ParameterJSON } from "./parameters";

export function isInteger(raw: unknown): raw is number {
  return typeof raw === "number" && Number.isInteger(raw);
}

export function isFiniteNumber(raw: unknown): raw is number {
  return typeof raw === "number" && Number.isFinite(raw);
}

function requireInteger(raw: unknown, typeTag: NumericTypeTag, expected: string): number {
  if (!isInteger(raw)) {
    throw new AttributeValueError(
      `${expected} was expected, but "${describeValue(raw)}" is not an integer.`,
      typeTag
    );
  }
  return raw;
}

/**
 * Parse a float payload, accepting the infinity markers
 */
export function parseFloatValue(raw: unknown, typeTag: NumericTypeTag): FloatValue {
  if (raw === POSITIVE_INF_MARKER || raw === Number.POSITIVE_INFINITY) {
    return FloatValue.positiveInfinity;
  }
  if (raw === NEGATIVE_INF_MARKER || raw === Number.NEGATIVE_INFINITY) {
    return FloatValue.negativeInfinity;
  }
  if (isFiniteNumber(raw)) {
    return FloatValue.finite(raw);
  }
  throw new AttributeValueError(`A float attribute was expected, but received "${describeValue(raw)}"`, typeTag);
}

/**
 * JSON form of a float payload: a number, or a marker for the infinities
 */
export function serializeFloatValue(value: FloatValue): JsonValue {
  switch (value.kind) {
    case "finite":
      return value.value;
    case "positive-infinity":
      return POSITIVE_INF_MARKER;
    case "negative-infinity":
      return NEGATIVE_INF_MARKER;
  }
}

export interface Bounds {
  readonly min: number;
  readonly max: number;
}

function readBound(
  params: ParameterBag,
  key: typeof MIN_KEY | typeof MAX_KEY,
  typeTag: NumericTypeTag,
  accepts: (raw: unknown) => raw is number,
  expected: string
): number {
  const bound = params.require(key, typeTag);
  if (!accepts(bound)) {
    throw new InvalidParameterError(
      `The ${key} bound (${describeValue(bound)}) does not match the expected type for this ` +
        `bounded attribute: ${expected}.`,
      key,
      typeTag
    );
  }
  return bound;
}

/**
 * Read `min`/`max`, both required and both satisfying `accepts`
 */
function readBounds(
  params: ParameterBag,
  typeTag: NumericTypeTag,
  accepts: (raw: unknown) => raw is number,
  expected: string
): Bounds {
  const min = readBound(params, MIN_KEY, typeTag, accepts, expected);
  const max = readBound(params, MAX_KEY, typeTag, accepts, expected);
  if (min > max) {
    throw new InvalidParameterError(`The lower bound ${min} exceeds the upper bound ${max}.`, MIN_KEY, typeTag);
  }
  return { min, max };
}

// =============================================================================
// INTEGERS
// =============================================================================

/**
 * General, unbounded integers
 */
export class IntegerAttribute extends BaseAttribute<number> {
  readonly typeTag = "Integer";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => requireInteger(v, this.typeTag, "An integer"));
    this.finish(params);
  }

  protected serializeValue(value: number): JsonValue {
    return value;
  }
}

/**
 * Integers > 0
 */
export class PositiveIntegerAttribute extends BaseAttribute<number> {
  readonly typeTag = "PositiveInteger";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => {
      const n = requireInteger(v, this.typeTag, "A positive integer");
      if (n <= 0) {
        throw new AttributeValueError(`The value ${n} was not a positive integer.`, this.typeTag);
      }
      return n;
    });
    this.finish(params);
  }

  protected serializeValue(value: number): JsonValue {
    return value;
  }
}

/**
 * Integers >= 0
 */
export class NonNegativeIntegerAttribute extends BaseAttribute<number> {
  readonly typeTag = "NonNegativeInteger";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => {
      const n = requireInteger(v, this.typeTag, "A non-negative integer");
      if (n < 0) {
        throw new AttributeValueError(`The value ${n} is not a non-negative integer.`, this.typeTag);
      }
      return n;
    });
    this.finish(params);
  }

  protected serializeValue(value: number): JsonValue {
    return value;
  }
}

/**
 * Integers within [min, max]; the bounds are integers too
 */
export class BoundedIntegerAttribute extends BaseAttribute<number> {
  readonly typeTag = "BoundedInteger";
  readonly min: number;
  readonly max: number;

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    const { min, max } = readBounds(params, this.typeTag, isInteger, "integer");
    this.min = min;
    this.max = max;
    this.assign(raw, (v) => {
      const n = requireInteger(v, this.typeTag, "A bounded integer");
      if (n < this.min || n > this.max) {
        throw new AttributeValueError(`The value ${n} is not within the bounds of [${this.min},${this.max}]`, this.typeTag);
      }
      return n;
    });
    this.finish(params);
  }

  protected serializeValue(value: number): JsonValue {
    return value;
  }

  protected override parameterJSON(): ParameterJSON {
    return { [MIN_KEY]: this.min, [MAX_KEY]: this.max };
  }
}

// =============================================================================
// FLOATS
// =============================================================================

/**
 * General, unbounded floats; integers are accepted as floats
 */
export class FloatAttribute extends BaseAttribute<FloatValue> {
  readonly typeTag = "Float";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => parseFloatValue(v, this.typeTag));
    this.finish(params);
  }

  protected serializeValue(value: FloatValue): JsonValue {
    return serializeFloatValue(value);
  }
}

/**
 * Floats > 0, or +∞
 */
export class PositiveFloatAttribute extends BaseAttribute<FloatValue> {
  readonly typeTag = "PositiveFloat";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => {
      const parsed = parseFloatValue(v, this.typeTag);
      if (parsed.kind === "negative-infinity" || (parsed.kind === "finite" && parsed.value <= 0)) {
        throw new AttributeValueError(`Received a valid float (${describeValue(v)}), but it was not > 0.`, this.typeTag);
      }
      return parsed;
    });
    this.finish(params);
  }

  protected serializeValue(value: FloatValue): JsonValue {
    return serializeFloatValue(value);
  }
}

/**
 * Floats >= 0, or +∞
 */
export class NonNegativeFloatAttribute extends BaseAttribute<FloatValue> {
  readonly typeTag = "NonNegativeFloat";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => {
      const parsed = parseFloatValue(v, this.typeTag);
      if (parsed.kind === "negative-infinity" || (parsed.kind === "finite" && parsed.value < 0)) {
        throw new AttributeValueError(`Received a valid float (${describeValue(v)}), but it was not >= 0.`, this.typeTag);
      }
      return parsed;
    });
    this.finish(params);
  }

  protected serializeValue(value: FloatValue): JsonValue {
    return serializeFloatValue(value);
  }
}

/**
 * Finite floats within [min, max]; bounds may be integers or floats
 */
export class BoundedFloatAttribute extends BaseAttribute<number> {
  readonly typeTag = "BoundedFloat";
  readonly min: number;
  readonly max: number;

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    const { min, max } = readBounds(params, this.typeTag, isFiniteNumber, "integer or float");
    this.min = min;
    this.max = max;
    this.assign(raw, (v) => {
      if (!isFiniteNumber(v)) {
        throw new AttributeValueError(
          `A bounded float attribute was expected, but "${describeValue(v)}" is not a float.`,
          this.typeTag
        );
      }
      if (v < this.min || v > this.max) {
        throw new AttributeValueError(`The value ${v} is not within the bounds of [${this.min},${this.max}]`, this.typeTag);
      }
      return v;
    });
    this.finish(params);
  }

  protected serializeValue(value: number): JsonValue {
    return value;
  }

  protected override parameterJSON(): ParameterJSON {
    return { [MIN_KEY]: this.min, [MAX_KEY]: this.max };
  }
}
