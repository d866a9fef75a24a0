/**
 * Core type definitions: JSON shapes, type tags and option objects
 *
 * The library consumes JSON-compatible structures that the caller has
 * already decoded. Everything coming in is `unknown` until an attribute
 * constructor narrows it; everything going out is `JsonValue`.
 */

import { type } from "arktype";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Narrow an unknown value to a plain key/value mapping
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to plain JSON (no functions, class instances or
 * non-finite numbers)
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every((item: unknown) => isJsonValue(item));
  if (isRecord(value)) {
    const proto: unknown = Object.getPrototypeOf(value);
    return (proto === Object.prototype || proto === null) && Object.values(value).every((item) => isJsonValue(item));
  }
  return false;
}

/**
 * Structural equality over JSON values; key order is irrelevant
 */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => jsonEquals(item, b[i] ?? null));
  }
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object" || Array.isArray(b)) {
    return false;
  }
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) return false;
  return keysA.every((key) => {
    const right = b[key];
    const left = a[key];
    return right !== undefined && left !== undefined && jsonEquals(left, right);
  });
}

// =============================================================================
// TYPE TAGS
// =============================================================================

export type NumericTypeTag =
  | "Integer"
  | "PositiveInteger"
  | "NonNegativeInteger"
  | "BoundedInteger"
  | "Float"
  | "PositiveFloat"
  | "NonNegativeFloat"
  | "BoundedFloat";

export type StringTypeTag = "String" | "UnrestrictedString" | "OptionString";

export type DataResourceTypeTag = "DataResource" | "OperationDataResource" | "VariableDataResource";

export type ListTypeTag = "StringList" | "UnrestrictedStringList" | "BoundedIntegerList" | "BoundedFloatList";

/** Tags constructible without compound types */
export type LeafTypeTag = NumericTypeTag | StringTypeTag | "Boolean" | DataResourceTypeTag | ListTypeTag;

export type ElementTypeTag = "Observation" | "Feature";
export type ElementSetTypeTag = "ObservationSet" | "FeatureSet";

export type TypeTag = LeafTypeTag | ElementTypeTag | ElementSetTypeTag;

// =============================================================================
// VALUE REPRESENTATIONS
// =============================================================================

/**
 * Float payload with explicit infinities
 *
 * The markers `++inf++` / `--inf--` only exist at the JSON boundary.
 */
export type FloatValue =
  | { readonly kind: "finite"; readonly value: number }
  | { readonly kind: "positive-infinity" }
  | { readonly kind: "negative-infinity" };

const positiveInfinity: FloatValue = { kind: "positive-infinity" };
const negativeInfinity: FloatValue = { kind: "negative-infinity" };

export const FloatValue = {
  finite: (value: number): FloatValue => ({ kind: "finite", value }),
  positiveInfinity,
  negativeInfinity,
} as const;

/**
 * Serialized attribute: `{attribute_type, value, ...parameters}`
 */
export type AttributeJSON = {
  attribute_type: TypeTag;
  value: JsonValue;
  [parameter: string]: JsonValue;
};

/**
 * Serialized Element in its simple (non attribute-wrapped) form
 */
export type ElementJSON = {
  id: string;
  attributes: { [name: string]: AttributeJSON };
};

/**
 * Serialized ElementSet value
 */
export type ElementSetJSON = {
  multiple: boolean;
  elements: ElementJSON[];
};

/**
 * Serialized InputOutputSpec: the attribute's parameters plus an optional default
 */
export type InputOutputSpecJSON = {
  attribute_type: TypeTag;
  [parameter: string]: JsonValue;
};

/**
 * Serialized operation input or output
 */
export type OperationOutputJSON = {
  required: boolean;
  converter: string;
  spec: InputOutputSpecJSON;
};

export type OperationInputJSON = OperationOutputJSON & {
  name: string;
  description: string;
};

export type OperationJSON = {
  id: string;
  name: string;
  description: string;
  mode: string;
  repository_url: string;
  repository_name: string;
  git_hash: string;
  workspace_operation: boolean;
  inputs: { [name: string]: OperationInputJSON };
  outputs: { [name: string]: OperationOutputJSON };
};

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options accepted by every attribute constructor and by the factories
 */
export interface AttributeOptions {
  /**
   * Accept `null` as the value (default: false)
   */
  readonly allowNull?: boolean;

  /**
   * Tolerate and discard unrecognized keys instead of failing (default: false)
   *
   * Used when a payload is known to carry caller-side decorations, such as a
   * display color on an ObservationSet.
   */
  readonly ignoreExtraKeys?: boolean;

  /**
   * Let attributes nested inside Elements be null (default: false)
   *
   * Metadata tables often have missing cells; this keeps those rows usable.
   */
  readonly permitNullAttributes?: boolean;
}

export const AttributeOptionsSchema = type({
  "allowNull?": "boolean | undefined",
  "ignoreExtraKeys?": "boolean | undefined",
  "permitNullAttributes?": "boolean | undefined",
});

/**
 * Options for ElementSet intersection, union and difference
 */
export interface SetOperationOptions {
  /**
   * Compare by id only and drop attributes from the result (default: false)
   *
   * With this set, elements sharing an id never conflict.
   */
  readonly ignoreAttributes?: boolean;
}

export const SetOperationOptionsSchema = type({
  "ignoreAttributes?": "boolean | undefined",
});

/**
 * Any 32 hex digits, hyphenated in the 8-4-4-4-12 layout or not; the version
 * and variant bits are not checked
 */
export const UuidSchema = type(/^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i);
