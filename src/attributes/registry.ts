/**
 * Attribute registry and dispatch
 *
 * A registry maps every tag of a closed union to the constructor for that
 * tag. `dispatch` is the one algorithm that turns an `{attribute_type, value,
 * ...parameters}` mapping into an attribute; the leaf-only registry here and
 * the full registry in `factory.ts` both go through it.
 *
 * @module attributes/registry
 */

import { type } from "arktype";
import { TYPE_KEY, VALUE_KEY } from "../constants";
import { MissingValueError, StructuralError, UnknownTypeError } from "../errors";
import type { AttributeOptions, LeafTypeTag } from "../types";
import { AttributeOptionsSchema, isRecord } from "../types";
import type { BaseAttribute } from "./base";
import { BooleanAttribute } from "./boolean";
import {
  DataResourceAttribute,
  OperationDataResourceAttribute,
  VariableDataResourceAttribute,
} from "./data-resource";
import {
  BoundedFloatListAttribute,
  BoundedIntegerListAttribute,
  StringListAttribute,
  UnrestrictedStringListAttribute,
} from "./list";
import {
  BoundedFloatAttribute,
  BoundedIntegerAttribute,
  FloatAttribute,
  IntegerAttribute,
  NonNegativeFloatAttribute,
  NonNegativeIntegerAttribute,
  PositiveFloatAttribute,
  PositiveIntegerAttribute,
} from "./numeric";
import { ParameterBag } from "./parameters";
import { OptionStringAttribute, StringAttribute, UnrestrictedStringAttribute } from "./string";

/**
 * Any class constructible from `(value, parameters, options)`
 */
export type AttributeConstructor<A extends BaseAttribute<unknown>> = new (
  raw: unknown,
  params: ParameterBag,
  options: AttributeOptions
) => A;

export const LEAF_ATTRIBUTES = {
  Integer: IntegerAttribute,
  PositiveInteger: PositiveIntegerAttribute,
  NonNegativeInteger: NonNegativeIntegerAttribute,
  BoundedInteger: BoundedIntegerAttribute,
  Float: FloatAttribute,
  PositiveFloat: PositiveFloatAttribute,
  NonNegativeFloat: NonNegativeFloatAttribute,
  BoundedFloat: BoundedFloatAttribute,
  String: StringAttribute,
  UnrestrictedString: UnrestrictedStringAttribute,
  OptionString: OptionStringAttribute,
  Boolean: BooleanAttribute,
  DataResource: DataResourceAttribute,
  OperationDataResource: OperationDataResourceAttribute,
  VariableDataResource: VariableDataResourceAttribute,
  StringList: StringListAttribute,
  UnrestrictedStringList: UnrestrictedStringListAttribute,
  BoundedIntegerList: BoundedIntegerListAttribute,
  BoundedFloatList: BoundedFloatListAttribute,
} as const satisfies { [K in LeafTypeTag]: AttributeConstructor<BaseAttribute<unknown>> };

/**
 * Instance type of any leaf or list attribute
 */
export type LeafAttribute = InstanceType<(typeof LEAF_ATTRIBUTES)[LeafTypeTag]>;

export function isLeafTypeTag(tag: string): tag is LeafTypeTag {
  return Object.hasOwn(LEAF_ATTRIBUTES, tag);
}

/**
 * Check an options object handed in by a caller
 */
export function readAttributeOptions(options: AttributeOptions): AttributeOptions {
  const parsed = AttributeOptionsSchema(options);
  if (parsed instanceof type.errors) {
    throw new StructuralError(`Invalid attribute options: ${parsed.summary}`);
  }
  return parsed;
}

/**
 * Split an attribute mapping into its tag, value and parameters, then build
 *
 * `resolve` returns undefined for tags outside its registry. The input is
 * never mutated.
 */
export function dispatch<A extends BaseAttribute<unknown>>(
  raw: unknown,
  options: AttributeOptions,
  resolve: (tag: string) => AttributeConstructor<A> | undefined
): A {
  if (!isRecord(raw)) {
    throw new StructuralError("An attribute must be given as a mapping of keys to values.");
  }
  const { [TYPE_KEY]: tag, [VALUE_KEY]: value, ...rest } = raw;
  if (tag === undefined) {
    throw new UnknownTypeError(`The "${TYPE_KEY}" key is required to determine the attribute type.`);
  }
  if (!Object.hasOwn(raw, VALUE_KEY)) {
    throw new MissingValueError();
  }
  const ctor = typeof tag === "string" ? resolve(tag) : undefined;
  if (ctor === undefined) {
    throw new UnknownTypeError(`Could not locate type: ${String(tag)}.`, typeof tag === "string" ? tag : undefined);
  }
  return new ctor(value, ParameterBag.from(rest), options);
}

/**
 * Build a leaf or list attribute from its JSON form
 */
export function constructLeafOnly(raw: unknown, options: AttributeOptions = {}): LeafAttribute {
  return dispatch<LeafAttribute>(raw, readAttributeOptions(options), (tag) => (isLeafTypeTag(tag) ? LEAF_ATTRIBUTES[tag] : undefined));
}
