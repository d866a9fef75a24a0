/**
 * Leaf and list attribute types
 *
 * @module attributes
 */

export { BaseAttribute, describeValue } from "./base";
export { ParameterBag } from "./parameters";
export type { ParameterJSON } from "./parameters";
export {
  BoundedFloatAttribute,
  BoundedIntegerAttribute,
  FloatAttribute,
  IntegerAttribute,
  NonNegativeFloatAttribute,
  NonNegativeIntegerAttribute,
  PositiveFloatAttribute,
  PositiveIntegerAttribute,
  isFiniteNumber,
  isInteger,
  parseFloatValue,
  serializeFloatValue,
} from "./numeric";
export type { Bounds } from "./numeric";
export { OptionStringAttribute, StringAttribute, UnrestrictedStringAttribute, normalizeIdentifier } from "./string";
export { BooleanAttribute, coerceBoolean } from "./boolean";
export {
  BaseDataResourceAttribute,
  DataResourceAttribute,
  OperationDataResourceAttribute,
  VariableDataResourceAttribute,
  isDataResourceTag,
  isOwnedDataResourceTag,
} from "./data-resource";
export type { ResourceReference } from "./data-resource";
export {
  BoundedFloatListAttribute,
  BoundedIntegerListAttribute,
  ListAttribute,
  StringListAttribute,
  UnrestrictedStringListAttribute,
} from "./list";
export type { ItemBuilder } from "./list";
export { LEAF_ATTRIBUTES, constructLeafOnly, dispatch, isLeafTypeTag, readAttributeOptions } from "./registry";
export type { AttributeConstructor, LeafAttribute } from "./registry";
