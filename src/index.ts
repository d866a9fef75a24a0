/**
 * attrspec - attribute and schema validation for analysis platform metadata
 *
 * Validates user-supplied values against declared constraints, validates the
 * JSON contracts that describe an analysis tool's inputs and outputs, and
 * combines sample/feature metadata sets with conflict detection. Everything
 * here is synchronous and performs no I/O.
 */

// Attribute types
export {
  BaseAttribute,
  BaseDataResourceAttribute,
  BooleanAttribute,
  BoundedFloatAttribute,
  BoundedFloatListAttribute,
  BoundedIntegerAttribute,
  BoundedIntegerListAttribute,
  coerceBoolean,
  constructLeafOnly,
  DataResourceAttribute,
  FloatAttribute,
  IntegerAttribute,
  isDataResourceTag,
  isLeafTypeTag,
  isOwnedDataResourceTag,
  LEAF_ATTRIBUTES,
  type LeafAttribute,
  ListAttribute,
  NonNegativeFloatAttribute,
  NonNegativeIntegerAttribute,
  normalizeIdentifier,
  OperationDataResourceAttribute,
  OptionStringAttribute,
  ParameterBag,
  PositiveFloatAttribute,
  PositiveIntegerAttribute,
  type ResourceReference,
  StringAttribute,
  StringListAttribute,
  UnrestrictedStringAttribute,
  UnrestrictedStringListAttribute,
  VariableDataResourceAttribute,
} from "./attributes";
// Constants
export { NEGATIVE_INF_MARKER, POSITIVE_INF_MARKER } from "./constants";
// Elements and element sets
export { Element, type ElementValue, Feature, Observation } from "./elements/element";
export {
  combineElementSets,
  ElementSet,
  type ElementSetValue,
  FeatureSet,
  ObservationSet,
  type SetOperation,
} from "./elements/element-set";
// Error types
export {
  AttributeSchemaError,
  AttributeValueError,
  ConflictError,
  ERROR_SUGGESTIONS,
  formatPath,
  getErrorSuggestion,
  InvalidParameterError,
  InvalidResourceTypeError,
  KeySetError,
  MissingParameterError,
  MissingValueError,
  NullValueError,
  type PathSegment,
  StructuralError,
  UnknownExtraParameterError,
  UnknownTypeError,
} from "./errors";
// Factory
export { ATTRIBUTES, type Attribute, construct, isTypeTag } from "./factory";
// Helpers
export { type ConvertDtypeOptions, convertDtype } from "./helpers";
// Logging
export { configureLogging, type LogLevel } from "./logger";
// Operation contracts
export {
  InputOutputSpec,
  Operation,
  OperationInput,
  OperationInputDict,
  OperationInputOutput,
  OperationOutput,
  OperationOutputDict,
} from "./operations";
// Core types
export type {
  AttributeJSON,
  AttributeOptions,
  ElementJSON,
  ElementSetJSON,
  ElementSetTypeTag,
  ElementTypeTag,
  InputOutputSpecJSON,
  JsonValue,
  LeafTypeTag,
  OperationInputJSON,
  OperationJSON,
  OperationOutputJSON,
  SetOperationOptions,
  TypeTag,
} from "./types";
export { FloatValue } from "./types";
