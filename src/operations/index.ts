/**
 * Operation contracts: specs, inputs/outputs and their collections
 *
 * @module operations
 */

export { InputOutputSpec } from "./io-spec";
export {
  CONVERTER_KEY,
  DESCRIPTION_KEY,
  NAME_KEY,
  OperationInput,
  OperationInputOutput,
  OperationOutput,
  REQUIRED_KEY,
  SPEC_KEY,
  coerceRequired,
} from "./io-entry";
export { OperationInputDict, OperationInputOutputDict, OperationOutputDict } from "./io-collection";
export { OPERATION_KEYS, Operation } from "./operation";
