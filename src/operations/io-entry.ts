/**
 * Operation inputs and outputs
 *
 * An entry says whether a parameter is required, how the runner converts a
 * submitted value (`converter`, opaque here) and what shape the value takes
 * (`spec`). Inputs also carry a label and a description for display:
 *
 * ```json
 * {
 *   "name": "Count matrix",
 *   "description": "The raw counts to normalize",
 *   "required": true,
 *   "converter": "api.converters.data_resource.LocalDockerSingleDataResourceConverter",
 *   "spec": { "attribute_type": "DataResource", "resource_type": "I_MTX", "many": false }
 * }
 * ```
 *
 * @module operations/io-entry
 */

import { type } from "arktype";
import { DEFAULT_KEY, VALUE_KEY } from "../constants";
import { AttributeValueError, checkExactKeys, rethrowAt, StructuralError } from "../errors";
import { BaseDataResourceAttribute, isDataResourceTag, isOwnedDataResourceTag } from "../attributes/data-resource";
import { describeValue } from "../attributes/base";
import { type Attribute, construct } from "../factory";
import type { OperationInputJSON, OperationOutputJSON } from "../types";
import { isRecord } from "../types";
import { InputOutputSpec } from "./io-spec";

export const REQUIRED_KEY = "required";
export const CONVERTER_KEY = "converter";
export const SPEC_KEY = "spec";
export const NAME_KEY = "name";
export const DESCRIPTION_KEY = "description";

const OUTPUT_KEYS = [REQUIRED_KEY, CONVERTER_KEY, SPEC_KEY] as const;
const INPUT_KEYS = [...OUTPUT_KEYS, NAME_KEY, DESCRIPTION_KEY] as const;

const OutputFields = type({ converter: "string" });
const InputFields = type({ converter: "string", name: "string", description: "string" });

const REQUIRED_FORMS = new Map<unknown, boolean>([
  [true, true],
  [false, false],
  [1, true],
  [0, false],
  ["1", true],
  ["0", false],
  ["true", true],
  ["false", false],
]);

/**
 * Interpret the `required` flag; only the standard boolean spellings are accepted
 */
export function coerceRequired(raw: unknown): boolean {
  const required = REQUIRED_FORMS.get(raw);
  if (required === undefined) {
    throw new AttributeValueError(
      `The "${REQUIRED_KEY}" key should be specified using standard boolean values, not "${describeValue(raw)}".`
    ).prependPath(REQUIRED_KEY);
  }
  return required;
}

export abstract class OperationInputOutput {
  abstract readonly kind: "OperationInput" | "OperationOutput";

  readonly required: boolean;
  readonly converter: string;
  readonly spec: InputOutputSpec;

  protected constructor(raw: Record<string, unknown>, converter: string) {
    this.required = coerceRequired(raw[REQUIRED_KEY]);
    this.converter = converter;
    try {
      this.spec = new InputOutputSpec(raw[SPEC_KEY]);
    } catch (error) {
      rethrowAt(error, SPEC_KEY);
    }
  }

  /**
   * Validate a submitted value against this entry's spec
   *
   * Null is accepted only for entries that are not required. With
   * `ignoreExtraKeys`, unrecognized keys in compound values (for instance a
   * display color on an ObservationSet) are discarded instead of rejected.
   *
   * @returns The constructed attribute
   */
  checkValue(candidate: unknown, ignoreExtraKeys = false): Attribute {
    const params = Object.entries(this.spec.toJSON()).filter(([key]) => key !== DEFAULT_KEY);
    return construct(
      { ...Object.fromEntries(params), [VALUE_KEY]: candidate },
      { allowNull: !this.required, ignoreExtraKeys }
    );
  }

  /**
   * Whether the value is a reference to one or more resources
   */
  isDataResource(): boolean {
    return isDataResourceTag(this.spec.attribute.typeTag);
  }

  /**
   * Whether the value references resources owned by a user, as opposed to
   * operation-bundled resources
   */
  isUserDataResource(): boolean {
    return isOwnedDataResourceTag(this.spec.attribute.typeTag);
  }

  /**
   * Check declared resource types against the caller's vocabulary; a no-op
   * for entries that are not resource references
   */
  checkResourceTypeKeys(allowed: Iterable<string>): void {
    const attribute = this.spec.attribute;
    if (attribute instanceof BaseDataResourceAttribute) {
      try {
        attribute.checkResourceTypeKeys(allowed);
      } catch (error) {
        rethrowAt(error, SPEC_KEY);
      }
    }
  }

  toJSON(): OperationOutputJSON {
    return {
      [REQUIRED_KEY]: this.required,
      [CONVERTER_KEY]: this.converter,
      [SPEC_KEY]: this.spec.toJSON(),
    };
  }

  equals(other: OperationInputOutput): boolean {
    return (
      this.kind === other.kind &&
      this.required === other.required &&
      this.converter === other.converter &&
      this.spec.equals(other.spec)
    );
  }
}

function requireRecord(raw: unknown, kind: string): Record<string, unknown> {
  if (!isRecord(raw)) {
    throw new StructuralError(`The constructor for an ${kind} expects a mapping.`);
  }
  return raw;
}

export class OperationOutput extends OperationInputOutput {
  readonly kind = "OperationOutput";

  constructor(raw: unknown) {
    const record = requireRecord(raw, "output");
    checkExactKeys(record, OUTPUT_KEYS, "output");
    const fields = OutputFields(record);
    if (fields instanceof type.errors) {
      throw new AttributeValueError(`Invalid output: ${fields.summary}`);
    }
    super(record, fields.converter);
  }

  toString(): string {
    return `OperationOutput (${this.spec.attribute.typeTag})`;
  }
}

export class OperationInput extends OperationInputOutput {
  readonly kind = "OperationInput";

  /** Label shown for the field */
  readonly name: string;
  readonly description: string;

  constructor(raw: unknown) {
    const record = requireRecord(raw, "input");
    checkExactKeys(record, INPUT_KEYS, "input");
    const fields = InputFields(record);
    if (fields instanceof type.errors) {
      throw new AttributeValueError(`Invalid input: ${fields.summary}`);
    }
    super(record, fields.converter);
    this.name = fields.name;
    this.description = fields.description;
  }

  override toJSON(): OperationInputJSON {
    return { ...super.toJSON(), [NAME_KEY]: this.name, [DESCRIPTION_KEY]: this.description };
  }

  override equals(other: OperationInputOutput): boolean {
    return (
      super.equals(other) &&
      other instanceof OperationInput &&
      this.name === other.name &&
      this.description === other.description
    );
  }

  toString(): string {
    return `OperationInput (${this.name})`;
  }
}
