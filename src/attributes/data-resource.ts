/**
 * Resource-reference attribute types
 *
 * These hold one or more resource UUIDs. They only check that the references
 * are well formed; whether a resource exists, or has an acceptable type, is the
 * caller's business. Resource-type vocabulary is checked separately through
 * `checkResourceTypeKeys`, since the valid set belongs to the caller.
 *
 * @module attributes/data-resource
 */

import { type } from "arktype";
import { MANY_KEY, RESOURCE_TYPE_KEY, RESOURCE_TYPES_KEY } from "../constants";
import { AttributeValueError, InvalidParameterError, InvalidResourceTypeError } from "../errors";
import type { AttributeOptions, DataResourceTypeTag, JsonValue, TypeTag } from "../types";
import { UuidSchema } from "../types";
import { BaseAttribute, describeValue } from "./base";
import { coerceBoolean } from "./boolean";
import { ParameterBag, type ParameterJSON } from "./parameters";

const ResourceTypesSchema = type("string[] > 0");

/** A single reference, or a list of them, exactly as submitted */
export type ResourceReference = string | readonly string[];

const DATA_RESOURCE_TAGS: ReadonlySet<TypeTag> = new Set<DataResourceTypeTag>([
  "DataResource",
  "OperationDataResource",
  "VariableDataResource",
]);

/** Tags whose resources belong to a user rather than to an operation */
const OWNED_DATA_RESOURCE_TAGS: ReadonlySet<TypeTag> = new Set<DataResourceTypeTag>([
  "DataResource",
  "VariableDataResource",
]);

export function isDataResourceTag(tag: TypeTag): boolean {
  return DATA_RESOURCE_TAGS.has(tag);
}

export function isOwnedDataResourceTag(tag: TypeTag): boolean {
  return OWNED_DATA_RESOURCE_TAGS.has(tag);
}

function checkUuid(raw: unknown, typeTag: DataResourceTypeTag): string {
  const out = UuidSchema(raw);
  if (out instanceof type.errors) {
    throw new AttributeValueError(`The passed value (${describeValue(raw)}) was not a valid UUID.`, typeTag);
  }
  return out;
}

/**
 * Report every submitted resource type missing from `allowed`
 */
function assertResourceTypes(submitted: readonly string[], allowed: Iterable<string>): void {
  const available = new Set(allowed);
  const invalid = [...new Set(submitted)].filter((t) => !available.has(t));
  if (invalid.length > 0) {
    throw new InvalidResourceTypeError(invalid);
  }
}

/**
 * Shared behaviour of the resource-reference types; not registered itself
 *
 * `many` says whether more than one reference may be given. It does not say
 * whether the value is written as a list: a single UUID in a list is fine
 * either way.
 */
export abstract class BaseDataResourceAttribute extends BaseAttribute<ResourceReference> {
  abstract override readonly typeTag: DataResourceTypeTag;
  readonly many: boolean;

  protected constructor(params: ParameterBag, options: AttributeOptions, typeTag: DataResourceTypeTag) {
    super(options);
    const rawMany = params.require(MANY_KEY, typeTag);
    const many = coerceBoolean(rawMany);
    if (many === undefined) {
      throw new InvalidParameterError(
        `The ${MANY_KEY} parameter must be boolean-like, but received "${describeValue(rawMany)}".`,
        MANY_KEY,
        typeTag
      );
    }
    this.many = many;
  }

  /**
   * Validate the references once the subclass has read its own parameters
   */
  protected assignReferences(raw: unknown, params: ParameterBag): void {
    this.assign(raw, (v) => {
      if (typeof v === "string") {
        return checkUuid(v, this.typeTag);
      }
      if (!Array.isArray(v)) {
        throw new AttributeValueError("Value needs to be either a single UUID or a list of UUIDs.", this.typeTag);
      }
      if (!this.many && v.length > 1) {
        throw new AttributeValueError(
          `The values (${describeValue(v)}) are inconsistent with the many=false parameter.`,
          this.typeTag
        );
      }
      return v.map((item: unknown) => checkUuid(item, this.typeTag));
    });
    this.finish(params);
  }

  /**
   * The referenced UUIDs as a list, regardless of how they were written
   */
  get references(): string[] {
    const value = this.value;
    if (value === null) return [];
    return typeof value === "string" ? [value] : [...value];
  }

  /**
   * Fail with InvalidResourceTypeError unless every declared resource type is in `allowed`
   */
  abstract checkResourceTypeKeys(allowed: Iterable<string>): void;

  protected serializeValue(value: ResourceReference): JsonValue {
    return typeof value === "string" ? value : [...value];
  }

  protected override parameterJSON(): ParameterJSON {
    return { [MANY_KEY]: this.many };
  }
}

/**
 * Shared behaviour of the two single resource-type variants
 */
abstract class SingleTypeDataResourceAttribute extends BaseDataResourceAttribute {
  readonly resourceType: string;

  protected constructor(params: ParameterBag, options: AttributeOptions, typeTag: DataResourceTypeTag) {
    super(params, options, typeTag);
    const resourceType = params.require(RESOURCE_TYPE_KEY, typeTag);
    if (typeof resourceType !== "string") {
      throw new InvalidParameterError(
        `The ${RESOURCE_TYPE_KEY} parameter must be a string, but received "${describeValue(resourceType)}".`,
        RESOURCE_TYPE_KEY,
        typeTag
      );
    }
    this.resourceType = resourceType;
  }

  checkResourceTypeKeys(allowed: Iterable<string>): void {
    assertResourceTypes([this.resourceType], allowed);
  }

  protected override parameterJSON(): ParameterJSON {
    return { ...super.parameterJSON(), [RESOURCE_TYPE_KEY]: this.resourceType };
  }
}

/**
 * References to resources of one fixed type
 */
export class DataResourceAttribute extends SingleTypeDataResourceAttribute {
  readonly typeTag = "DataResource";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(params, options, "DataResource");
    this.assignReferences(raw, params);
  }
}

/**
 * References to operation-owned resources (reference genomes, annotation
 * databases) rather than user uploads
 */
export class OperationDataResourceAttribute extends SingleTypeDataResourceAttribute {
  readonly typeTag = "OperationDataResource";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(params, options, "OperationDataResource");
    this.assignReferences(raw, params);
  }
}

/**
 * References whose type is one of several, fixed later by whatever produces them
 */
export class VariableDataResourceAttribute extends BaseDataResourceAttribute {
  readonly typeTag = "VariableDataResource";
  readonly resourceTypes: readonly string[];

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(params, options, "VariableDataResource");
    const declared = ResourceTypesSchema(params.require(RESOURCE_TYPES_KEY, this.typeTag));
    if (declared instanceof type.errors) {
      throw new InvalidParameterError(
        `The ${RESOURCE_TYPES_KEY} parameter requires a non-empty list of strings: ${declared.summary}`,
        RESOURCE_TYPES_KEY,
        this.typeTag
      );
    }
    this.resourceTypes = [...declared];
    this.assignReferences(raw, params);
  }

  checkResourceTypeKeys(allowed: Iterable<string>): void {
    assertResourceTypes(this.resourceTypes, allowed);
  }

  protected override parameterJSON(): ParameterJSON {
    return { ...super.parameterJSON(), [RESOURCE_TYPES_KEY]: [...this.resourceTypes] };
  }
}
