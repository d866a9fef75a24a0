import { describe, expect, test } from "vitest";
import {
  DataResourceAttribute,
  OperationDataResourceAttribute,
  VariableDataResourceAttribute,
  isDataResourceTag,
  isOwnedDataResourceTag,
} from "../../src/attributes/data-resource";
import { ParameterBag } from "../../src/attributes/parameters";
import {
  AttributeValueError,
  InvalidParameterError,
  InvalidResourceTypeError,
  MissingParameterError,
} from "../../src/errors";
import { UUID_A, UUID_B, captureError } from "../support";

const single = (many: unknown = false) => ParameterBag.from({ many, resource_type: "MTX" });

describe("DataResourceAttribute", () => {
  test("accepts a single UUID", () => {
    const attr = new DataResourceAttribute(UUID_A, single());
    expect(attr.value).toBe(UUID_A);
    expect(attr.many).toBe(false);
    expect(attr.references).toEqual([UUID_A]);
    expect(attr.toJSON()).toEqual({
      attribute_type: "DataResource",
      value: UUID_A,
      many: false,
      resource_type: "MTX",
    });
  });

  test("accepts a list when many is set", () => {
    const attr = new DataResourceAttribute([UUID_A, UUID_B], single("true"));
    expect(attr.many).toBe(true);
    expect(attr.value).toEqual([UUID_A, UUID_B]);
  });

  test("a one-item list is fine without many, longer lists are not", () => {
    expect(new DataResourceAttribute([UUID_A], single()).value).toEqual([UUID_A]);
    expect(() => new DataResourceAttribute([UUID_A, UUID_B], single())).toThrow(AttributeValueError);
  });

  test("accepts any 32 hex digits, with or without hyphens", () => {
    const nonRfc = "12345678-1234-1234-1234-123456789abc";
    expect(new DataResourceAttribute(nonRfc, single()).value).toBe(nonRfc);
    expect(new DataResourceAttribute("12345678123412341234123456789ABC", single()).value).toBe(
      "12345678123412341234123456789ABC"
    );
    expect(new DataResourceAttribute("00000000-0000-0000-0000-000000000000", single()).references).toEqual([
      "00000000-0000-0000-0000-000000000000",
    ]);
    expect(() => new DataResourceAttribute("12345678-1234-1234-1234-123456789abz", single())).toThrow(
      AttributeValueError
    );
  });

  test("rejects anything that is not a UUID", () => {
    expect(() => new DataResourceAttribute("not-a-uuid", single())).toThrow(AttributeValueError);
    expect(() => new DataResourceAttribute([UUID_A, "abc"], single(true))).toThrow(AttributeValueError);
    expect(() => new DataResourceAttribute(42, single())).toThrow(AttributeValueError);
  });

  test("many and resource_type are required", () => {
    expect(() => new DataResourceAttribute(UUID_A, ParameterBag.from({ resource_type: "MTX" }))).toThrow(
      MissingParameterError
    );
    expect(() => new DataResourceAttribute(UUID_A, ParameterBag.from({ many: false }))).toThrow(
      MissingParameterError
    );
    expect(() => new DataResourceAttribute(UUID_A, single("sometimes"))).toThrow(InvalidParameterError);
  });

  test("checks the resource type against a caller-supplied vocabulary", () => {
    const attr = new DataResourceAttribute(UUID_A, single());
    expect(() => attr.checkResourceTypeKeys(["MTX", "I_MTX"])).not.toThrow();

    const error = captureError(() => attr.checkResourceTypeKeys(new Set(["I_MTX"])));
    expect(error).toBeInstanceOf(InvalidResourceTypeError);
    expect(error.message).toBe(
      "Received an invalid entry or entries when specifying a resource type. The following are not valid: MTX"
    );
  });
});

describe("OperationDataResourceAttribute", () => {
  test("behaves like DataResource under its own tag", () => {
    const attr = new OperationDataResourceAttribute(UUID_A, single());
    expect(attr.typeTag).toBe("OperationDataResource");
    expect(attr.toJSON().attribute_type).toBe("OperationDataResource");
  });
});

describe("VariableDataResourceAttribute", () => {
  const variable = (resourceTypes: unknown) => ParameterBag.from({ many: false, resource_types: resourceTypes });

  test("carries a list of resource types", () => {
    const attr = new VariableDataResourceAttribute(UUID_A, variable(["MTX", "EXP_MTX"]));
    expect(attr.toJSON()).toEqual({
      attribute_type: "VariableDataResource",
      value: UUID_A,
      many: false,
      resource_types: ["MTX", "EXP_MTX"],
    });
  });

  test("resource_types must be a non-empty list of strings", () => {
    expect(() => new VariableDataResourceAttribute(UUID_A, variable([]))).toThrow(InvalidParameterError);
    expect(() => new VariableDataResourceAttribute(UUID_A, variable("MTX"))).toThrow(InvalidParameterError);
    expect(() => new VariableDataResourceAttribute(UUID_A, variable(["MTX", 3]))).toThrow(InvalidParameterError);
  });

  test("names every invalid resource type", () => {
    const attr = new VariableDataResourceAttribute(UUID_A, variable(["MTX", "ANN", "BED"]));
    const error = captureError(() => attr.checkResourceTypeKeys(["MTX"]));
    expect(error).toBeInstanceOf(InvalidResourceTypeError);
    expect(error instanceof InvalidResourceTypeError && error.invalidTypes).toEqual(["ANN", "BED"]);
  });
});

describe("resource tag helpers", () => {
  test("classify resource-reference tags", () => {
    expect(isDataResourceTag("OperationDataResource")).toBe(true);
    expect(isDataResourceTag("String")).toBe(false);
    expect(isOwnedDataResourceTag("DataResource")).toBe(true);
    expect(isOwnedDataResourceTag("VariableDataResource")).toBe(true);
    expect(isOwnedDataResourceTag("OperationDataResource")).toBe(false);
  });
});
