import { describe, expect, test } from "vitest";
import { BoundedFloatAttribute } from "../../src/attributes/numeric";
import {
  AttributeValueError,
  MissingParameterError,
  NullValueError,
  StructuralError,
  UnknownExtraParameterError,
} from "../../src/errors";
import { InputOutputSpec } from "../../src/operations/io-spec";
import { captureError } from "../support";

describe("InputOutputSpec", () => {
  test("validates the default against the declared parameters", () => {
    const spec = new InputOutputSpec({ attribute_type: "BoundedFloat", min: 0, max: 1, default: 0.05 });
    expect(spec.attribute).toBeInstanceOf(BoundedFloatAttribute);
    expect(spec.attribute.value).toBe(0.05);
    expect(spec.hasDefault).toBe(true);
    expect(spec.default).toBe(0.05);
    expect(spec.toJSON()).toEqual({ attribute_type: "BoundedFloat", min: 0, max: 1, default: 0.05 });

    expect(() => new InputOutputSpec({ attribute_type: "BoundedFloat", min: 0, max: 1, default: 2 })).toThrow(
      AttributeValueError
    );
  });

  test("without a default the attribute is a null placeholder", () => {
    const spec = new InputOutputSpec({ attribute_type: "DataResource", resource_type: "MTX", many: false });
    expect(spec.attribute.value).toBeNull();
    expect(spec.hasDefault).toBe(false);
    expect(spec.default).toBeUndefined();
    expect(spec.toJSON()).toEqual({ attribute_type: "DataResource", resource_type: "MTX", many: false });
  });

  test("still checks the type parameters", () => {
    expect(() => new InputOutputSpec({ attribute_type: "BoundedInteger", min: 0 })).toThrow(MissingParameterError);
    expect(() => new InputOutputSpec({ attribute_type: "OptionString" })).toThrow(MissingParameterError);
  });

  test("an explicit null default is rejected", () => {
    expect(() => new InputOutputSpec({ attribute_type: "Integer", default: null })).toThrow(NullValueError);
  });

  test("keeps the default as submitted", () => {
    const spec = new InputOutputSpec({ attribute_type: "PositiveFloat", default: "++inf++" });
    expect(spec.attribute.value).toEqual({ kind: "positive-infinity" });
    expect(spec.toJSON().default).toBe("++inf++");
  });

  test("hands out copies of the default", () => {
    const spec = new InputOutputSpec({ attribute_type: "StringList", default: ["a", "b"] });
    const copy = spec.default;
    if (Array.isArray(copy)) copy.push("c");
    expect(spec.default).toEqual(["a", "b"]);
  });

  test("rejects a value key", () => {
    const error = captureError(() => new InputOutputSpec({ attribute_type: "Integer", value: 5 }));
    expect(error).toBeInstanceOf(UnknownExtraParameterError);
    expect(error.message).toBe("The Integer type does not accept additional parameters. Received: value");
    expect(() => new InputOutputSpec({ attribute_type: "Integer", default: 3, value: null })).toThrow(
      UnknownExtraParameterError
    );
  });

  test("rejects malformed input", () => {
    expect(() => new InputOutputSpec(["Integer"])).toThrow(StructuralError);

    const error = captureError(() => new InputOutputSpec({ attribute_type: "Float", default: Number.NaN }));
    expect(error).toBeInstanceOf(StructuralError);
    expect(error.path).toEqual(["default"]);
  });

  test("equality follows the wrapped attribute", () => {
    const a = new InputOutputSpec({ attribute_type: "Integer", default: 3 });
    expect(a.equals(new InputOutputSpec({ attribute_type: "Integer", default: 3 }))).toBe(true);
    expect(a.equals(new InputOutputSpec({ attribute_type: "Integer", default: 4 }))).toBe(false);
    expect(a.equals(new InputOutputSpec({ attribute_type: "PositiveInteger", default: 3 }))).toBe(false);
  });
});
