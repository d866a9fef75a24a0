import { describe, expect, test } from "vitest";
import { IntegerAttribute } from "../../src/attributes/numeric";
import { constructLeafOnly, isLeafTypeTag } from "../../src/attributes/registry";
import { StringListAttribute } from "../../src/attributes/list";
import { MissingValueError, StructuralError, UnknownTypeError } from "../../src/errors";
import { captureError } from "../support";

describe("constructLeafOnly", () => {
  test("dispatches on attribute_type", () => {
    const attr = constructLeafOnly({ attribute_type: "Integer", value: 3 });
    expect(attr).toBeInstanceOf(IntegerAttribute);
    expect(attr.value).toBe(3);
    expect(constructLeafOnly({ attribute_type: "StringList", value: ["a"] })).toBeInstanceOf(StringListAttribute);
  });

  test("passes the remaining keys as parameters", () => {
    const attr = constructLeafOnly({ attribute_type: "BoundedInteger", value: 3, min: 0, max: 4 });
    expect(attr.toJSON()).toEqual({ attribute_type: "BoundedInteger", value: 3, min: 0, max: 4 });
  });

  test("does not know the compound types", () => {
    const error = captureError(() => constructLeafOnly({ attribute_type: "Observation", value: { id: "s1" } }));
    expect(error).toBeInstanceOf(UnknownTypeError);
    expect(error.message).toBe("Could not locate type: Observation.");
  });

  test("requires attribute_type and an explicit value", () => {
    expect(() => constructLeafOnly({ value: 3 })).toThrow(UnknownTypeError);

    const error = captureError(() => constructLeafOnly({ attribute_type: "Integer" }));
    expect(error).toBeInstanceOf(MissingValueError);
    expect(error).toBeInstanceOf(StructuralError);
  });

  test("rejects inputs that are not mappings", () => {
    expect(() => constructLeafOnly([1, 2])).toThrow(StructuralError);
    expect(() => constructLeafOnly("Integer")).toThrow(StructuralError);
  });

  test("leaves the input untouched", () => {
    const raw = { attribute_type: "OptionString", value: "a", options: ["a", "b"] };
    const copy = structuredClone(raw);
    constructLeafOnly(raw);
    expect(raw).toEqual(copy);
  });
});

describe("isLeafTypeTag", () => {
  test("recognizes registered leaf tags only", () => {
    expect(isLeafTypeTag("BoundedFloatList")).toBe(true);
    expect(isLeafTypeTag("FeatureSet")).toBe(false);
    expect(isLeafTypeTag("toString")).toBe(false);
  });
});
