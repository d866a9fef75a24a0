import { describe, expect, test } from "vitest";
import {
  BoundedFloatListAttribute,
  BoundedIntegerListAttribute,
  StringListAttribute,
  UnrestrictedStringListAttribute,
} from "../../src/attributes/list";
import { ParameterBag } from "../../src/attributes/parameters";
import {
  AttributeValueError,
  MissingParameterError,
  NullValueError,
  UnknownExtraParameterError,
} from "../../src/errors";
import { captureError } from "../support";

describe("ListAttribute", () => {
  test("shares one set of bounds across every item", () => {
    const attr = new BoundedIntegerListAttribute([1, 2, 3], ParameterBag.from({ min: 0, max: 5 }));
    expect(attr.value).toEqual([1, 2, 3]);
    expect(attr.items).toHaveLength(3);
    expect(attr.toJSON()).toEqual({ attribute_type: "BoundedIntegerList", value: [1, 2, 3], min: 0, max: 5 });
  });

  test("reports the index of the first failing item and keeps its error kind", () => {
    const error = captureError(
      () => new BoundedIntegerListAttribute([1, 9, 12], ParameterBag.from({ min: 0, max: 5 }))
    );
    expect(error).toBeInstanceOf(AttributeValueError);
    expect(error.path).toEqual([1]);
    expect(error.message).toBe("[1]: The value 9 is not within the bounds of [0,5]");
  });

  test("null items are rejected", () => {
    const error = captureError(() => new StringListAttribute(["a", null]));
    expect(error).toBeInstanceOf(NullValueError);
    expect(error.path).toEqual([1]);
  });

  test("a non-list value is a value error", () => {
    expect(() => new StringListAttribute("abc")).toThrow(AttributeValueError);
  });

  test("checks parameters for empty and null lists", () => {
    expect(() => new BoundedFloatListAttribute([], ParameterBag.from({ min: 0 }))).toThrow(MissingParameterError);
    expect(
      () => new BoundedFloatListAttribute(null, ParameterBag.from({ max: 1 }), { allowNull: true })
    ).toThrow(MissingParameterError);
    expect(() => new StringListAttribute([], ParameterBag.from({ color: "red" }))).toThrow(
      UnknownExtraParameterError
    );
  });

  test("empty lists serialize as empty lists", () => {
    expect(new BoundedFloatListAttribute([], ParameterBag.from({ min: 0, max: 1 })).toJSON()).toEqual({
      attribute_type: "BoundedFloatList",
      value: [],
      min: 0,
      max: 1,
    });
  });

  test("items are normalized by their own type", () => {
    expect(new StringListAttribute(["gene A", "gene B"]).value).toEqual(["gene_A", "gene_B"]);
    expect(new UnrestrictedStringListAttribute(["gene A", 3]).value).toEqual(["gene A", "3"]);
  });
});
