import { describe, expect, test } from "vitest";
import { ParameterBag } from "../../src/attributes/parameters";
import {
  OptionStringAttribute,
  StringAttribute,
  UnrestrictedStringAttribute,
  normalizeIdentifier,
} from "../../src/attributes/string";
import { AttributeValueError, InvalidParameterError, MissingParameterError } from "../../src/errors";

describe("normalizeIdentifier", () => {
  test("trims and replaces inner spaces with underscores", () => {
    expect(normalizeIdentifier("  Sample 1 ")).toBe("Sample_1");
    expect(normalizeIdentifier("gene.ENSG-0001_b")).toBe("gene.ENSG-0001_b");
  });

  test("requires a leading letter and a restricted alphabet", () => {
    expect(() => normalizeIdentifier("1sample")).toThrow(AttributeValueError);
    expect(() => normalizeIdentifier("_sample")).toThrow(AttributeValueError);
    expect(() => normalizeIdentifier("sample#2")).toThrow(AttributeValueError);
    expect(() => normalizeIdentifier("")).toThrow(AttributeValueError);
  });
});

describe("StringAttribute", () => {
  test("stores the normalized identifier", () => {
    const attr = new StringAttribute("Sample 1");
    expect(attr.value).toBe("Sample_1");
    expect(attr.toJSON()).toEqual({ attribute_type: "String", value: "Sample_1" });
  });

  test("rejects non-strings and overlong strings", () => {
    expect(() => new StringAttribute(7)).toThrow(AttributeValueError);
    expect(() => new StringAttribute(`a${"b".repeat(100)}`)).toThrow(AttributeValueError);
    expect(new StringAttribute(`a${"b".repeat(99)}`).value).toHaveLength(100);
  });
});

describe("UnrestrictedStringAttribute", () => {
  test("keeps text verbatim", () => {
    expect(new UnrestrictedStringAttribute("  Hello, world! ").value).toBe("  Hello, world! ");
  });

  test("stringifies other values", () => {
    expect(new UnrestrictedStringAttribute(12).value).toBe("12");
    expect(new UnrestrictedStringAttribute(false).value).toBe("false");
  });

  test("enforces the length limit", () => {
    expect(() => new UnrestrictedStringAttribute("x".repeat(101))).toThrow(AttributeValueError);
  });
});

describe("OptionStringAttribute", () => {
  const options = () => ParameterBag.from({ options: ["Male", "Female", "Unknown"] });

  test("accepts a declared option", () => {
    const attr = new OptionStringAttribute("Female", options());
    expect(attr.value).toBe("Female");
    expect(attr.toJSON()).toEqual({
      attribute_type: "OptionString",
      value: "Female",
      options: ["Male", "Female", "Unknown"],
    });
  });

  test("matching is case-sensitive", () => {
    expect(() => new OptionStringAttribute("female", options())).toThrow(AttributeValueError);
  });

  test("options are required and must all be strings", () => {
    expect(() => new OptionStringAttribute("A")).toThrow(MissingParameterError);
    expect(() => new OptionStringAttribute("A", ParameterBag.from({ options: ["A", 1] }))).toThrow(
      InvalidParameterError
    );
    expect(() => new OptionStringAttribute("A", ParameterBag.from({ options: "A" }))).toThrow(InvalidParameterError);
  });
});
