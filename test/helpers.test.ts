import { describe, expect, test } from "vitest";
import { convertDtype } from "../src/helpers";

describe("convertDtype", () => {
  test.each([
    ["int64", "Integer"],
    ["uint8", "Integer"],
    ["Int32", "Integer"],
    ["float64", "Float"],
    ["float", "Float"],
    ["object", "String"],
    ["bool", "String"],
  ])("%s maps to %s", (dtype, expected) => {
    expect(convertDtype(dtype)).toBe(expected);
  });

  test("text columns can map to unrestricted strings", () => {
    expect(convertDtype("object", { allowUnrestrictedStrings: true })).toBe("UnrestrictedString");
    expect(convertDtype("int16", { allowUnrestrictedStrings: true })).toBe("Integer");
  });
});
