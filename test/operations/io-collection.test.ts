import { describe, expect, test } from "vitest";
import { AttributeValueError, StructuralError } from "../../src/errors";
import { OperationInputDict, OperationOutputDict } from "../../src/operations/io-collection";
import { captureError } from "../support";
import { countsInput, normalizedOutput, thresholdInput } from "./fixtures";

describe("OperationInputDict", () => {
  const raw = { counts: countsInput, threshold: thresholdInput };

  test("keys entries by name", () => {
    const inputs = new OperationInputDict(raw);
    expect(inputs.keys()).toEqual(["counts", "threshold"]);
    expect(inputs.size).toBe(2);
    expect(inputs.has("threshold")).toBe(true);
    expect(inputs.get("counts")?.name).toBe("Count matrix");
    expect(inputs.get("missing")).toBeUndefined();
    expect(inputs.toString()).toBe("OperationInputDict with keys: counts, threshold");
  });

  test("serializes back to its input", () => {
    expect(new OperationInputDict(raw).toJSON()).toEqual(raw);
  });

  test("locates a failing entry by key", () => {
    const error = captureError(
      () => new OperationInputDict({ counts: countsInput, threshold: { ...thresholdInput, required: "yes" } })
    );
    expect(error).toBeInstanceOf(AttributeValueError);
    expect(error.path).toEqual(["threshold", "required"]);
  });

  test("must be a mapping", () => {
    expect(() => new OperationInputDict([countsInput])).toThrow(StructuralError);
  });

  test("equality is by key and entry", () => {
    const inputs = new OperationInputDict(raw);
    expect(inputs.equals(new OperationInputDict({ threshold: thresholdInput, counts: countsInput }))).toBe(true);
    expect(inputs.equals(new OperationInputDict({ counts: countsInput }))).toBe(false);
    expect(inputs.equals(new OperationInputDict({ counts: countsInput, cutoff: thresholdInput }))).toBe(false);
  });
});

describe("OperationOutputDict", () => {
  test("holds outputs", () => {
    const outputs = new OperationOutputDict({ normalized: normalizedOutput });
    expect(outputs.get("normalized")?.isUserDataResource()).toBe(true);
    expect(outputs.toJSON()).toEqual({ normalized: normalizedOutput });
  });

  test("keeps an entry named __proto__ when serializing", () => {
    const raw: unknown = JSON.parse(`{"__proto__": ${JSON.stringify(normalizedOutput)}}`);
    const outputs = new OperationOutputDict(raw);
    expect(outputs.keys()).toEqual(["__proto__"]);

    const json = outputs.toJSON();
    expect(Object.keys(json)).toEqual(["__proto__"]);
    expect(json["__proto__"]).toEqual(normalizedOutput);
  });

  test("an empty mapping is allowed", () => {
    expect(new OperationOutputDict({}).size).toBe(0);
  });
});
