/**
 * String attribute types
 *
 * `String` is for identifiers (sample names, gene symbols) and so is held to
 * a conservative grammar, since the values end up as row/column labels in
 * files read by third-party analysis tools. `UnrestrictedString` is for free
 * text. `OptionString` is a dropdown: one of a declared list.
 *
 * @module attributes/string
 */

import { type } from "arktype";
import { IDENTIFIER_PATTERN, MAX_STRING_LENGTH, OPTIONS_KEY } from "../constants";
import { AttributeValueError, InvalidParameterError } from "../errors";
import type { AttributeOptions, JsonValue, StringTypeTag } from "../types";
import { BaseAttribute, describeValue } from "./base";
import { ParameterBag, type ParameterJSON } from "./parameters";

const StringListSchema = type("string[]");

/**
 * Normalize a candidate identifier and check it against the identifier grammar
 *
 * Surrounding whitespace is trimmed and inner spaces become underscores, so
 * "Sample 1" is accepted as "Sample_1".
 */
export function normalizeIdentifier(raw: unknown, typeTag: StringTypeTag = "String"): string {
  if (typeof raw !== "string") {
    throw new AttributeValueError(`The value ${describeValue(raw)} was not a string.`, typeTag);
  }
  const name = raw.trim().replaceAll(" ", "_");
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new AttributeValueError(
      `The name "${raw}" did not match the naming requirements. Check that it starts with a letter ` +
        "and only contains letters, numbers, dots, dashes and underscores.",
      typeTag
    );
  }
  return name;
}

function checkLength(value: string, typeTag: StringTypeTag): string {
  if (value.length > MAX_STRING_LENGTH) {
    throw new AttributeValueError(
      `The submitted attribute ${value} was longer than we permit (${MAX_STRING_LENGTH} chars).`,
      typeTag
    );
  }
  return value;
}

/**
 * Identifier-like strings
 */
export class StringAttribute extends BaseAttribute<string> {
  readonly typeTag = "String";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => checkLength(normalizeIdentifier(v, this.typeTag), this.typeTag));
    this.finish(params);
  }

  protected serializeValue(value: string): JsonValue {
    return value;
  }
}

/**
 * Free text; any value is stringified as-is
 */
export class UnrestrictedStringAttribute extends BaseAttribute<string> {
  readonly typeTag = "UnrestrictedString";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.assign(raw, (v) => checkLength(typeof v === "string" ? v : describeValue(v), this.typeTag));
    this.finish(params);
  }

  protected serializeValue(value: string): JsonValue {
    return value;
  }
}

/**
 * One of a fixed list of strings (case-sensitive)
 */
export class OptionStringAttribute extends BaseAttribute<string> {
  readonly typeTag = "OptionString";
  readonly options: readonly string[];

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    const declared = StringListSchema(params.require(OPTIONS_KEY, this.typeTag));
    if (declared instanceof type.errors) {
      throw new InvalidParameterError(
        `The ${OPTIONS_KEY} parameter must be a list of strings: ${declared.summary}`,
        OPTIONS_KEY,
        this.typeTag
      );
    }
    this.options = [...declared];
    this.assign(raw, (v) => {
      if (typeof v !== "string" || !this.options.includes(v)) {
        throw new AttributeValueError(
          `The value "${describeValue(v)}" was not among the valid options: ${this.options.join(", ")}`,
          this.typeTag
        );
      }
      return v;
    });
    this.finish(params);
  }

  protected serializeValue(value: string): JsonValue {
    return value;
  }

  protected override parameterJSON(): ParameterJSON {
    return { [OPTIONS_KEY]: [...this.options] };
  }
}
