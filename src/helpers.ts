/**
 * Helpers for callers that derive attributes from tabular data
 *
 * @module helpers
 */

import type { LeafTypeTag } from "./types";

export interface ConvertDtypeOptions {
  /**
   * Map text columns to `UnrestrictedString` rather than `String` (default: false)
   */
  readonly allowUnrestrictedStrings?: boolean;
}

const INTEGER_DTYPE = /^u?int\d{0,2}/i;
const FLOAT_DTYPE = /^float\d{0,2}/i;

/**
 * Pick the attribute type for a column dtype such as `int64` or `float32`
 *
 * Anything that is neither integer nor float is treated as text.
 *
 * @example
 * ```typescript
 * convertDtype("int64"); // "Integer"
 * convertDtype("object", { allowUnrestrictedStrings: true }); // "UnrestrictedString"
 * ```
 */
export function convertDtype(
  dtype: string,
  options: ConvertDtypeOptions = {}
): Extract<LeafTypeTag, "Integer" | "Float" | "String" | "UnrestrictedString"> {
  if (INTEGER_DTYPE.test(dtype)) return "Integer";
  if (FLOAT_DTYPE.test(dtype)) return "Float";
  return options.allowUnrestrictedStrings === true ? "UnrestrictedString" : "String";
}
