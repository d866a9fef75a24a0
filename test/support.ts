/**
 * Shared test helpers
 */

import { AttributeSchemaError } from "../src/errors";

/**
 * Run `fn` and return the library error it throws
 */
export function captureError(fn: () => unknown): AttributeSchemaError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AttributeSchemaError) return error;
    throw error;
  }
  throw new Error("Expected the call to throw");
}

export const UUID_A = "6fa459ea-ee8a-4ca4-894e-db77e160355e";
export const UUID_B = "a7d3c0e2-5b1f-4e8a-9c2d-3f4b5a6c7d8e";
export const UUID_C = "0f1e2d3c-4b5a-4978-8a6b-5c4d3e2f1a0b";
