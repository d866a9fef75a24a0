/**
 * Error handling for attribute and schema validation
 *
 * Every failure raised by this library derives from AttributeSchemaError.
 * Nested structures (an Element inside an ElementSet, a spec inside an
 * operation input, ...) do not wrap errors in new types: they prepend the
 * offending key to the error's path and rethrow the same instance, so callers
 * can still branch on the concrete class.
 */

/**
 * One step into a nested input: an object key or a list index
 */
export type PathSegment = string | number;

/**
 * Render a path as `inputs.count.spec` / `elements[2].id`
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out === "" ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * Base error class for all attrspec errors
 */
export class AttributeSchemaError extends Error {
  private readonly segments: PathSegment[] = [];

  constructor(
    public readonly detail: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(detail);
    this.name = "AttributeSchemaError";
  }

  /**
   * Location of the failure within the submitted structure, outermost first
   */
  get path(): readonly PathSegment[] {
    return this.segments;
  }

  /**
   * Record that this error surfaced underneath `segment`
   *
   * Returns the same instance so it can be rethrown directly.
   */
  prependPath(segment: PathSegment): this {
    this.segments.unshift(segment);
    this.message = `${formatPath(this.segments)}: ${this.detail}`;
    return this;
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * A null value was given to an attribute that does not allow nulls
 */
export class NullValueError extends AttributeSchemaError {
  constructor(
    message: string,
    public readonly typeTag?: string
  ) {
    super(message, "NULL_VALUE");
    this.name = "NullValueError";
  }
}

/**
 * A value was present but failed the attribute's predicate
 */
export class AttributeValueError extends AttributeSchemaError {
  constructor(
    message: string,
    public readonly typeTag?: string,
    context?: string
  ) {
    super(message, "INVALID_VALUE", context);
    this.name = "AttributeValueError";
  }
}

/**
 * A parameter required by the attribute type (e.g. `min`) was not supplied
 */
export class MissingParameterError extends AttributeSchemaError {
  constructor(
    public readonly parameter: string,
    public readonly typeTag: string
  ) {
    super(`The ${typeTag} type requires a "${parameter}" parameter, which was missing.`, "MISSING_PARAMETER");
    this.name = "MissingParameterError";
  }
}

/**
 * A type-specific parameter was supplied with the wrong shape
 */
export class InvalidParameterError extends AttributeSchemaError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly typeTag: string
  ) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

/**
 * The `attribute_type` discriminator was absent or not registered
 */
export class UnknownTypeError extends AttributeSchemaError {
  constructor(
    message: string,
    public readonly typeTag?: string
  ) {
    super(message, "UNKNOWN_TYPE");
    this.name = "UnknownTypeError";
  }
}

/**
 * Parameters were left over after the attribute type consumed its own
 */
export class UnknownExtraParameterError extends AttributeSchemaError {
  constructor(
    public readonly parameters: readonly string[],
    public readonly typeTag: string
  ) {
    super(
      `The ${typeTag} type does not accept additional parameters. Received: ${parameters.join(",")}`,
      "UNKNOWN_EXTRA_PARAMETER"
    );
    this.name = "UnknownExtraParameterError";
  }
}

/**
 * Malformed container shape: wrong container type, missing or extra keys,
 * duplicate set members
 */
export class StructuralError extends AttributeSchemaError {
  constructor(message: string, context?: string) {
    super(message, "STRUCTURAL_ERROR", context);
    this.name = "StructuralError";
  }
}

function describeKeyProblems(missing: readonly string[], extra: readonly string[]): string {
  const problems: string[] = [];
  if (missing.length > 0) problems.push(`missing keys: ${missing.join(",")}`);
  if (extra.length > 0) problems.push(`extra keys: ${extra.join(",")}`);
  return problems.join("; ");
}

/**
 * A record did not carry exactly its fixed set of keys
 *
 * Missing and unexpected keys are reported together.
 */
export class KeySetError extends StructuralError {
  constructor(
    what: string,
    public readonly missing: readonly string[],
    public readonly extra: readonly string[]
  ) {
    super(`The ${what} did not have the expected keys (${describeKeyProblems(missing, extra)}).`);
    this.name = "KeySetError";
  }
}

/**
 * An attribute payload did not carry a `value` key at all
 */
export class MissingValueError extends StructuralError {
  constructor(message = 'The "value" key is required, even when the value is null.') {
    super(message);
    this.name = "MissingValueError";
  }
}

/**
 * Two elements with the same id disagree on a shared attribute
 */
export class ConflictError extends AttributeSchemaError {
  constructor(
    public readonly elementId: string,
    public readonly attributeName: string,
    public readonly left: string,
    public readonly right: string
  ) {
    super(
      `Encountered a conflict in the attributes for ${elementId}. ` +
        `The attribute "${attributeName}" has differing values of ${left} and ${right}`,
      "ATTRIBUTE_CONFLICT"
    );
    this.name = "ConflictError";
  }
}

/**
 * A resource reference named a resource type outside the caller's vocabulary
 */
export class InvalidResourceTypeError extends AttributeSchemaError {
  constructor(public readonly invalidTypes: readonly string[]) {
    super(
      `Received an invalid entry or entries when specifying a resource type. ` +
        `The following are not valid: ${invalidTypes.join(",")}`,
      "INVALID_RESOURCE_TYPE"
    );
    this.name = "InvalidResourceTypeError";
  }
}

/**
 * Fail with KeySetError unless `raw` has exactly the `expected` keys
 */
export function checkExactKeys(raw: Record<string, unknown>, expected: readonly string[], what: string): void {
  const missing = expected.filter((key) => !Object.hasOwn(raw, key));
  const extra = Object.keys(raw).filter((key) => !expected.includes(key));
  if (missing.length > 0 || extra.length > 0) {
    throw new KeySetError(what, missing, extra);
  }
}

/**
 * Rethrow `error` after recording that it happened underneath `segments`
 * (outermost first)
 *
 * Errors that did not originate in this library pass through untouched.
 */
export function rethrowAt(error: unknown, ...segments: PathSegment[]): never {
  if (error instanceof AttributeSchemaError) {
    for (const segment of [...segments].reverse()) {
      error.prependPath(segment);
    }
  }
  throw error;
}

/**
 * Remediation hints keyed by error code
 */
export const ERROR_SUGGESTIONS = {
  NULL_VALUE: "Provide a value, or mark the input as not required",
  INVALID_VALUE: "Check the value against the constraints declared for its attribute_type",
  MISSING_PARAMETER: "Add the parameter named in the message to the attribute definition",
  INVALID_PARAMETER: "Check the type of the parameter named in the message",
  UNKNOWN_TYPE: "Use one of the registered attribute_type names",
  UNKNOWN_EXTRA_PARAMETER: "Remove keys that the attribute_type does not define",
  STRUCTURAL_ERROR: "Compare the payload shape against the documented JSON layout",
  ATTRIBUTE_CONFLICT: "Resolve the differing attribute values before combining the sets",
  INVALID_RESOURCE_TYPE: "Use only resource types known to the platform",
} as const;

/**
 * Get the remediation hint for an error, if one is registered for its code
 */
export function getErrorSuggestion(error: AttributeSchemaError): string | undefined {
  const suggestions: Record<string, string> = ERROR_SUGGESTIONS;
  return suggestions[error.code];
}
