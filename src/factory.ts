/**
 * Top-level attribute factory
 *
 * `construct` accepts every registered tag, including the compound Element
 * and ElementSet kinds. Nested attributes inside an Element go through the
 * leaf-only registry instead (see `attributes/registry.ts`).
 *
 * @module factory
 */

import type { BaseAttribute } from "./attributes/base";
import {
  type AttributeConstructor,
  LEAF_ATTRIBUTES,
  dispatch,
  readAttributeOptions,
} from "./attributes/registry";
import { ELEMENT_KINDS } from "./elements/element";
import { ELEMENT_SET_KINDS } from "./elements/element-set";
import type { AttributeOptions, TypeTag } from "./types";

export const ATTRIBUTES = {
  ...LEAF_ATTRIBUTES,
  ...ELEMENT_KINDS,
  ...ELEMENT_SET_KINDS,
} as const satisfies { [K in TypeTag]: AttributeConstructor<BaseAttribute<unknown>> };

/**
 * Instance type of any registered attribute
 */
export type Attribute = InstanceType<(typeof ATTRIBUTES)[TypeTag]>;

export function isTypeTag(tag: string): tag is TypeTag {
  return Object.hasOwn(ATTRIBUTES, tag);
}

/**
 * Build any attribute from its JSON form
 *
 * @example
 * ```typescript
 * const pval = construct({ attribute_type: "BoundedFloat", value: 0.05, min: 0, max: 1 });
 * pval.toJSON(); // { attribute_type: "BoundedFloat", value: 0.05, min: 0, max: 1 }
 * ```
 */
export function construct(raw: unknown, options: AttributeOptions = {}): Attribute {
  return dispatch<Attribute>(raw, readAttributeOptions(options), (tag) => (isTypeTag(tag) ? ATTRIBUTES[tag] : undefined));
}
