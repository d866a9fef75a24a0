/**
 * Element set algebra internals
 *
 * Core algorithms over lists of `{id, attributes}` records, keyed by id.
 * Elements present on both sides are merged attribute by attribute; a name
 * carried by both with different values is a conflict, never resolved by
 * picking a side.
 *
 * Used by ElementSet as thin wrappers.
 *
 * @module elements/set-algebra
 */

import { ConflictError } from "../errors";
import { createLogger } from "../logger";
import type { AttributeJSON, ElementJSON } from "../types";
import { jsonEquals } from "../types";
import { describeValue } from "../attributes/base";

const log = createLogger("set-algebra");

/**
 * Merge the attributes of two records sharing an id
 *
 * @throws {ConflictError} When both carry an attribute under the same name
 * with different values
 */
export function mergeElements(left: ElementJSON, right: ElementJSON): ElementJSON {
  const attributes = new Map<string, AttributeJSON>(Object.entries(left.attributes));
  for (const [name, attribute] of Object.entries(right.attributes)) {
    const existing = attributes.get(name);
    if (existing !== undefined && !jsonEquals(existing, attribute)) {
      log.debug(`Conflict on ${left.id}.${name} while merging element sets`);
      throw new ConflictError(left.id, name, describeValue(existing.value), describeValue(attribute.value));
    }
    attributes.set(name, attribute);
  }
  return { id: left.id, attributes: Object.fromEntries(attributes) };
}

/**
 * Drop attributes, leaving records compared by id only
 */
export function stripAttributes(elements: readonly ElementJSON[]): ElementJSON[] {
  return elements.map((element) => ({ id: element.id, attributes: {} }));
}

/**
 * Intersection (A ∩ B): records whose id is in both, merged
 *
 * Order follows setA.
 */
export function elementIntersection(setA: readonly ElementJSON[], setB: readonly ElementJSON[]): ElementJSON[] {
  const byId = new Map(setB.map((element) => [element.id, element]));
  const result: ElementJSON[] = [];

  for (const element of setA) {
    const match = byId.get(element.id);
    if (match !== undefined) {
      result.push(mergeElements(element, match));
    }
  }

  return result;
}

/**
 * Union (A ∪ B): one-sided records unchanged, shared ones merged
 *
 * Order is setA's records, then those only in setB.
 */
export function elementUnion(setA: readonly ElementJSON[], setB: readonly ElementJSON[]): ElementJSON[] {
  const byId = new Map(setB.map((element) => [element.id, element]));
  const seen = new Set<string>();
  const result: ElementJSON[] = [];

  for (const element of setA) {
    const match = byId.get(element.id);
    result.push(match === undefined ? element : mergeElements(element, match));
    seen.add(element.id);
  }
  for (const element of setB) {
    if (!seen.has(element.id)) {
      result.push(element);
    }
  }

  return result;
}

/**
 * Difference (A - B): members of A whose id does not appear in B
 *
 * Attributes are not compared.
 */
export function elementDifference<T extends { readonly id: string }>(
  setA: readonly T[],
  setB: readonly { readonly id: string }[]
): T[] {
  const idsB = new Set(setB.map((element) => element.id));
  return setA.filter((element) => !idsB.has(element.id));
}
