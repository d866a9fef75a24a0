/**
 * Elements: identified bundles of attributes
 *
 * An Observation models a sample, a Feature a measured variable (a gene, a
 * transcript, ...). Both are plain `{id, attributes}` records whose nested
 * attributes are restricted to the leaf and list types. Equality is by id
 * alone, which is what the set algebra in `element-set.ts` relies on.
 *
 * @module elements/element
 */

import { ELEMENT_ATTRIBUTES_KEY, ELEMENT_ID_KEY } from "../constants";
import { NullValueError, StructuralError, rethrowAt } from "../errors";
import { BaseAttribute } from "../attributes/base";
import { ParameterBag } from "../attributes/parameters";
import { type AttributeConstructor, type LeafAttribute, constructLeafOnly } from "../attributes/registry";
import { StringAttribute } from "../attributes/string";
import type { AttributeJSON, AttributeOptions, ElementJSON, ElementTypeTag, JsonValue } from "../types";
import { isRecord } from "../types";

export interface ElementValue {
  readonly id: string;
  readonly attributes: Readonly<Record<string, LeafAttribute>>;
}

const ELEMENT_KEYS: ReadonlySet<string> = new Set([ELEMENT_ID_KEY, ELEMENT_ATTRIBUTES_KEY]);

export abstract class Element extends BaseAttribute<ElementValue> {
  abstract override readonly typeTag: ElementTypeTag;

  /** Whether nested attributes may hold null */
  readonly permitNullAttributes: boolean;

  protected constructor(options: AttributeOptions) {
    super(options);
    this.permitNullAttributes = options.permitNullAttributes ?? false;
  }

  protected populate(raw: unknown, params: ParameterBag): void {
    this.assign(raw, (v) => this.parse(v));
    this.finish(params);
  }

  private parse(raw: unknown): ElementValue {
    if (!isRecord(raw)) {
      throw new StructuralError(`A ${this.typeTag} must be given as a mapping with an "${ELEMENT_ID_KEY}" key.`);
    }
    const extras = Object.keys(raw).filter((key) => !ELEMENT_KEYS.has(key));
    if (extras.length > 0 && !this.ignoreExtraKeys) {
      throw new StructuralError(`A ${this.typeTag} does not accept the keys: ${extras.join(", ")}`);
    }
    if (!Object.hasOwn(raw, ELEMENT_ID_KEY)) {
      throw new StructuralError(`A ${this.typeTag} requires an "${ELEMENT_ID_KEY}" key.`);
    }

    let id: string;
    try {
      id = new StringAttribute(raw[ELEMENT_ID_KEY]).toString();
    } catch (error) {
      return rethrowAt(error, ELEMENT_ID_KEY);
    }

    const rawAttributes = raw[ELEMENT_ATTRIBUTES_KEY] ?? {};
    if (!isRecord(rawAttributes)) {
      throw new StructuralError(
        `The "${ELEMENT_ATTRIBUTES_KEY}" of ${id} must be a mapping of attribute names to attributes.`
      );
    }
    // Object.fromEntries defines own keys, so a "__proto__" name stays an entry
    const attributes = Object.fromEntries(
      Object.entries(rawAttributes).map(([name, entry]): [string, LeafAttribute] => {
        try {
          return [
            name,
            constructLeafOnly(entry, { allowNull: this.permitNullAttributes, ignoreExtraKeys: this.ignoreExtraKeys }),
          ];
        } catch (error) {
          return rethrowAt(error, ELEMENT_ATTRIBUTES_KEY, name);
        }
      })
    );
    return { id, attributes };
  }

  /**
   * The validated contents; a null placeholder has none
   */
  private contents(): ElementValue {
    const value = this.value;
    if (value === null) {
      throw new NullValueError(`This ${this.typeTag} is a null placeholder and has no contents.`, this.typeTag);
    }
    return value;
  }

  get id(): string {
    return this.contents().id;
  }

  get attributes(): Readonly<Record<string, LeafAttribute>> {
    return this.contents().attributes;
  }

  /**
   * Return a copy with one more attribute
   *
   * Fails with StructuralError if `name` is taken, unless `overwrite` is set.
   */
  addAttribute(name: string, raw: unknown, overwrite = false): Element {
    const current = this.toSimpleJSON();
    if (Object.hasOwn(current.attributes, name) && !overwrite) {
      throw new StructuralError(
        `Cannot add the attribute "${name}" to ${current.id} since it already exists. ` +
          "Pass overwrite to replace it."
      );
    }
    const Kind: AttributeConstructor<Element> = ELEMENT_KINDS[this.typeTag];
    return new Kind(
      { ...current, attributes: { ...current.attributes, [name]: raw } },
      ParameterBag.empty(),
      {
        allowNull: this.allowNull,
        ignoreExtraKeys: this.ignoreExtraKeys,
        permitNullAttributes: this.permitNullAttributes,
      }
    );
  }

  /**
   * Same kind and same id; attributes are not compared
   */
  override equals(other: BaseAttribute<unknown>): boolean {
    if (!(other instanceof Element) || other.typeTag !== this.typeTag) return false;
    return (this.value?.id ?? null) === (other.value?.id ?? null);
  }

  hashKey(): string {
    return this.id;
  }

  /**
   * The `{id, attributes}` form used inside element sets
   */
  toSimpleJSON(): ElementJSON {
    const { id, attributes } = this.contents();
    return {
      id,
      attributes: Object.fromEntries(
        Object.entries(attributes).map(([name, attribute]): [string, AttributeJSON] => [name, attribute.toJSON()])
      ),
    };
  }

  protected serializeValue(): JsonValue {
    return this.toSimpleJSON();
  }

  override toString(): string {
    return this.value === null ? "null" : `${this.typeTag} (${this.id})`;
  }
}

export class Observation extends Element {
  readonly typeTag = "Observation";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params);
  }
}

export class Feature extends Element {
  readonly typeTag = "Feature";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params);
  }
}

export const ELEMENT_KINDS = {
  Observation,
  Feature,
} as const satisfies { [K in ElementTypeTag]: AttributeConstructor<Element> };
