/**
 * Homogeneous lists of leaf attributes
 *
 * A list attribute carries one set of parameters (e.g. a single `min`/`max`)
 * and applies it to every item. Items are built with the item type's own
 * constructor, so a list fails exactly where a lone item would, with the
 * item's index added to the error path.
 *
 * @module attributes/list
 */

import { TYPE_KEY, VALUE_KEY } from "../constants";
import { AttributeValueError, rethrowAt } from "../errors";
import type { AttributeOptions, JsonValue, ListTypeTag } from "../types";
import { BaseAttribute, describeValue } from "./base";
import { BoundedFloatAttribute, BoundedIntegerAttribute } from "./numeric";
import { ParameterBag, type ParameterJSON } from "./parameters";
import { StringAttribute, UnrestrictedStringAttribute } from "./string";

/**
 * Builds one item from its raw value and a fresh copy of the shared parameters
 */
export type ItemBuilder<T> = (raw: unknown, params: ParameterBag, options: AttributeOptions) => BaseAttribute<T>;

export abstract class ListAttribute<T> extends BaseAttribute<readonly T[]> {
  abstract override readonly typeTag: ListTypeTag;

  private members: BaseAttribute<T>[] = [];
  private shared: ParameterJSON = {};

  /**
   * The constructed items, in submission order
   */
  get items(): readonly BaseAttribute<T>[] {
    return this.members;
  }

  /**
   * Validate the shared parameters, then every item against them
   *
   * The parameters are checked once against a null probe item, so they are
   * enforced even for an empty or null list.
   */
  protected populate(raw: unknown, params: ParameterBag, build: ItemBuilder<T>): void {
    const shared = Object.fromEntries(params.leftovers().map((key): [string, unknown] => [key, params.take(key)]));
    const probe = build(null, ParameterBag.from(shared), { allowNull: true, ignoreExtraKeys: this.ignoreExtraKeys });
    this.shared = Object.fromEntries(
      Object.entries(probe.toJSON()).filter(([key]) => key !== TYPE_KEY && key !== VALUE_KEY)
    );

    this.assign(raw, (v) => {
      if (!Array.isArray(v)) {
        throw new AttributeValueError(
          `A ${this.typeTag} attribute requires a list, but received "${describeValue(v)}".`,
          this.typeTag
        );
      }
      this.members = v.map((entry: unknown, index) => {
        try {
          return build(entry, ParameterBag.from(shared), { ignoreExtraKeys: this.ignoreExtraKeys });
        } catch (error) {
          return rethrowAt(error, index);
        }
      });
      return this.members.flatMap((member) => (member.value === null ? [] : [member.value]));
    });
    this.finish(params);
  }

  protected serializeValue(): JsonValue {
    return this.members.map((member) => member.toJSON().value);
  }

  protected override parameterJSON(): ParameterJSON {
    return { ...this.shared };
  }
}

/**
 * List of identifier-like strings
 */
export class StringListAttribute extends ListAttribute<string> {
  readonly typeTag = "StringList";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params, (r, p, o) => new StringAttribute(r, p, o));
  }
}

export class UnrestrictedStringListAttribute extends ListAttribute<string> {
  readonly typeTag = "UnrestrictedStringList";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params, (r, p, o) => new UnrestrictedStringAttribute(r, p, o));
  }
}

/**
 * List of integers sharing one `[min, max]`
 */
export class BoundedIntegerListAttribute extends ListAttribute<number> {
  readonly typeTag = "BoundedIntegerList";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params, (r, p, o) => new BoundedIntegerAttribute(r, p, o));
  }
}

export class BoundedFloatListAttribute extends ListAttribute<number> {
  readonly typeTag = "BoundedFloatList";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params, (r, p, o) => new BoundedFloatAttribute(r, p, o));
  }
}
