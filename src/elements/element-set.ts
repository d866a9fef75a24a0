/**
 * Element sets: id-keyed collections of Observations or Features
 *
 * Unlike a native Set, a duplicate id is an error rather than a no-op, even
 * when the two elements carry identical attributes. A set with
 * `multiple: false` holds at most one element.
 *
 * @module elements/element-set
 */

import { type } from "arktype";
import { SET_ELEMENTS_KEY, SET_MULTIPLE_KEY } from "../constants";
import { AttributeValueError, NullValueError, StructuralError, rethrowAt } from "../errors";
import { BaseAttribute, describeValue } from "../attributes/base";
import { coerceBoolean } from "../attributes/boolean";
import { ParameterBag } from "../attributes/parameters";
import { type AttributeConstructor, readAttributeOptions } from "../attributes/registry";
import type {
  AttributeOptions,
  ElementJSON,
  ElementSetJSON,
  ElementSetTypeTag,
  ElementTypeTag,
  JsonValue,
  SetOperationOptions,
} from "../types";
import { SetOperationOptionsSchema, isRecord } from "../types";
import { ELEMENT_KINDS, type Element } from "./element";
import { elementDifference, elementIntersection, elementUnion, stripAttributes } from "./set-algebra";

export interface ElementSetValue {
  readonly multiple: boolean;
  readonly elements: readonly Element[];
}

export type SetOperation = "intersection" | "union" | "difference";

const SET_KEYS: ReadonlySet<string> = new Set([SET_ELEMENTS_KEY, SET_MULTIPLE_KEY]);

const MEMBER_KIND = {
  ObservationSet: "Observation",
  FeatureSet: "Feature",
} as const satisfies Record<ElementSetTypeTag, ElementTypeTag>;

function readSetOptions(options: SetOperationOptions): boolean {
  const parsed = SetOperationOptionsSchema(options);
  if (parsed instanceof type.errors) {
    throw new StructuralError(`Invalid set operation options: ${parsed.summary}`);
  }
  return parsed.ignoreAttributes ?? false;
}

export abstract class ElementSet extends BaseAttribute<ElementSetValue> {
  abstract override readonly typeTag: ElementSetTypeTag;

  /** Whether attributes of the member elements may hold null */
  readonly permitNullAttributes: boolean;

  protected constructor(options: AttributeOptions) {
    super(options);
    this.permitNullAttributes = options.permitNullAttributes ?? false;
  }

  protected populate(raw: unknown, params: ParameterBag): void {
    this.assign(raw, (v) => this.parse(v));
    this.finish(params);
  }

  private parse(raw: unknown): ElementSetValue {
    if (!isRecord(raw)) {
      throw new StructuralError(`A ${this.typeTag} must be given as a mapping with an "${SET_ELEMENTS_KEY}" key.`);
    }
    const extras = Object.keys(raw).filter((key) => !SET_KEYS.has(key));
    if (extras.length > 0 && !this.ignoreExtraKeys) {
      throw new StructuralError(`A ${this.typeTag} does not accept the keys: ${extras.join(", ")}`);
    }

    const rawMultiple = Object.hasOwn(raw, SET_MULTIPLE_KEY) ? raw[SET_MULTIPLE_KEY] : true;
    const multiple = coerceBoolean(rawMultiple);
    if (multiple === undefined) {
      throw new AttributeValueError(
        `The "${SET_MULTIPLE_KEY}" key must be boolean-like, but received "${describeValue(rawMultiple)}".`,
        this.typeTag
      ).prependPath(SET_MULTIPLE_KEY);
    }

    const rawElements = raw[SET_ELEMENTS_KEY];
    if (!Array.isArray(rawElements)) {
      throw new StructuralError(`A ${this.typeTag} requires an "${SET_ELEMENTS_KEY}" list.`);
    }
    if (!multiple && rawElements.length > 1) {
      throw new AttributeValueError(
        `A ${this.typeTag} with ${SET_MULTIPLE_KEY}=false can hold at most one element, ` +
          `but ${rawElements.length} were given.`,
        this.typeTag
      );
    }

    const Kind: AttributeConstructor<Element> = ELEMENT_KINDS[MEMBER_KIND[this.typeTag]];
    const seen = new Set<string>();
    const elements = rawElements.map((entry: unknown, index) => {
      let element: Element;
      try {
        element = new Kind(entry, ParameterBag.empty(), {
          ignoreExtraKeys: this.ignoreExtraKeys,
          permitNullAttributes: this.permitNullAttributes,
        });
      } catch (error) {
        return rethrowAt(error, SET_ELEMENTS_KEY, index);
      }
      if (seen.has(element.id)) {
        throw new StructuralError(`Tried to add a duplicate entry (${element.id}) to a ${this.typeTag}.`);
      }
      seen.add(element.id);
      return element;
    });
    return { multiple, elements };
  }

  private contents(): ElementSetValue {
    const value = this.value;
    if (value === null) {
      throw new NullValueError(`This ${this.typeTag} is a null placeholder and has no contents.`, this.typeTag);
    }
    return value;
  }

  get elements(): readonly Element[] {
    return this.contents().elements;
  }

  /** False for a singleton set */
  get multiple(): boolean {
    return this.contents().multiple;
  }

  get size(): number {
    return this.elements.length;
  }

  ids(): string[] {
    return this.elements.map((element) => element.id);
  }

  has(id: string): boolean {
    return this.elements.some((element) => element.id === id);
  }

  /**
   * Return a copy with one more element
   *
   * Fails on a duplicate id, a full singleton set, or an element of the wrong kind.
   */
  add(element: Element): ElementSet {
    const memberKind = MEMBER_KIND[this.typeTag];
    if (element.typeTag !== memberKind) {
      throw new StructuralError(`A ${this.typeTag} only holds ${memberKind} elements, not ${element.typeTag}.`);
    }
    const current = this.toSimpleJSON();
    return this.create({ ...current, elements: [...current.elements, element.toSimpleJSON()] });
  }

  /**
   * Elements present in both sets, with their attributes merged
   *
   * @throws {ConflictError} When a shared element carries an attribute with
   * different values on each side
   */
  intersect(other: ElementSet, options: SetOperationOptions = {}): ElementJSON[] {
    const [left, right] = this.operands(other, readSetOptions(options));
    return elementIntersection(left, right);
  }

  /**
   * Elements of either set; shared elements merged as in `intersect`
   */
  union(other: ElementSet, options: SetOperationOptions = {}): ElementJSON[] {
    const [left, right] = this.operands(other, readSetOptions(options));
    return elementUnion(left, right);
  }

  /**
   * Elements of this set whose id is absent from `other`
   *
   * Attributes are never compared, so no conflict can arise.
   */
  difference(other: ElementSet): Element[] {
    return elementDifference(this.elements, this.peer(other).elements);
  }

  setIntersection(other: ElementSet, options: SetOperationOptions = {}): ElementSet {
    return this.create({ [SET_MULTIPLE_KEY]: true, [SET_ELEMENTS_KEY]: this.intersect(other, options) });
  }

  setUnion(other: ElementSet, options: SetOperationOptions = {}): ElementSet {
    return this.create({ [SET_MULTIPLE_KEY]: true, [SET_ELEMENTS_KEY]: this.union(other, options) });
  }

  setDifference(other: ElementSet, options: SetOperationOptions = {}): ElementSet {
    const remaining = this.difference(other).map((element) => element.toSimpleJSON());
    return this.create({
      [SET_MULTIPLE_KEY]: true,
      [SET_ELEMENTS_KEY]: readSetOptions(options) ? stripAttributes(remaining) : remaining,
    });
  }

  isSubsetOf(other: ElementSet): boolean {
    const theirs = new Set(this.peer(other).elements.map((element) => element.id));
    return this.elements.every((element) => theirs.has(element.id));
  }

  isProperSubsetOf(other: ElementSet): boolean {
    return this.isSubsetOf(other) && this.size < other.size;
  }

  isProperSupersetOf(other: ElementSet): boolean {
    return other.isProperSubsetOf(this);
  }

  /**
   * Same kind, same `multiple` and the same ids; attributes are not compared
   */
  override equals(other: BaseAttribute<unknown>): boolean {
    if (!(other instanceof ElementSet) || other.typeTag !== this.typeTag) return false;
    if (this.value === null || other.value === null) {
      return this.value === other.value;
    }
    return this.multiple === other.multiple && this.hashKey() === other.hashKey();
  }

  /**
   * Order-independent key over the member ids
   */
  hashKey(): string {
    return JSON.stringify(this.ids().sort());
  }

  toSimpleJSON(): ElementSetJSON {
    const { multiple, elements } = this.contents();
    return { multiple, elements: elements.map((element) => element.toSimpleJSON()) };
  }

  protected serializeValue(): JsonValue {
    return this.toSimpleJSON();
  }

  override toString(): string {
    return this.value === null ? "null" : `${this.typeTag} (${this.size} elements)`;
  }

  private peer(other: ElementSet): ElementSetValue {
    if (other.typeTag !== this.typeTag) {
      throw new StructuralError(`Cannot combine a ${this.typeTag} with a ${other.typeTag}.`);
    }
    return other.contents();
  }

  private operands(other: ElementSet, ignoreAttributes: boolean): [ElementJSON[], ElementJSON[]] {
    const theirs = this.peer(other).elements.map((element) => element.toSimpleJSON());
    const ours = this.contents().elements.map((element) => element.toSimpleJSON());
    return ignoreAttributes ? [stripAttributes(ours), stripAttributes(theirs)] : [ours, theirs];
  }

  private create(value: ElementSetJSON): ElementSet {
    const Kind: AttributeConstructor<ElementSet> = ELEMENT_SET_KINDS[this.typeTag];
    return new Kind(value, ParameterBag.empty(), {
      ignoreExtraKeys: this.ignoreExtraKeys,
      permitNullAttributes: this.permitNullAttributes,
    });
  }
}

export class ObservationSet extends ElementSet {
  readonly typeTag = "ObservationSet";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params);
  }
}

export class FeatureSet extends ElementSet {
  readonly typeTag = "FeatureSet";

  constructor(raw: unknown, params: ParameterBag = ParameterBag.empty(), options: AttributeOptions = {}) {
    super(options);
    this.populate(raw, params);
  }
}

export const ELEMENT_SET_KINDS = {
  ObservationSet,
  FeatureSet,
} as const satisfies { [K in ElementSetTypeTag]: AttributeConstructor<ElementSet> };

/**
 * Fold two or more raw sets of one kind with a single operation
 *
 * Difference is not associative over more than two operands, so it takes
 * exactly two.
 */
export function combineElementSets(
  kind: ElementSetTypeTag,
  rawSets: readonly unknown[],
  operation: SetOperation,
  options: AttributeOptions & SetOperationOptions = {}
): ElementSet {
  const attributeOptions = readAttributeOptions(options);
  const Kind: AttributeConstructor<ElementSet> = ELEMENT_SET_KINDS[kind];
  const [first, ...rest] = rawSets.map((raw, index) => {
    try {
      return new Kind(raw, ParameterBag.empty(), attributeOptions);
    } catch (error) {
      return rethrowAt(error, index);
    }
  });
  if (first === undefined || rest.length === 0 || (operation === "difference" && rest.length !== 1)) {
    throw new StructuralError(
      operation === "difference"
        ? `A difference takes exactly two sets, but ${rawSets.length} were given.`
        : `At least two sets are needed for a ${operation}, but ${rawSets.length} were given.`
    );
  }

  const setOptions: SetOperationOptions = { ignoreAttributes: options.ignoreAttributes ?? false };
  return rest.reduce((acc, next) => {
    switch (operation) {
      case "intersection":
        return acc.setIntersection(next, setOptions);
      case "union":
        return acc.setUnion(next, setOptions);
      case "difference":
        return acc.setDifference(next, setOptions);
    }
  }, first);
}
