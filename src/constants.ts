/**
 * Constants shared across attribute types and the structures built on them
 */

/** JSON encoding of +∞ for float attributes */
export const POSITIVE_INF_MARKER = "++inf++";

/** JSON encoding of -∞ for float attributes */
export const NEGATIVE_INF_MARKER = "--inf--";

/**
 * Longest accepted string attribute
 *
 * Catches rows mis-split by a parser (e.g. CSV read as TSV), where a whole
 * line lands in a single cell.
 */
export const MAX_STRING_LENGTH = 100;

/** Identifier grammar: a letter, then letters, digits, `.`, `-` or `_` */
export const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9._-]*$/;

export const TYPE_KEY = "attribute_type";
export const VALUE_KEY = "value";
export const DEFAULT_KEY = "default";

export const MIN_KEY = "min";
export const MAX_KEY = "max";
export const OPTIONS_KEY = "options";
export const MANY_KEY = "many";
export const RESOURCE_TYPE_KEY = "resource_type";
export const RESOURCE_TYPES_KEY = "resource_types";

export const ELEMENT_ID_KEY = "id";
export const ELEMENT_ATTRIBUTES_KEY = "attributes";
export const SET_ELEMENTS_KEY = "elements";
export const SET_MULTIPLE_KEY = "multiple";
