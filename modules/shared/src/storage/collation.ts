/**
 * User Store - Collation
 *
 * String comparison under a collation is done on a comparison key:
 *
 *   strength 1      base letters only (case and diacritics removed)
 *   strength 2      case-insensitive, accent-sensitive
 *   strength 3..5   exact (the default when strength is omitted)
 *
 * The same key feeds unique index entries and in-process filter matching,
 * so an index lookup and a scan agree on what "equal" means.
 *
 * @module storage/collation
 */

import type { Collation, DocumentValue } from '@user-store/shared-types';

/** Strength applied when a collation omits it */
const DEFAULT_STRENGTH = 3;

const COMBINING_MARKS = /\p{M}/gu;

/**
 * Comparison key of a string under a collation.
 * Without a collation the string is returned as is.
 */
export function collationKey(value: string, collation?: Collation): string {
    if (!collation) {
        return value;
    }

    const strength = collation.strength ?? DEFAULT_STRENGTH;

    if (strength === 1) {
        return value.normalize('NFD').replace(COMBINING_MARKS, '').toLocaleLowerCase(collation.locale);
    }
    if (strength === 2) {
        return value.normalize('NFC').toLocaleLowerCase(collation.locale);
    }
    return value;
}

/**
 * Apply collationKey to every string inside a value.
 */
export function normalizeValue(value: DocumentValue, collation?: Collation): DocumentValue {
    if (!collation) {
        return value;
    }
    if (typeof value === 'string') {
        return collationKey(value, collation);
    }
    if (Array.isArray(value)) {
        return value.map((element) => normalizeValue(element, collation));
    }
    if (value !== null && typeof value === 'object') {
        return Object.fromEntries(
            Object.entries(value).map(([field, nested]): [string, DocumentValue] => [
                field,
                normalizeValue(nested, collation),
            ])
        );
    }
    return value;
}

/**
 * Deep equality of two document values; strings compare under the collation.
 * Object field order is not significant.
 */
export function valuesEqual(left: DocumentValue, right: DocumentValue, collation?: Collation): boolean {
    if (typeof left === 'string' && typeof right === 'string') {
        return collationKey(left, collation) === collationKey(right, collation);
    }
    if (left === null || right === null || typeof left !== 'object' || typeof right !== 'object') {
        return left === right;
    }
    if (Array.isArray(left) || Array.isArray(right)) {
        return (
            Array.isArray(left) &&
            Array.isArray(right) &&
            left.length === right.length &&
            left.every((element, position) => valuesEqual(element, right[position], collation))
        );
    }

    const leftFields = Object.keys(left);
    if (leftFields.length !== Object.keys(right).length) {
        return false;
    }
    return leftFields.every((field) => field in right && valuesEqual(left[field], right[field], collation));
}

/**
 * Two collations are the same comparison policy (absent equals absent).
 */
export function collationsEqual(left?: Collation, right?: Collation): boolean {
    if (!left || !right) {
        return !left && !right;
    }
    return (
        left.locale === right.locale &&
        (left.strength ?? DEFAULT_STRENGTH) === (right.strength ?? DEFAULT_STRENGTH)
    );
}
