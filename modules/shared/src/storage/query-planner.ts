/**
 * User Store - Query Planner
 *
 * Picks the cheapest way to answer findOne:
 *
 *   1. key     GetItem on the document key (filter names the key field)
 *   2. index   GetItem on a unique constraint item, then on its document
 *   3. scan    full table scan, filter evaluated in process
 *
 * A unique index answers a filter when every index field is pinned by the
 * filter to one non-null value and the index collation equals the query
 * collation. Fields under an array are only pinned through $elemMatch on
 * that array, so (name, id) of one linked account is never mixed with
 * another account's values. Whatever plan is used, the candidate document
 * is re-checked against the whole filter.
 *
 * @module storage/query-planner
 */

import type {
    Collation,
    DocumentFilter,
    DocumentScalar,
    DocumentValue,
    IndexSpec,
} from '@user-store/shared-types';
import { collationsEqual, normalizeValue } from './collation';

/** Lowest collation strength that compares strings exactly */
const EXACT_STRENGTH = 3;

export interface IndexLookup {
    index: IndexSpec;
    keyValues: DocumentValue[];
}

/**
 * Document key to fetch directly, or null when the filter does not pin the
 * key field to a string under binary comparison.
 */
export function planKeyLookup(filter: DocumentFilter, keyField: string, collation?: Collation): string | null {
    if (collation && (collation.strength ?? EXACT_STRENGTH) < EXACT_STRENGTH) {
        return null;
    }

    const value = filter[keyField];
    return typeof value === 'string' ? value : null;
}

/**
 * Flatten a filter into the single values it pins, keyed by full path.
 * Scalar conditions pin their own path when it is not dotted; $elemMatch
 * conditions pin `<array>.<sub-path>`.
 */
function pinnedValues(filter: DocumentFilter): Map<string, DocumentScalar> {
    const pinned = new Map<string, DocumentScalar>();

    for (const [path, condition] of Object.entries(filter)) {
        if (condition !== null && typeof condition === 'object') {
            for (const [subPath, expected] of Object.entries(condition.$elemMatch)) {
                pinned.set(`${path}.${subPath}`, expected);
            }
        } else if (!path.includes('.')) {
            pinned.set(path, condition);
        }
    }

    return pinned;
}

/**
 * First unique index able to answer the filter, with the key to look up.
 * Null values are never looked up: a sparse index holds no entry for them.
 */
export function planIndexLookup(
    filter: DocumentFilter,
    indexes: IndexSpec[],
    collation?: Collation
): IndexLookup | null {
    const pinned = pinnedValues(filter);

    for (const index of indexes) {
        if (!collationsEqual(index.collation, collation)) {
            continue;
        }

        const keyValues: DocumentValue[] = [];
        for (const field of index.fields) {
            const value = pinned.get(field);
            if (value === undefined || value === null) {
                break;
            }
            keyValues.push(normalizeValue(value, index.collation));
        }

        if (keyValues.length === index.fields.length) {
            return { index, keyValues };
        }
    }

    return null;
}
