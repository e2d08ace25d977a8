/**
 * User Store - Filter Matching
 *
 * In-process evaluation of a DocumentFilter against a stored document.
 * Used by table scans and to re-check documents found through an index.
 *
 * Semantics:
 * - All fields of a filter must match (conjunction).
 * - `path: value` matches when any value reachable through the path equals
 *   `value`, or is an array holding it. `null` also matches a missing path.
 * - `path: { $elemMatch: {...} }` matches when the path holds an array with
 *   at least one map element satisfying every sub-condition.
 *
 * @module storage/filter
 */

import type {
    Collation,
    DocumentFilter,
    DocumentScalar,
    DocumentValue,
    ElemMatchCondition,
    StoredDocument,
} from '@user-store/shared-types';
import { InvalidFilterError } from '../errors';
import { isElemMatchCondition } from '../type-guards';
import { valuesEqual } from './collation';
import { collectPathValues, isDocumentMap } from './document-codec';

function matchesScalar(values: DocumentValue[], expected: DocumentScalar, collation?: Collation): boolean {
    if (values.length === 0) {
        return expected === null;
    }

    return values.some((value) =>
        valuesEqual(value, expected, collation) ||
        (Array.isArray(value) && value.some((element) => valuesEqual(element, expected, collation)))
    );
}

function matchesElement(element: DocumentValue, condition: ElemMatchCondition, collation?: Collation): boolean {
    if (!isDocumentMap(element)) {
        return false;
    }

    return Object.entries(condition.$elemMatch).every(([path, expected]) =>
        matchesScalar(collectPathValues(element, path.split('.')), expected, collation)
    );
}

/**
 * Check a filter's shape before it is evaluated or planned.
 *
 * @throws InvalidFilterError on an empty path or an unknown operator
 */
export function assertFilter(filter: DocumentFilter): void {
    for (const [path, condition] of Object.entries(filter)) {
        if (path.length === 0 || path.startsWith('$')) {
            throw new InvalidFilterError(`unsupported path "${path}"`);
        }
        if (condition !== null && typeof condition === 'object') {
            if (!isElemMatchCondition(condition) || Object.keys(condition).length !== 1) {
                throw new InvalidFilterError(`only $elemMatch is supported on "${path}"`);
            }
            if (Object.keys(condition.$elemMatch).length === 0) {
                throw new InvalidFilterError(`empty $elemMatch on "${path}"`);
            }
        }
    }
}

export function matchesFilter(document: StoredDocument, filter: DocumentFilter, collation?: Collation): boolean {
    return Object.entries(filter).every(([path, condition]) => {
        const values = collectPathValues(document, path.split('.'));

        if (condition !== null && typeof condition === 'object') {
            return values.some((value) =>
                Array.isArray(value) && value.some((element) => matchesElement(element, condition, collation))
            );
        }
        return matchesScalar(values, condition, collation);
    });
}
