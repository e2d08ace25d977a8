/**
 * User Store - Unique Index Keys
 *
 * Derives the index keys a document holds for a unique index.
 *
 * Rules:
 * - A field whose first segment is an array is multikey: one key per element.
 * - Fields sharing that array are read from the same element, so a compound
 *   index over `oauth_accounts.oauth_name` and `oauth_accounts.account_id`
 *   holds one (name, id) pair per linked account.
 * - Fields under two different arrays cannot be indexed together.
 * - A key whose values are all missing is skipped (sparse); a missing value
 *   next to a present one is indexed as null.
 * - Strings are normalized under the index collation.
 * - A document holds each distinct key once.
 *
 * @module storage/index-keys
 */

import { createHash } from 'node:crypto';
import type {
    DocumentValue,
    IndexSpec,
    StoredDocument,
} from '@user-store/shared-types';
import { CannotIndexParallelArraysError } from '../errors';
import { normalizeValue } from './collation';
import { isDocumentMap, resolvePath } from './document-codec';

/**
 * Default index name: `<field>_1` per field, joined with `_`.
 *
 * @example
 * ```typescript
 * defaultIndexName(['email']) // 'email_1'
 * ```
 */
export function defaultIndexName(fields: string[]): string {
    return fields.map((field) => `${field}_1`).join('_');
}

function rootOf(field: string): string {
    return field.split('.')[0];
}

function arrayRoots(document: StoredDocument, fields: string[]): string[] {
    const roots = new Set<string>();
    for (const field of fields) {
        const root = rootOf(field);
        if (Array.isArray(document[root])) {
            roots.add(root);
        }
    }
    return [...roots];
}

function valueInElement(element: DocumentValue, root: string, field: string): DocumentValue | undefined {
    if (field === root) {
        return element;
    }
    if (!isDocumentMap(element)) {
        return undefined;
    }
    return resolvePath(element, field.slice(root.length + 1));
}

/**
 * Distinct keys held by `document` for `index`, in index field order.
 *
 * @throws CannotIndexParallelArraysError if the fields run through two arrays
 */
export function extractIndexKeys(document: StoredDocument, index: IndexSpec): DocumentValue[][] {
    const roots = arrayRoots(document, index.fields);
    if (roots.length > 1) {
        throw new CannotIndexParallelArraysError(index.name, roots);
    }

    let tuples: (DocumentValue | undefined)[][];

    if (roots.length === 0) {
        tuples = [index.fields.map((field) => resolvePath(document, field))];
    } else {
        const root = roots[0];
        const elements = document[root];
        tuples = (Array.isArray(elements) ? elements : []).map((element) =>
            index.fields.map((field) =>
                rootOf(field) === root ? valueInElement(element, root, field) : resolvePath(document, field)
            )
        );
    }

    const keys = new Map<string, DocumentValue[]>();
    for (const tuple of tuples) {
        if (tuple.every((value) => value === undefined)) {
            continue;
        }
        const normalized = tuple.map((value) => normalizeValue(value ?? null, index.collation));
        keys.set(JSON.stringify(normalized), normalized);
    }

    return [...keys.values()];
}

/**
 * Lookup key for an index entry: SHA-256 of the normalized values, base64url-encoded.
 * Values are passed already normalized (as produced by extractIndexKeys).
 */
export function hashIndexKey(keyValues: DocumentValue[]): string {
    return createHash('sha256').update(JSON.stringify(keyValues)).digest('base64url');
}
