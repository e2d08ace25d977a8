/**
 * User Store - Document Codec
 *
 * Converts entity values into storable documents and reads values back
 * out of documents by dotted path.
 *
 * Conversion rules:
 * - undefined fields are dropped; undefined array elements become null
 * - Date becomes its ISO 8601 string
 * - numbers must be finite
 * - field names must be non-empty, must not start with "$" and must not contain "."
 * - functions, symbols and bigints are rejected
 *
 * @module storage/document-codec
 */

import type { DocumentMap, DocumentValue, StoredDocument } from '@user-store/shared-types';
import { InvalidDocumentError } from '../errors';
import { isRecord } from '../type-guards';

// =============================================================================
// Serialization
// =============================================================================

function joinPath(path: string, field: string): string {
    return path ? `${path}.${field}` : field;
}

function assertFieldName(path: string, field: string): void {
    if (field.length === 0) {
        throw new InvalidDocumentError(path, 'has an empty field name');
    }
    if (field.startsWith('$')) {
        throw new InvalidDocumentError(joinPath(path, field), 'field names must not start with "$"');
    }
    if (field.includes('.')) {
        throw new InvalidDocumentError(joinPath(path, field), 'field names must not contain "."');
    }
}

function toDocumentValue(value: unknown, path: string): DocumentValue | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new InvalidDocumentError(path, 'is not a finite number');
        }
        return value;
    }
    if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
            throw new InvalidDocumentError(path, 'is an invalid date');
        }
        return value.toISOString();
    }
    if (Array.isArray(value)) {
        return value.map((element, position) => toDocumentValue(element, joinPath(path, String(position))) ?? null);
    }
    if (isRecord(value)) {
        const converted: DocumentMap = {};
        for (const [field, nested] of Object.entries(value)) {
            assertFieldName(path, field);
            const convertedValue = toDocumentValue(nested, joinPath(path, field));
            if (convertedValue !== undefined) {
                converted[field] = convertedValue;
            }
        }
        return converted;
    }

    throw new InvalidDocumentError(path, `has unsupported type ${typeof value}`);
}

/**
 * Serialize an entity into a StoredDocument.
 *
 * @throws InvalidDocumentError if the value is not an object or holds unsupported values
 */
export function toStoredDocument(value: unknown): StoredDocument {
    if (!isRecord(value)) {
        throw new InvalidDocumentError('', 'must be an object');
    }

    const converted = toDocumentValue(value, '');
    if (!isDocumentMap(converted)) {
        throw new InvalidDocumentError('', 'must be an object');
    }
    return converted;
}

// =============================================================================
// Path Access
// =============================================================================

export function isDocumentMap(value: DocumentValue | undefined): value is DocumentMap {
    return value !== undefined && value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Value at a dotted path, walking nested maps only.
 * Returns undefined when any segment is missing or crosses a non-map.
 */
export function resolvePath(document: StoredDocument, path: string): DocumentValue | undefined {
    let current: DocumentValue | undefined = document;

    for (const segment of path.split('.')) {
        if (!isDocumentMap(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
            return undefined;
        }
        current = current[segment];
    }

    return current;
}

/**
 * Every value reachable through a dotted path, descending into arrays of
 * maps along the way (`oauth_accounts.account_id` yields one value per account).
 */
export function collectPathValues(value: DocumentValue | undefined, segments: string[]): DocumentValue[] {
    if (value === undefined) {
        return [];
    }
    if (segments.length === 0) {
        return [value];
    }

    const [head, ...rest] = segments;

    if (Array.isArray(value)) {
        return value.flatMap((element) =>
            isDocumentMap(element) && Object.prototype.hasOwnProperty.call(element, head)
                ? collectPathValues(element[head], rest)
                : []
        );
    }
    if (isDocumentMap(value) && Object.prototype.hasOwnProperty.call(value, head)) {
        return collectPathValues(value[head], rest);
    }
    return [];
}
