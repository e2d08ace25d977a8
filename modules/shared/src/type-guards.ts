/**
 * User Store - Type Guards
 *
 * Runtime type guards for raw DynamoDB items and document values.
 * Table reads return untyped maps; these narrow them without assertions.
 *
 * Each item guard validates:
 * - entityType discriminator matches expected value
 * - SK value matches expected value for the entity type
 * - attributes the storage layer relies on have the right shape
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type {
    Collation,
    ConstraintItem,
    DocumentItem,
    DocumentValue,
    ElemMatchCondition,
    IndexItem,
    StoredDocument,
} from '@user-store/shared-types';
import { EntityTypes, SortKeys } from './constants';

// =============================================================================
// Primitive Guards
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
    return typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(isString);
}

// =============================================================================
// Document Values
// =============================================================================

export function isDocumentValue(value: unknown): value is DocumentValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isDocumentValue);
    }
    return isStoredDocument(value);
}

export function isStoredDocument(value: unknown): value is StoredDocument {
    return isRecord(value) && Object.values(value).every(isDocumentValue);
}

export function isElemMatchCondition(value: unknown): value is ElemMatchCondition {
    return isRecord(value) && isRecord(value.$elemMatch);
}

export function isCollation(value: unknown): value is Collation {
    if (!isRecord(value) || !isString(value.locale)) {
        return false;
    }
    return (
        value.strength === undefined ||
        value.strength === 1 ||
        value.strength === 2 ||
        value.strength === 3 ||
        value.strength === 4 ||
        value.strength === 5
    );
}

// =============================================================================
// Item Guards
// =============================================================================

function hasBaseAttributes(item: Record<string, unknown>): boolean {
    return (
        isString(item.PK) &&
        isString(item.collection) &&
        isString(item.createdAt) &&
        isString(item.updatedAt)
    );
}

/**
 * Check if an item is a DocumentItem.
 * Key Pattern: PK=<collection>#DOC#<key>, SK=DOCUMENT
 */
export function isDocumentItem(item: unknown): item is DocumentItem {
    return (
        isRecord(item) &&
        item.entityType === EntityTypes.DOCUMENT &&
        item.SK === SortKeys.DOCUMENT &&
        hasBaseAttributes(item) &&
        isString(item.documentKey) &&
        typeof item.version === 'number' &&
        isStoredDocument(item.document)
    );
}

/**
 * Check if an item is an IndexItem.
 * Key Pattern: PK=<collection>#INDEXES, SK=INDEX#<name>
 */
export function isIndexItem(item: unknown): item is IndexItem {
    return (
        isRecord(item) &&
        item.entityType === EntityTypes.INDEX &&
        isString(item.SK) &&
        item.SK.startsWith(SortKeys.INDEX_PREFIX) &&
        hasBaseAttributes(item) &&
        isString(item.name) &&
        isStringArray(item.fields) &&
        item.unique === true &&
        typeof item.ready === 'boolean' &&
        (item.collation === undefined || isCollation(item.collation))
    );
}

/**
 * Check if an item is a ConstraintItem.
 * Key Pattern: PK=<collection>#UNIQUE#<index>#<hash>, SK=CONSTRAINT
 */
export function isConstraintItem(item: unknown): item is ConstraintItem {
    return (
        isRecord(item) &&
        item.entityType === EntityTypes.UNIQUE_CONSTRAINT &&
        item.SK === SortKeys.CONSTRAINT &&
        hasBaseAttributes(item) &&
        isString(item.indexName) &&
        isString(item.documentKey) &&
        Array.isArray(item.keyValues) &&
        item.keyValues.every(isDocumentValue)
    );
}
