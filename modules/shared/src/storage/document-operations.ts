/**
 * User Store - Document Storage Operations
 *
 * DynamoDB operations for documents and the unique constraint items that
 * enforce their indexes.
 *
 * Key Pattern:
 *   Document:   PK: <collection>#DOC#<key>                   SK: DOCUMENT
 *   Constraint: PK: <collection>#UNIQUE#<index>#<key hash>   SK: CONSTRAINT
 *
 * Every write is a single TransactWriteItems call, so a document and its
 * constraint items change together or not at all.
 *
 * @module storage/document-operations
 */

import type {
    ConstraintItem,
    DeleteOneResult,
    DocumentItem,
    DocumentValue,
    IndexSpec,
    ReplaceOneResult,
    StoredDocument,
} from '@user-store/shared-types';
import { EntityTypes, MAX_WRITE_ATTEMPTS, PRIMARY_KEY_INDEX_NAME, SortKeys } from '../constants';
import {
    CannotIndexParallelArraysError,
    DuplicateKeyError,
    ImmutableKeyError,
    InvalidDocumentError,
    TransactionConditionError,
    WriteConflictError,
} from '../errors';
import { isConstraintItem, isDocumentItem } from '../type-guards';
import { valuesEqual } from './collation';
import { extractIndexKeys, hashIndexKey } from './index-keys';
import { constraintKey, documentItemKey } from './keys';
import type { TableGateway, TableKey, TableWrite } from './types';

// =============================================================================
// Item Builders
// =============================================================================

interface ConstraintEntry {
    index: IndexSpec;
    keyValues: DocumentValue[];
    key: TableKey;
}

/**
 * Read the key field of a document.
 *
 * @throws InvalidDocumentError if the key field is not a non-empty string
 */
export function documentKeyOf(document: StoredDocument, keyField: string): string {
    const value = document[keyField];
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidDocumentError(keyField, 'key field must be a non-empty string');
    }
    return value;
}

function buildDocumentItem(
    collection: string,
    key: string,
    document: StoredDocument,
    version: number,
    createdAt: string,
    now: string
): DocumentItem {
    return {
        PK: documentItemKey(collection, key).PK,
        SK: SortKeys.DOCUMENT,
        entityType: EntityTypes.DOCUMENT,
        collection,
        documentKey: key,
        version,
        document,
        createdAt,
        updatedAt: now,
    };
}

function buildConstraintItem(
    collection: string,
    entry: ConstraintEntry,
    key: string,
    now: string
): ConstraintItem {
    return {
        PK: entry.key.PK,
        SK: SortKeys.CONSTRAINT,
        entityType: EntityTypes.UNIQUE_CONSTRAINT,
        collection,
        indexName: entry.index.name,
        documentKey: key,
        keyValues: entry.keyValues,
        createdAt: now,
        updatedAt: now,
    };
}

function constraintEntries(
    collection: string,
    document: StoredDocument,
    indexes: IndexSpec[]
): ConstraintEntry[] {
    return indexes.flatMap((index) =>
        extractIndexKeys(document, index).map((keyValues) => ({
            index,
            keyValues,
            key: constraintKey(collection, index.name, hashIndexKey(keyValues)),
        }))
    );
}

/**
 * Constraint entries an already stored document can hold. Indexes created
 * after the document was written may be unindexable for it; those are skipped.
 */
function heldConstraintEntries(
    collection: string,
    document: StoredDocument,
    indexes: IndexSpec[]
): ConstraintEntry[] {
    return indexes.flatMap((index) => {
        try {
            return constraintEntries(collection, document, [index]);
        } catch (err) {
            if (err instanceof CannotIndexParallelArraysError) {
                return [];
            }
            throw err;
        }
    });
}

function primaryKeyIndexName(indexes: IndexSpec[], keyField: string): string {
    const keyIndex = indexes.find(
        (index) => index.fields.length === 1 && index.fields[0] === keyField && !index.collation
    );
    return keyIndex?.name ?? PRIMARY_KEY_INDEX_NAME;
}

// =============================================================================
// Reads
// =============================================================================

/**
 * Fetch a document item by key.
 *
 * @returns DocumentItem or null if not found
 */
export async function getDocumentItem(
    gateway: TableGateway,
    collection: string,
    key: string
): Promise<DocumentItem | null> {
    const item = await gateway.getItem(documentItemKey(collection, key));
    return isDocumentItem(item) ? item : null;
}

/**
 * Fetch the document item holding an index key.
 * Returns null when no constraint item exists or its document is gone.
 */
export async function getDocumentItemByIndexKey(
    gateway: TableGateway,
    collection: string,
    index: IndexSpec,
    keyValues: DocumentValue[]
): Promise<DocumentItem | null> {
    const constraint = await gateway.getItem(constraintKey(collection, index.name, hashIndexKey(keyValues)));
    if (!isConstraintItem(constraint)) {
        return null;
    }
    return getDocumentItem(gateway, collection, constraint.documentKey);
}

/**
 * Iterate over every document item of a collection (full table scan).
 */
export async function* scanDocumentItems(
    gateway: TableGateway,
    collection: string
): AsyncGenerator<DocumentItem> {
    for await (const page of gateway.scanPages({ entityType: EntityTypes.DOCUMENT, collection })) {
        for (const item of page) {
            if (isDocumentItem(item)) {
                yield item;
            }
        }
    }
}

// =============================================================================
// Writes
// =============================================================================

/**
 * Insert a new document together with its unique constraint items.
 *
 * @returns The document key
 * @throws DuplicateKeyError if the key or any unique index key is taken
 */
export async function insertDocument(
    gateway: TableGateway,
    collection: string,
    keyField: string,
    document: StoredDocument,
    indexes: IndexSpec[]
): Promise<string> {
    const key = documentKeyOf(document, keyField);
    const now = new Date().toISOString();
    const entries = constraintEntries(collection, document, indexes);

    const writes: TableWrite[] = [
        {
            type: 'put',
            item: buildDocumentItem(collection, key, document, 1, now, now),
            condition: { kind: 'not_exists' },
        },
        ...entries.map((entry): TableWrite => ({
            type: 'put',
            item: buildConstraintItem(collection, entry, key, now),
            condition: { kind: 'not_exists' },
        })),
    ];

    try {
        await gateway.transactWrite(writes);
    } catch (err) {
        if (!(err instanceof TransactionConditionError)) {
            throw err;
        }
        const failed = err.failedWrites[0];
        if (failed === 0) {
            throw new DuplicateKeyError(collection, primaryKeyIndexName(indexes, keyField), [key]);
        }
        const entry = entries[failed - 1];
        if (!entry) {
            throw err;
        }
        throw new DuplicateKeyError(collection, entry.index.name, entry.keyValues);
    }

    return key;
}

/**
 * Constraint entries whose items are currently held by the document `key`.
 * Items held by another document, or already gone, are left alone.
 */
async function ownedConstraintEntries(
    gateway: TableGateway,
    key: string,
    entries: ConstraintEntry[]
): Promise<ConstraintEntry[]> {
    const owners = await Promise.all(entries.map((entry) => gateway.getItem(entry.key)));
    return entries.filter((_, position) => {
        const owner = owners[position];
        return isConstraintItem(owner) && owner.documentKey === key;
    });
}

function releaseWrite(entry: ConstraintEntry, key: string): TableWrite {
    return { type: 'delete', key: entry.key, condition: { kind: 'absent_or_owned', documentKey: key } };
}

/**
 * Replace the document stored under `key` with `document`.
 *
 * Nothing is written when no document has the key. Constraint items for keys
 * the new document holds are (re)written; those it held and no longer holds
 * are deleted. When the stored document changes between the read and the
 * write, the cycle runs again against the new version, so a document deleted
 * meanwhile is reported as not matched.
 *
 * @throws ImmutableKeyError if the replacement carries a different key
 * @throws DuplicateKeyError if the replacement takes a unique key held by another document
 * @throws WriteConflictError if the document kept changing for MAX_WRITE_ATTEMPTS cycles
 */
export async function replaceDocument(
    gateway: TableGateway,
    collection: string,
    keyField: string,
    key: string,
    document: StoredDocument,
    indexes: IndexSpec[]
): Promise<ReplaceOneResult> {
    if (document[keyField] !== key) {
        throw new ImmutableKeyError(keyField, key, document[keyField]);
    }

    const entries = constraintEntries(collection, document, indexes);
    const held = new Set(entries.map((entry) => entry.key.PK));

    for (let attempt = 1; ; attempt += 1) {
        const current = await getDocumentItem(gateway, collection, key);
        if (!current) {
            return { matchedCount: 0, modifiedCount: 0 };
        }
        if (valuesEqual(current.document, document)) {
            return { matchedCount: 1, modifiedCount: 0 };
        }

        const now = new Date().toISOString();
        const released = await ownedConstraintEntries(
            gateway,
            key,
            heldConstraintEntries(collection, current.document, indexes).filter((entry) => !held.has(entry.key.PK))
        );

        const writes: TableWrite[] = [
            {
                type: 'put',
                item: buildDocumentItem(collection, key, document, current.version + 1, current.createdAt, now),
                condition: { kind: 'version', version: current.version },
            },
            ...entries.map((entry): TableWrite => ({
                type: 'put',
                item: buildConstraintItem(collection, entry, key, now),
                condition: { kind: 'absent_or_owned', documentKey: key },
            })),
            ...released.map((entry) => releaseWrite(entry, key)),
        ];

        try {
            await gateway.transactWrite(writes);
            return { matchedCount: 1, modifiedCount: 1 };
        } catch (err) {
            if (!(err instanceof TransactionConditionError)) {
                throw err;
            }
            // Position 0 is the document; 1..entries.length the claimed keys; the rest releases
            const failed = err.failedWrites[0];
            const entry = failed > 0 ? entries[failed - 1] : undefined;
            if (entry) {
                throw new DuplicateKeyError(collection, entry.index.name, entry.keyValues);
            }
            if (attempt >= MAX_WRITE_ATTEMPTS) {
                throw new WriteConflictError(collection, key);
            }
        }
    }
}

/**
 * Delete the document stored under `key` and the constraint items it holds.
 * Deleting a missing document is not an error, including one deleted by a
 * concurrent writer after it was read.
 *
 * @throws WriteConflictError if the document kept changing for MAX_WRITE_ATTEMPTS cycles
 */
export async function deleteDocument(
    gateway: TableGateway,
    collection: string,
    key: string,
    indexes: IndexSpec[]
): Promise<DeleteOneResult> {
    for (let attempt = 1; ; attempt += 1) {
        const current = await getDocumentItem(gateway, collection, key);
        if (!current) {
            return { deletedCount: 0 };
        }

        const released = await ownedConstraintEntries(
            gateway,
            key,
            heldConstraintEntries(collection, current.document, indexes)
        );

        const writes: TableWrite[] = [
            {
                type: 'delete',
                key: documentItemKey(collection, key),
                condition: { kind: 'version', version: current.version },
            },
            ...released.map((entry) => releaseWrite(entry, key)),
        ];

        try {
            await gateway.transactWrite(writes);
            return { deletedCount: 1 };
        } catch (err) {
            if (!(err instanceof TransactionConditionError)) {
                throw err;
            }
            if (attempt >= MAX_WRITE_ATTEMPTS) {
                throw new WriteConflictError(collection, key);
            }
        }
    }
}

// =============================================================================
// Index Builds
// =============================================================================

/**
 * Write the constraint items of one stored document for `index`. The
 * document is rewritten unchanged under a version condition so that the
 * items are never written for a version that was replaced or deleted.
 */
async function indexStoredDocument(
    gateway: TableGateway,
    collection: string,
    index: IndexSpec,
    stored: DocumentItem
): Promise<void> {
    let current: DocumentItem | null = stored;

    for (let attempt = 1; current; attempt += 1) {
        const item: DocumentItem = current;
        const entries = constraintEntries(collection, item.document, [index]);
        if (entries.length === 0) {
            return;
        }

        const now = new Date().toISOString();
        const writes: TableWrite[] = [
            { type: 'put', item, condition: { kind: 'version', version: item.version } },
            ...entries.map((entry): TableWrite => ({
                type: 'put',
                item: buildConstraintItem(collection, entry, item.documentKey, now),
                condition: { kind: 'absent_or_owned', documentKey: item.documentKey },
            })),
        ];

        try {
            await gateway.transactWrite(writes);
            return;
        } catch (err) {
            if (!(err instanceof TransactionConditionError)) {
                throw err;
            }
            const failed = err.failedWrites[0];
            const entry = failed > 0 ? entries[failed - 1] : undefined;
            if (entry) {
                throw new DuplicateKeyError(collection, index.name, entry.keyValues);
            }
            if (attempt >= MAX_WRITE_ATTEMPTS) {
                throw new WriteConflictError(collection, item.documentKey);
            }
            current = await getDocumentItem(gateway, collection, item.documentKey);
        }
    }
}

/**
 * Index every document stored in the collection under `index`.
 * Safe to run again after a failure: items already written are kept.
 *
 * @returns Number of documents scanned
 * @throws DuplicateKeyError if two documents hold the same index key
 * @throws CannotIndexParallelArraysError if a document cannot be indexed
 */
export async function indexExistingDocuments(
    gateway: TableGateway,
    collection: string,
    index: IndexSpec
): Promise<number> {
    let scanned = 0;
    for await (const item of scanDocumentItems(gateway, collection)) {
        await indexStoredDocument(gateway, collection, index, item);
        scanned += 1;
    }
    return scanned;
}
