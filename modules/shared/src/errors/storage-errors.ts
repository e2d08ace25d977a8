/**
 * User Store - Storage Error Classes
 *
 * Every error raised by the document collection extends StorageError and
 * carries a stable `code`. Driver errors that are not condition failures
 * are never wrapped: they reach the caller as the AWS SDK raised them.
 */

import type { Collation, DocumentValue } from '@user-store/shared-types';
import { ErrorMessages } from './error-messages';
import type { StorageErrorCode } from './error-messages';

// =============================================================================
// Base Class
// =============================================================================

export class StorageError extends Error {
    readonly code: StorageErrorCode;

    constructor(code: StorageErrorCode, detail?: string) {
        super(detail ? `${ErrorMessages[code]}: ${detail}` : ErrorMessages[code]);
        this.name = 'StorageError';
        this.code = code;
    }
}

// =============================================================================
// Write Errors
// =============================================================================

/**
 * A write would give two documents the same key in a unique index.
 */
export class DuplicateKeyError extends StorageError {
    readonly collection: string;
    readonly indexName: string;
    readonly keyValues: DocumentValue[];

    constructor(collection: string, indexName: string, keyValues: DocumentValue[]) {
        super('DUPLICATE_KEY', `${collection} index ${indexName} dup key ${JSON.stringify(keyValues)}`);
        this.name = 'DuplicateKeyError';
        this.collection = collection;
        this.indexName = indexName;
        this.keyValues = keyValues;
    }
}

export class WriteConflictError extends StorageError {
    readonly documentKey: string;

    constructor(collection: string, documentKey: string) {
        super('WRITE_CONFLICT', `${collection} document ${documentKey}`);
        this.name = 'WriteConflictError';
        this.documentKey = documentKey;
    }
}

export class ImmutableKeyError extends StorageError {
    constructor(keyField: string, expected: string, received: DocumentValue | undefined) {
        super('IMMUTABLE_KEY', `${keyField} ${JSON.stringify(expected)} -> ${JSON.stringify(received ?? null)}`);
        this.name = 'ImmutableKeyError';
    }
}

/**
 * Raised by a TableGateway when one or more conditions of a transaction fail.
 * `failedWrites` holds the positions of the failing actions in the request.
 */
export class TransactionConditionError extends StorageError {
    readonly failedWrites: number[];

    constructor(failedWrites: number[]) {
        super('CONDITION_FAILED', `actions ${failedWrites.join(', ')}`);
        this.name = 'TransactionConditionError';
        this.failedWrites = failedWrites;
    }
}

// =============================================================================
// Index Errors
// =============================================================================

export class IndexOptionsConflictError extends StorageError {
    readonly indexName: string;

    constructor(indexName: string, existing: { fields: string[]; collation?: Collation }) {
        super(
            'INDEX_OPTIONS_CONFLICT',
            `${indexName} (existing: ${existing.fields.join(', ')}${existing.collation ? ` collation ${JSON.stringify(existing.collation)}` : ''})`
        );
        this.name = 'IndexOptionsConflictError';
        this.indexName = indexName;
    }
}

export class CannotIndexParallelArraysError extends StorageError {
    constructor(indexName: string, arrayFields: string[]) {
        super('CANNOT_INDEX_PARALLEL_ARRAYS', `${indexName} [${arrayFields.join(', ')}]`);
        this.name = 'CannotIndexParallelArraysError';
    }
}

export class InvalidIndexError extends StorageError {
    constructor(reason: string) {
        super('INVALID_INDEX', reason);
        this.name = 'InvalidIndexError';
    }
}

// =============================================================================
// Input Errors
// =============================================================================

export class InvalidDocumentError extends StorageError {
    readonly path: string;

    constructor(path: string, reason: string) {
        super('INVALID_DOCUMENT', `${path || '<root>'} ${reason}`);
        this.name = 'InvalidDocumentError';
        this.path = path;
    }
}

export class InvalidFilterError extends StorageError {
    constructor(reason: string) {
        super('INVALID_FILTER', reason);
        this.name = 'InvalidFilterError';
    }
}
