/**
 * User Store - Shared Utilities
 *
 * Central export for the storage layer used by persistence adapters.
 *
 * Modules:
 * - Table Gateway: DynamoDB access behind the TableGateway port
 * - Storage: document collections, unique indexes, query planning
 * - Logger: structured JSON-line logging
 * - Errors: storage error classes with stable codes
 * - Constants: single-table key segments and limits
 * - Type Guards: runtime narrowing of raw table items
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Table Gateway
// =============================================================================

export {
    DynamoTableGateway,
    createTableGateway,
    buildCondition,
    buildEqualityFilter,
    failedWriteIndexes,
} from './dynamo-client';

export type { StorageAdapterConfig, ConditionParams } from './dynamo-client';

// =============================================================================
// Storage
// =============================================================================

export { DocumentCollection } from './storage/collection';

export type { CollectionOptions } from './storage/collection';

export type {
    TableGateway,
    TableItem,
    TableKey,
    TableWrite,
    WriteCondition,
} from './storage/types';

// Re-export modular storage operations for direct use
export * as storage from './storage';

// =============================================================================
// Logger
// =============================================================================

export {
    Logger,
    createLogger,
    isLogLevel,
} from './logger';

export type { LogLevel, LoggerOptions } from './logger';

// =============================================================================
// Errors
// =============================================================================

export {
    ErrorMessages,
    StorageError,
    DuplicateKeyError,
    WriteConflictError,
    ImmutableKeyError,
    TransactionConditionError,
    IndexOptionsConflictError,
    CannotIndexParallelArraysError,
    InvalidIndexError,
    InvalidDocumentError,
    InvalidFilterError,
} from './errors';

export type { StorageErrorCode } from './errors';

// =============================================================================
// Constants
// =============================================================================

export {
    EntityTypes,
    KeySegments,
    SortKeys,
    DEFAULT_KEY_FIELD,
    PRIMARY_KEY_INDEX_NAME,
    MAX_TRANSACTION_ITEMS,
    MAX_WRITE_ATTEMPTS,
} from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export {
    isRecord,
    isDocumentValue,
    isStoredDocument,
    isElemMatchCondition,
    isCollation,
    isDocumentItem,
    isIndexItem,
    isConstraintItem,
} from './type-guards';
