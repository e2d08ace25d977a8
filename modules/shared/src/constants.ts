/**
 * User Store - Storage Constants
 *
 * Key segments, entity discriminators and limits of the single-table layout.
 * All values are immutable (as const) for type safety.
 */

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Entity type discriminators for DynamoDB items.
 * Used in type guards to narrow raw table items.
 */
export const EntityTypes = {
    DOCUMENT: 'DOCUMENT',
    INDEX: 'INDEX',
    UNIQUE_CONSTRAINT: 'UNIQUE_CONSTRAINT',
} as const;

// =============================================================================
// Key Segments
// =============================================================================

/**
 * Partition key segments placed after the collection name.
 *
 *   <collection>#DOC#<key>
 *   <collection>#INDEXES
 *   <collection>#UNIQUE#<index>#<hash>
 */
export const KeySegments = {
    DOCUMENT: 'DOC',
    INDEXES: 'INDEXES',
    UNIQUE: 'UNIQUE',
} as const;

/** Sort key values */
export const SortKeys = {
    DOCUMENT: 'DOCUMENT',
    CONSTRAINT: 'CONSTRAINT',
    INDEX_PREFIX: 'INDEX#',
} as const;

// =============================================================================
// Collection Defaults
// =============================================================================

/** Key field used when a collection is created without one */
export const DEFAULT_KEY_FIELD = 'id';

/** Name reported for a duplicate primary key when no index covers the key field */
export const PRIMARY_KEY_INDEX_NAME = '_key_';

// =============================================================================
// DynamoDB Limits
// =============================================================================

/** Maximum number of actions in one TransactWriteItems request */
export const MAX_TRANSACTION_ITEMS = 100;

/** Read-and-write cycles attempted on one document before a WriteConflictError */
export const MAX_WRITE_ATTEMPTS = 5;
