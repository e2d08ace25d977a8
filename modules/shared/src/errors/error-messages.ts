/**
 * User Store - Error Messages
 *
 * Human-readable descriptions for storage error codes.
 * Error instances append the specific detail after a colon.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Write Errors
    // -------------------------------------------------------------------------

    /** A unique index already holds the key */
    DUPLICATE_KEY: 'Duplicate key violates unique index',

    /** The document changed between read and write */
    WRITE_CONFLICT: 'Document was modified concurrently',

    /** A replacement tried to change the key field */
    IMMUTABLE_KEY: 'The key field of a document cannot be changed',

    /** A transaction condition failed */
    CONDITION_FAILED: 'Transaction condition check failed',

    /** More actions than DynamoDB accepts in one transaction */
    TRANSACTION_TOO_LARGE: 'Write exceeds the maximum number of transaction items',

    // -------------------------------------------------------------------------
    // Index Errors
    // -------------------------------------------------------------------------

    /** Same index name (or same key pattern) with different options */
    INDEX_OPTIONS_CONFLICT: 'An index with the same name or key pattern exists with different options',

    /** Index fields run through two different arrays */
    CANNOT_INDEX_PARALLEL_ARRAYS: 'Cannot index parallel arrays',

    /** Index field list is empty or names an invalid path */
    INVALID_INDEX: 'Index definition is not valid',

    // -------------------------------------------------------------------------
    // Input Errors
    // -------------------------------------------------------------------------

    /** Value cannot be represented as a stored document */
    INVALID_DOCUMENT: 'Document cannot be stored',

    /** Filter shape is not supported for this operation */
    INVALID_FILTER: 'Filter is not supported',
} as const;

export type StorageErrorCode = keyof typeof ErrorMessages;
