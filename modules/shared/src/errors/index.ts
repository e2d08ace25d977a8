/**
 * User Store - Error Module
 *
 * Storage error classes and their messages.
 *
 * @module errors
 */

export { ErrorMessages } from './error-messages';

export type { StorageErrorCode } from './error-messages';

export {
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
} from './storage-errors';
