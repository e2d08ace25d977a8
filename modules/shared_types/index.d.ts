/**
 * User Store - Shared Type Definitions
 *
 * Central export for the type definitions shared by the storage binding
 * and the user store.
 *
 * Usage:
 * ```typescript
 * import type { StoredDocument, UserIdentity } from '@user-store/shared-types';
 * ```
 */

// =============================================================================
// DynamoDB Schema Types (Single Table Design)
// =============================================================================

export * from './schema';

// =============================================================================
// Documents, Filters and Indexes
// =============================================================================

export type {
    DocumentScalar,
    DocumentValue,
    DocumentMap,
    StoredDocument,
    Collation,
    ElemMatchCondition,
    FieldCondition,
    DocumentFilter,
    FindOptions,
    IndexSpec,
    CreateIndexOptions,
    InsertOneResult,
    ReplaceOneResult,
    DeleteOneResult,
} from './document';

// =============================================================================
// User Identity
// =============================================================================

export type { OAuthAccountIdentity, UserIdentity } from './user';
