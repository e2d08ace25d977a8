/**
 * User Store - Document Types
 *
 * Values a document collection can persist, plus the query and index
 * vocabulary of the collection driver.
 */

// =============================================================================
// Document Values
// =============================================================================

export type DocumentScalar = string | number | boolean | null;

export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMap;

export interface DocumentMap {
    [field: string]: DocumentValue;
}

/** A flat, self-describing record as persisted in a collection */
export type StoredDocument = DocumentMap;

// =============================================================================
// Collation
// =============================================================================

/**
 * Locale-aware string comparison policy.
 *
 * strength 1 compares base letters only, 2 adds accents (case-insensitive),
 * 3 and above compare exactly.
 */
export interface Collation {
    locale: string;
    strength?: 1 | 2 | 3 | 4 | 5;
}

// =============================================================================
// Filters
// =============================================================================

export interface ElemMatchCondition {
    $elemMatch: Record<string, DocumentScalar>;
}

/** Equality on a dotted path, or a conjunction over one array element */
export type FieldCondition = DocumentScalar | ElemMatchCondition;

export type DocumentFilter = Record<string, FieldCondition>;

export interface FindOptions {
    collation?: Collation;
}

// =============================================================================
// Indexes
// =============================================================================

export interface IndexSpec {
    name: string;
    fields: string[];
    unique: true;
    collation?: Collation;
}

export interface CreateIndexOptions {
    unique: true;
    /** Defaults to `<field>_1` joined with `_` */
    name?: string;
    collation?: Collation;
}

// =============================================================================
// Write Results
// =============================================================================

export interface InsertOneResult {
    insertedKey: string;
}

export interface ReplaceOneResult {
    matchedCount: number;
    modifiedCount: number;
}

export interface DeleteOneResult {
    deletedCount: number;
}
