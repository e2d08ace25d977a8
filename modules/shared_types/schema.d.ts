/**
 * User Store - DynamoDB Schema Types
 *
 * Single Table Design interfaces for every item a document collection writes.
 *
 * Key Patterns:
 *   - Document:          PK=<collection>#DOC#<key>                    SK=DOCUMENT
 *   - Index definition:  PK=<collection>#INDEXES                      SK=INDEX#<name>
 *   - Unique constraint: PK=<collection>#UNIQUE#<index>#<key hash>    SK=CONSTRAINT
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import type { BaseItem } from './base';
import type { Collation, DocumentValue, StoredDocument } from './document';

export type { SKValue, EntityType, BaseItem } from './base';

// =============================================================================
// Document Item
// =============================================================================

export interface DocumentItem extends BaseItem {
    SK: 'DOCUMENT';
    entityType: 'DOCUMENT';

    /** Value of the collection's key field */
    documentKey: string;

    /** Incremented on every replace; guards concurrent writers */
    version: number;

    /** The serialized entity */
    document: StoredDocument;
}

// =============================================================================
// Index Definition Item
// =============================================================================

export interface IndexItem extends BaseItem {
    SK: `INDEX#${string}`;
    entityType: 'INDEX';

    name: string;
    fields: string[];
    unique: true;
    collation?: Collation;

    /** false until the documents stored before the index was defined are indexed */
    ready: boolean;
}

// =============================================================================
// Unique Constraint Item
// =============================================================================

/**
 * One item per distinct index key held by a document. Written in the same
 * transaction as the document with an attribute_not_exists condition.
 */
export interface ConstraintItem extends BaseItem {
    SK: 'CONSTRAINT';
    entityType: 'UNIQUE_CONSTRAINT';

    indexName: string;

    /** Key of the document holding this index key */
    documentKey: string;

    /** Index key values after collation normalization, in index field order */
    keyValues: DocumentValue[];
}

// =============================================================================
// Union Type for All Items
// =============================================================================

export type StorageItem = DocumentItem | IndexItem | ConstraintItem;
