/**
 * User Store - Base DynamoDB Schema Types
 *
 * Foundation interfaces for the single-table layout that backs every
 * document collection. All item types extend BaseItem for a consistent
 * key structure.
 *
 * Key Design:
 * - PK (Partition Key): collection-scoped prefix (e.g., users#DOC#<id>)
 * - SK (Sort Key): item kind (DOCUMENT, CONSTRAINT, INDEX#<name>)
 * - collection: owning collection name, used to restrict table scans
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Key Patterns (Strict Typing)
// =============================================================================

/** Sort Key values */
export type SKValue = 'DOCUMENT' | 'CONSTRAINT' | `INDEX#${string}`;

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'DOCUMENT'
    | 'INDEX'
    | 'UNIQUE_CONSTRAINT';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items written by the document collection.
 */
export interface BaseItem {
    /** Partition Key */
    PK: string;
    /** Sort Key - item kind */
    SK: SKValue;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** Name of the collection that owns the item */
    collection: string;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
