/**
 * User Store - Storage Adapter Types
 *
 * The TableGateway port is the only seam between the document collection
 * and DynamoDB. DynamoTableGateway implements it with the AWS SDK document
 * client; tests implement it in process.
 *
 * @module storage/types
 */

import type { StorageItem } from '@user-store/shared-types';

// =============================================================================
// Storage Adapter Configuration
// =============================================================================

/**
 * Configuration options for the DynamoDB table gateway.
 */
export interface StorageAdapterConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    /** AWS region (optional, defaults to environment) */
    region?: string;
    /** Endpoint override, e.g. a local DynamoDB (optional) */
    endpoint?: string;
}

// =============================================================================
// Table Gateway Port
// =============================================================================

/** Untyped item as returned by a table read; narrow with the type guards */
export type TableItem = Record<string, unknown>;

export interface TableKey {
    PK: string;
    SK: string;
}

/**
 * Condition attached to a single write.
 *
 * - not_exists: no item with the same key
 * - exists: an item with the same key
 * - version: the stored item's `version` equals the given value
 * - absent_or_owned: no item, or the stored item's `documentKey` equals the given key
 */
export type WriteCondition =
    | { kind: 'not_exists' }
    | { kind: 'exists' }
    | { kind: 'version'; version: number }
    | { kind: 'absent_or_owned'; documentKey: string };

export type TableWrite =
    | { type: 'put'; item: StorageItem; condition?: WriteCondition }
    | { type: 'delete'; key: TableKey; condition?: WriteCondition };

export interface TableGateway {
    /** Strongly consistent read of one item; null when absent */
    getItem(key: TableKey): Promise<TableItem | null>;

    /** Write one item; false when the condition failed */
    putItem(item: StorageItem, condition?: WriteCondition): Promise<boolean>;

    /** All items of a partition, in sort key order */
    queryPartition(pk: string): Promise<TableItem[]>;

    /** Pages of a full table scan, keeping items whose attributes equal `match` */
    scanPages(match: Record<string, string>): AsyncIterable<TableItem[]>;

    /**
     * Apply all writes atomically.
     *
     * @throws TransactionConditionError naming the writes whose condition failed
     */
    transactWrite(writes: TableWrite[]): Promise<void>;
}
