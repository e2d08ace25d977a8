/**
 * User Store - Index Definition Operations
 *
 * Index definitions live in one partition per collection:
 *   PK: <collection>#INDEXES
 *   SK: INDEX#<name>
 *
 * Creating an index is idempotent: the same name with the same options is a
 * no-op, so every process may ensure its indexes on startup or on first use.
 * A definition is only used for lookups once it is ready.
 *
 * @module storage/index-operations
 */

import type { IndexItem, IndexSpec } from '@user-store/shared-types';
import { EntityTypes } from '../constants';
import { IndexOptionsConflictError } from '../errors';
import { isIndexItem } from '../type-guards';
import { collationsEqual } from './collation';
import { indexDefinitionKey, indexesPartition } from './keys';
import type { TableGateway } from './types';

export interface IndexDefinition {
    spec: IndexSpec;
    /** false while documents stored before the definition are being indexed */
    ready: boolean;
}

export interface SavedIndexDefinition {
    /** true when this call wrote the definition */
    created: boolean;
    ready: boolean;
}

function toIndexSpec(item: IndexItem): IndexSpec {
    return {
        name: item.name,
        fields: item.fields,
        unique: item.unique,
        ...(item.collation && { collation: item.collation }),
    };
}

function sameKeyPattern(left: IndexSpec, right: IndexSpec): boolean {
    return (
        left.fields.length === right.fields.length &&
        left.fields.every((field, position) => field === right.fields[position]) &&
        collationsEqual(left.collation, right.collation)
    );
}

/**
 * List the index definitions of a collection.
 *
 * @param gateway - Table gateway
 * @param collection - Collection name
 * @returns Definitions in name order
 */
export async function listIndexDefinitions(
    gateway: TableGateway,
    collection: string
): Promise<IndexDefinition[]> {
    const items = await gateway.queryPartition(indexesPartition(collection));
    return items.flatMap((item) => (isIndexItem(item) ? [{ spec: toIndexSpec(item), ready: item.ready }] : []));
}

/**
 * Save an index definition unless an identical one exists.
 *
 * A new definition is saved as not ready; writes maintain it from then on,
 * and it becomes ready once the documents stored before it are indexed.
 *
 * @param gateway - Table gateway
 * @param collection - Collection name
 * @param spec - Index to ensure
 * @throws IndexOptionsConflictError if the name or key pattern is taken with different options
 */
export async function saveIndexDefinition(
    gateway: TableGateway,
    collection: string,
    spec: IndexSpec
): Promise<SavedIndexDefinition> {
    const existing = await listIndexDefinitions(gateway, collection);

    const sameName = existing.find((definition) => definition.spec.name === spec.name);
    if (sameName) {
        if (!sameKeyPattern(sameName.spec, spec)) {
            throw new IndexOptionsConflictError(spec.name, sameName.spec);
        }
        return { created: false, ready: sameName.ready };
    }

    const samePattern = existing.find((definition) => sameKeyPattern(definition.spec, spec));
    if (samePattern) {
        throw new IndexOptionsConflictError(spec.name, samePattern.spec);
    }

    const now = new Date().toISOString();
    const key = indexDefinitionKey(collection, spec.name);
    const item: IndexItem = {
        PK: key.PK,
        SK: `INDEX#${spec.name}`,
        entityType: EntityTypes.INDEX,
        collection,
        name: spec.name,
        fields: spec.fields,
        unique: true,
        ...(spec.collation && { collation: spec.collation }),
        ready: false,
        createdAt: now,
        updatedAt: now,
    };

    if (await gateway.putItem(item, { kind: 'not_exists' })) {
        return { created: true, ready: false };
    }

    // Another writer created the same name between the read and the put
    const raced = await gateway.getItem(key);
    if (!isIndexItem(raced)) {
        return { created: false, ready: false };
    }
    if (!sameKeyPattern(toIndexSpec(raced), spec)) {
        throw new IndexOptionsConflictError(spec.name, toIndexSpec(raced));
    }
    return { created: false, ready: raced.ready };
}

/**
 * Mark an index definition ready for lookups.
 *
 * @returns false when the definition no longer exists
 */
export async function markIndexReady(
    gateway: TableGateway,
    collection: string,
    name: string
): Promise<boolean> {
    const item = await gateway.getItem(indexDefinitionKey(collection, name));
    if (!isIndexItem(item)) {
        return false;
    }
    if (item.ready) {
        return true;
    }

    return gateway.putItem(
        { ...item, ready: true, updatedAt: new Date().toISOString() },
        { kind: 'exists' }
    );
}
