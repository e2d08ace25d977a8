/**
 * User Store - Table Key Builders
 *
 * @module storage/keys
 */

import { KeySegments, SortKeys } from '../constants';
import type { TableKey } from './types';

export function documentItemKey(collection: string, key: string): TableKey {
    return {
        PK: `${collection}#${KeySegments.DOCUMENT}#${key}`,
        SK: SortKeys.DOCUMENT,
    };
}

export function indexesPartition(collection: string): string {
    return `${collection}#${KeySegments.INDEXES}`;
}

export function indexDefinitionKey(collection: string, indexName: string): TableKey {
    return {
        PK: indexesPartition(collection),
        SK: `${SortKeys.INDEX_PREFIX}${indexName}`,
    };
}

export function constraintKey(collection: string, indexName: string, keyHash: string): TableKey {
    return {
        PK: `${collection}#${KeySegments.UNIQUE}#${indexName}#${keyHash}`,
        SK: SortKeys.CONSTRAINT,
    };
}
