/**
 * User Store - Storage Module
 *
 * Exports the document collection and the operations it is built from.
 *
 * @module storage
 */

export type {
    StorageAdapterConfig,
    TableGateway,
    TableItem,
    TableKey,
    TableWrite,
    WriteCondition,
} from './types';

export { DocumentCollection } from './collection';

export type { CollectionOptions } from './collection';

export {
    documentKeyOf,
    getDocumentItem,
    getDocumentItemByIndexKey,
    scanDocumentItems,
    insertDocument,
    replaceDocument,
    deleteDocument,
    indexExistingDocuments,
} from './document-operations';

export {
    listIndexDefinitions,
    saveIndexDefinition,
    markIndexReady,
} from './index-operations';

export type { IndexDefinition, SavedIndexDefinition } from './index-operations';

export {
    defaultIndexName,
    extractIndexKeys,
    hashIndexKey,
} from './index-keys';

export {
    collationKey,
    collationsEqual,
    normalizeValue,
    valuesEqual,
} from './collation';

export {
    toStoredDocument,
    resolvePath,
    collectPathValues,
} from './document-codec';

export {
    assertFilter,
    matchesFilter,
} from './filter';

export {
    planKeyLookup,
    planIndexLookup,
} from './query-planner';

export type { IndexLookup } from './query-planner';

export {
    documentItemKey,
    indexesPartition,
    indexDefinitionKey,
    constraintKey,
} from './keys';
