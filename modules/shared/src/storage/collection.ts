/**
 * User Store - Document Collection
 *
 * A named collection of documents in the single table, with the driver
 * surface a persistence adapter needs: findOne, insertOne, replaceOne,
 * deleteOne, createIndex and listIndexes.
 *
 * Documents are keyed by one string field (default `id`). Unique indexes are
 * enforced transactionally through constraint items. Creating an index
 * indexes the documents already stored; until that build completes the
 * index is maintained by writes but not used by findOne.
 *
 * @example
 * ```typescript
 * const users = new DocumentCollection(createTableGateway(), 'users');
 * await users.createIndex(['email'], { unique: true });
 * await users.insertOne({ id: randomUUID(), email: 'ada@example.com' });
 * const user = await users.findOne({ email: 'ada@example.com' });
 * ```
 *
 * @module storage/collection
 */

import type {
    CreateIndexOptions,
    DeleteOneResult,
    DocumentFilter,
    FindOptions,
    IndexSpec,
    InsertOneResult,
    ReplaceOneResult,
    StoredDocument,
} from '@user-store/shared-types';
import { DEFAULT_KEY_FIELD } from '../constants';
import { DuplicateKeyError, InvalidFilterError, InvalidIndexError } from '../errors';
import { Logger } from '../logger';
import { toStoredDocument } from './document-codec';
import {
    deleteDocument,
    getDocumentItem,
    getDocumentItemByIndexKey,
    indexExistingDocuments,
    insertDocument,
    replaceDocument,
    scanDocumentItems,
} from './document-operations';
import { assertFilter, matchesFilter } from './filter';
import { defaultIndexName } from './index-keys';
import { listIndexDefinitions, markIndexReady, saveIndexDefinition } from './index-operations';
import { planIndexLookup, planKeyLookup } from './query-planner';
import type { TableGateway } from './types';

export interface CollectionOptions {
    /** Field holding the document key (default: `id`) */
    keyField?: string;
    logger?: Logger;
}

export class DocumentCollection {
    readonly name: string;
    readonly keyField: string;

    private readonly gateway: TableGateway;
    private readonly logger: Logger;

    constructor(gateway: TableGateway, name: string, options: CollectionOptions = {}) {
        if (name.length === 0 || name.includes('#')) {
            throw new Error(`Invalid collection name: "${name}"`);
        }

        this.gateway = gateway;
        this.name = name;
        this.keyField = options.keyField ?? DEFAULT_KEY_FIELD;
        this.logger = (options.logger ?? new Logger('storage')).child(`collection.${name}`);
    }

    // =========================================================================
    // Reads
    // =========================================================================

    /**
     * First document matching the filter, or null.
     *
     * With `options.collation`, strings in the filter compare under that
     * collation; a unique index is only used when its collation is the same.
     *
     * @throws InvalidFilterError on an unsupported filter shape
     */
    async findOne(filter: DocumentFilter, options: FindOptions = {}): Promise<StoredDocument | null> {
        assertFilter(filter);
        const { collation } = options;
        const matches = (document: StoredDocument): boolean => matchesFilter(document, filter, collation);

        const key = planKeyLookup(filter, this.keyField, collation);
        if (key !== null) {
            const item = await getDocumentItem(this.gateway, this.name, key);
            return item && matches(item.document) ? item.document : null;
        }

        const ready = (await listIndexDefinitions(this.gateway, this.name))
            .flatMap((definition) => (definition.ready ? [definition.spec] : []));
        const lookup = planIndexLookup(filter, ready, collation);
        if (lookup) {
            this.logger.debug('Index lookup', { index: lookup.index.name });
            const item = await getDocumentItemByIndexKey(this.gateway, this.name, lookup.index, lookup.keyValues);
            return item && matches(item.document) ? item.document : null;
        }

        this.logger.debug('Collection scan', { fields: Object.keys(filter) });
        for await (const item of scanDocumentItems(this.gateway, this.name)) {
            if (matches(item.document)) {
                return item.document;
            }
        }
        return null;
    }

    /**
     * Unique indexes of the collection, including those still being built.
     */
    async listIndexes(): Promise<IndexSpec[]> {
        const definitions = await listIndexDefinitions(this.gateway, this.name);
        return definitions.map((definition) => definition.spec);
    }

    // =========================================================================
    // Writes
    // =========================================================================

    /**
     * Insert a new document.
     *
     * @throws DuplicateKeyError if the key or a unique index key is already taken
     * @throws InvalidDocumentError if the value cannot be stored
     */
    async insertOne(document: object): Promise<InsertOneResult> {
        const stored = toStoredDocument(document);

        try {
            const insertedKey = await insertDocument(
                this.gateway,
                this.name,
                this.keyField,
                stored,
                await this.listIndexes()
            );
            this.logger.debug('Document inserted', { key: insertedKey });
            return { insertedKey };
        } catch (err) {
            if (err instanceof DuplicateKeyError) {
                this.logger.warn('Duplicate key on insert', { index: err.indexName });
            }
            throw err;
        }
    }

    /**
     * Replace the document selected by `{ [keyField]: key }` wholesale.
     * A filter matching nothing changes nothing.
     *
     * @throws InvalidFilterError if the filter is not an equality on the key field
     * @throws DuplicateKeyError if the replacement takes a unique key held elsewhere
     * @throws ImmutableKeyError if the replacement changes the key
     * @throws WriteConflictError if the document kept changing concurrently
     */
    async replaceOne(filter: DocumentFilter, replacement: object): Promise<ReplaceOneResult> {
        const key = this.requireKeyFilter(filter);
        const stored = toStoredDocument(replacement);

        try {
            const result = await replaceDocument(
                this.gateway,
                this.name,
                this.keyField,
                key,
                stored,
                await this.listIndexes()
            );
            this.logger.debug('Document replaced', { key, ...result });
            return result;
        } catch (err) {
            if (err instanceof DuplicateKeyError) {
                this.logger.warn('Duplicate key on replace', { key, index: err.indexName });
            }
            throw err;
        }
    }

    /**
     * Delete the document selected by `{ [keyField]: key }`.
     * A filter matching nothing changes nothing.
     *
     * @throws InvalidFilterError if the filter is not an equality on the key field
     * @throws WriteConflictError if the document kept changing concurrently
     */
    async deleteOne(filter: DocumentFilter): Promise<DeleteOneResult> {
        const key = this.requireKeyFilter(filter);
        const result = await deleteDocument(this.gateway, this.name, key, await this.listIndexes());
        this.logger.debug('Document deleted', { key, ...result });
        return result;
    }

    /**
     * Ensure a unique index over `fields` exists and covers every stored
     * document. Idempotent; a build that failed is resumed by the next call.
     *
     * @returns The index name
     * @throws InvalidIndexError on an empty or repeated field list
     * @throws IndexOptionsConflictError if the name or key pattern exists with other options
     * @throws DuplicateKeyError if stored documents already share an index key
     */
    async createIndex(fields: string[], options: CreateIndexOptions): Promise<string> {
        if (fields.length === 0) {
            throw new InvalidIndexError('an index needs at least one field');
        }
        if (new Set(fields).size !== fields.length) {
            throw new InvalidIndexError(`repeated field in [${fields.join(', ')}]`);
        }
        for (const field of fields) {
            if (field.split('.').some((segment) => segment.length === 0 || segment.startsWith('$'))) {
                throw new InvalidIndexError(`invalid field "${field}"`);
            }
        }

        const spec: IndexSpec = {
            name: options.name ?? defaultIndexName(fields),
            fields,
            unique: true,
            ...(options.collation && { collation: options.collation }),
        };

        const { created, ready } = await saveIndexDefinition(this.gateway, this.name, spec);
        if (ready) {
            return spec.name;
        }

        try {
            const indexedDocuments = await indexExistingDocuments(this.gateway, this.name, spec);
            await markIndexReady(this.gateway, this.name, spec.name);
            this.logger.info(created ? 'Index created' : 'Index build resumed', {
                index: spec.name,
                fields,
                ...(spec.collation && { collation: spec.collation }),
                indexedDocuments,
            });
        } catch (err) {
            if (err instanceof DuplicateKeyError) {
                this.logger.warn('Duplicate key on index build', { index: err.indexName });
            }
            throw err;
        }
        return spec.name;
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private requireKeyFilter(filter: DocumentFilter): string {
        const fields = Object.keys(filter);
        const key = filter[this.keyField];

        if (fields.length !== 1 || typeof key !== 'string') {
            throw new InvalidFilterError(`writes select a document by {"${this.keyField}": <string>}`);
        }
        return key;
    }
}
