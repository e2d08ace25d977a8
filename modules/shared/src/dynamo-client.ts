/**
 * User Store - DynamoDB Table Gateway
 *
 * Implements the TableGateway port on top of the AWS SDK v3 document client.
 * One table holds every collection (Single Table Design); see
 * shared_types/schema.d.ts for the key patterns.
 *
 * Configuration:
 *   - TABLE_NAME: DynamoDB table name (required)
 *   - AWS_REGION: resolved by the AWS SDK from the environment
 *   - DYNAMODB_ENDPOINT: endpoint override, e.g. a local DynamoDB (optional)
 *
 * Reads are strongly consistent so a write is visible to the next lookup.
 * Conditional check failures are mapped to `false` (putItem) or to a
 * TransactionConditionError (transactWrite); every other SDK error
 * propagates unchanged.
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import { DynamoDBClient, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
    DynamoDBDocumentClient,
    GetCommand,
    PutCommand,
    QueryCommand,
    ScanCommand,
    TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import type {
    QueryCommandOutput,
    ScanCommandOutput,
    TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import type { StorageItem } from '@user-store/shared-types';
import { MAX_TRANSACTION_ITEMS } from './constants';
import { StorageError, TransactionConditionError } from './errors';
import type {
    StorageAdapterConfig,
    TableGateway,
    TableItem,
    TableKey,
    TableWrite,
    WriteCondition,
} from './storage/types';

// Re-export types for convenience
export type { StorageAdapterConfig } from './storage/types';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

// =============================================================================
// Condition Expressions
// =============================================================================

export interface ConditionParams {
    ConditionExpression: string;
    ExpressionAttributeNames?: Record<string, string>;
    ExpressionAttributeValues?: Record<string, string | number>;
}

/**
 * Translate a WriteCondition into DynamoDB condition expression parameters.
 */
export function buildCondition(condition: WriteCondition): ConditionParams {
    switch (condition.kind) {
        case 'not_exists':
            return { ConditionExpression: 'attribute_not_exists(PK)' };
        case 'exists':
            return { ConditionExpression: 'attribute_exists(PK)' };
        case 'version':
            return {
                ConditionExpression: '#version = :version',
                ExpressionAttributeNames: { '#version': 'version' },
                ExpressionAttributeValues: { ':version': condition.version },
            };
        case 'absent_or_owned':
            return {
                ConditionExpression: 'attribute_not_exists(PK) OR #documentKey = :documentKey',
                ExpressionAttributeNames: { '#documentKey': 'documentKey' },
                ExpressionAttributeValues: { ':documentKey': condition.documentKey },
            };
    }
}

/**
 * Build an equality filter expression over arbitrary attribute names.
 * Returns undefined when there is nothing to filter on.
 */
export function buildEqualityFilter(match: Record<string, string>): {
    FilterExpression: string;
    ExpressionAttributeNames: Record<string, string>;
    ExpressionAttributeValues: Record<string, string>;
} | undefined {
    const entries = Object.entries(match);
    if (entries.length === 0) {
        return undefined;
    }

    const names: Record<string, string> = {};
    const values: Record<string, string> = {};
    const clauses = entries.map(([attribute, value], position) => {
        names[`#f${position}`] = attribute;
        values[`:v${position}`] = value;
        return `#f${position} = :v${position}`;
    });

    return {
        FilterExpression: clauses.join(' AND '),
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: values,
    };
}

// =============================================================================
// Error Detection
// =============================================================================

function isConditionalCheckFailure(error: unknown): boolean {
    return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

/**
 * Positions of the transaction actions cancelled by a failed condition.
 * Empty when the error is not a condition-driven cancellation.
 */
export function failedWriteIndexes(error: unknown): number[] {
    if (!(error instanceof TransactionCanceledException)) {
        return [];
    }

    return (error.CancellationReasons ?? []).flatMap((reason, position) =>
        reason.Code === 'ConditionalCheckFailed' ? [position] : []
    );
}

// =============================================================================
// DynamoDB Table Gateway
// =============================================================================

export class DynamoTableGateway implements TableGateway {
    private readonly client: DynamoDBDocumentClient;
    private readonly tableName: string;

    constructor(config: StorageAdapterConfig, client?: DynamoDBDocumentClient) {
        this.tableName = config.tableName;

        this.client = client ?? DynamoDBDocumentClient.from(
            new DynamoDBClient({
                region: config.region,
                endpoint: config.endpoint,
            }),
            {
                marshallOptions: {
                    removeUndefinedValues: true,
                },
                unmarshallOptions: {
                    wrapNumbers: false,
                },
            }
        );
    }

    async getItem(key: TableKey): Promise<TableItem | null> {
        const result = await this.client.send(
            new GetCommand({
                TableName: this.tableName,
                Key: { PK: key.PK, SK: key.SK },
                ConsistentRead: true,
            })
        );

        return result.Item ?? null;
    }

    async putItem(item: StorageItem, condition?: WriteCondition): Promise<boolean> {
        try {
            await this.client.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: item,
                    ...(condition && buildCondition(condition)),
                })
            );
            return true;
        } catch (err) {
            if (isConditionalCheckFailure(err)) {
                return false;
            }
            throw err;
        }
    }

    async queryPartition(pk: string): Promise<TableItem[]> {
        const items: TableItem[] = [];
        let exclusiveStartKey: QueryCommandOutput['LastEvaluatedKey'];

        do {
            const result = await this.client.send(
                new QueryCommand({
                    TableName: this.tableName,
                    KeyConditionExpression: 'PK = :pk',
                    ExpressionAttributeValues: { ':pk': pk },
                    ExclusiveStartKey: exclusiveStartKey,
                    ConsistentRead: true,
                })
            );
            items.push(...(result.Items ?? []));
            exclusiveStartKey = result.LastEvaluatedKey;
        } while (exclusiveStartKey);

        return items;
    }

    async *scanPages(match: Record<string, string>): AsyncGenerator<TableItem[]> {
        const filter = buildEqualityFilter(match);
        let exclusiveStartKey: ScanCommandOutput['LastEvaluatedKey'];

        do {
            const result = await this.client.send(
                new ScanCommand({
                    TableName: this.tableName,
                    ...filter,
                    ExclusiveStartKey: exclusiveStartKey,
                    ConsistentRead: true,
                })
            );
            yield result.Items ?? [];
            exclusiveStartKey = result.LastEvaluatedKey;
        } while (exclusiveStartKey);
    }

    async transactWrite(writes: TableWrite[]): Promise<void> {
        if (writes.length === 0) {
            return;
        }
        if (writes.length > MAX_TRANSACTION_ITEMS) {
            throw new StorageError('TRANSACTION_TOO_LARGE', `${writes.length} actions`);
        }

        try {
            await this.client.send(
                new TransactWriteCommand({
                    TransactItems: writes.map((write) => this.toTransactItem(write)),
                })
            );
        } catch (err) {
            const failed = failedWriteIndexes(err);
            if (failed.length > 0) {
                throw new TransactionConditionError(failed);
            }
            throw err;
        }
    }

    private toTransactItem(write: TableWrite): TransactItem {
        const condition = write.condition && buildCondition(write.condition);

        if (write.type === 'put') {
            return {
                Put: {
                    TableName: this.tableName,
                    Item: write.item,
                    ...condition,
                },
            };
        }

        return {
            Delete: {
                TableName: this.tableName,
                Key: { PK: write.key.PK, SK: write.key.SK },
                ...condition,
            },
        };
    }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a DynamoTableGateway from explicit configuration or the environment.
 *
 * @throws Error if no table name is given and TABLE_NAME is not set
 *
 * @example
 * ```typescript
 * const gateway = createTableGateway();
 * const users = new DocumentCollection(gateway, 'users');
 * ```
 */
export function createTableGateway(config?: Partial<StorageAdapterConfig>): DynamoTableGateway {
    const tableName = config?.tableName ?? process.env.TABLE_NAME;

    if (!tableName) {
        throw new Error(
            'TABLE_NAME environment variable is required. ' +
            'Set it to the DynamoDB table that holds the user collection.'
        );
    }

    return new DynamoTableGateway({
        tableName,
        region: config?.region ?? process.env.AWS_REGION,
        endpoint: config?.endpoint ?? process.env.DYNAMODB_ENDPOINT,
    });
}
