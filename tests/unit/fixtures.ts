/**
 * Test Fixtures
 */

import { randomUUID } from 'node:crypto';
import { DocumentCollection, Logger } from '@user-store/shared';
import type { LogLevel } from '@user-store/shared';
import {
  DynamoDBUserDatabase,
  baseUserSchema,
  oauthAccountSchema,
} from '@user-store/dynamodb-users';
import type { BaseUser, OAuthAccount, UserDatabaseOptions } from '@user-store/dynamodb-users';
import { InMemoryTableGateway } from './support/in-memory-table';

export const TEST_HASHED_PASSWORD = 'test-hashed-password';

export function makeUser(overrides: Record<string, unknown> = {}): BaseUser {
  return baseUserSchema.parse({
    email: `user-${randomUUID()}@example.com`,
    hashed_password: TEST_HASHED_PASSWORD,
    ...overrides,
  });
}

export function makeOAuthAccount(oauthName: string, accountId: string): OAuthAccount {
  return oauthAccountSchema.parse({
    oauth_name: oauthName,
    access_token: 'test-access-token',
    account_id: accountId,
    account_email: `${accountId}@example.com`,
  });
}

export interface CapturedLogger {
  logger: Logger;
  lines: Array<{ level: LogLevel; component: string; message: string; data?: Record<string, unknown> }>;
}

/**
 * Logger writing parsed entries to an array instead of the console.
 */
export function captureLogger(minLevel: LogLevel = 'DEBUG'): CapturedLogger {
  const lines: CapturedLogger['lines'] = [];
  const logger = new Logger('test', {
    minLevel,
    sink: (line) => lines.push(JSON.parse(line)),
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return new Logger('test', { sink: () => undefined });
}

export interface UserStoreFixture {
  table: InMemoryTableGateway;
  collection: DocumentCollection;
  users: DynamoDBUserDatabase<BaseUser>;
}

export function createUserStoreFixture(options: UserDatabaseOptions = {}): UserStoreFixture {
  const logger = options.logger ?? silentLogger();
  const table = new InMemoryTableGateway();
  const collection = new DocumentCollection(table, 'users', { logger });
  const users = new DynamoDBUserDatabase(baseUserSchema, collection, undefined, { ...options, logger });
  return { table, collection, users };
}
