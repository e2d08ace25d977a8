/**
 * User Store - DynamoDB User Persistence Adapter
 *
 * Stores user entities for a user-management layer in a DynamoDB-backed
 * document collection, with unique id, email and linked OAuth accounts.
 */

export { BaseUserDatabase } from './base';

export {
    DynamoDBUserDatabase,
    DEFAULT_EMAIL_COLLATION,
    CASE_INSENSITIVE_EMAIL_INDEX,
} from './user-database';

export type { UserDatabaseOptions } from './user-database';

export {
    baseUserSchema,
    oauthAccountSchema,
} from './schema';

export type { BaseUser, OAuthAccount, UserSchema } from './schema';

export {
    getUserStoreConfig,
    clearConfigCache,
    createUserDatabase,
} from './config';

export type { UserStoreEnvConfig } from './config';
