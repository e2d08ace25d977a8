/**
 * User Store - DynamoDB User Database
 *
 * Persistence adapter storing users as documents in a DocumentCollection.
 *
 * Uniqueness is enforced by the collection's unique indexes, created lazily
 * before the first operation of each instance:
 *   - id
 *   - email (exact string equality)
 *   - (oauth_accounts.oauth_name, oauth_accounts.account_id), per linked account
 *
 * getByEmail compares under the email collation (case-insensitive by default)
 * while the email index compares exact strings, so "A@b.com" and "a@b.com"
 * can be stored for two users. Setting `enforceCollatedEmailUniqueness` adds
 * a unique email index under the collation and closes that gap.
 *
 * Errors from the collection propagate unchanged; nothing is retried.
 */

import type { Collation, UserIdentity } from '@user-store/shared-types';
import { Logger } from '@user-store/shared';
import type { DocumentCollection } from '@user-store/shared';
import { BaseUserDatabase } from './base';
import type { UserSchema } from './schema';

/** Case-insensitive, accent-sensitive comparison */
export const DEFAULT_EMAIL_COLLATION: Collation = { locale: 'en', strength: 2 };

export const CASE_INSENSITIVE_EMAIL_INDEX = 'case_insensitive_email_index';

export interface UserDatabaseOptions {
    logger?: Logger;
    /** Add a unique email index under the email collation (default: false) */
    enforceCollatedEmailUniqueness?: boolean;
}

export class DynamoDBUserDatabase<U extends UserIdentity> extends BaseUserDatabase<U> {
    private readonly userSchema: UserSchema<U>;
    private readonly collection: DocumentCollection;
    private readonly emailCollation: Collation;
    private readonly enforceCollatedEmailUniqueness: boolean;
    private readonly logger: Logger;

    private initialized = false;

    constructor(
        userSchema: UserSchema<U>,
        collection: DocumentCollection,
        emailCollation: Collation = DEFAULT_EMAIL_COLLATION,
        options: UserDatabaseOptions = {}
    ) {
        super();
        this.userSchema = userSchema;
        this.collection = collection;
        this.emailCollation = emailCollation;
        this.enforceCollatedEmailUniqueness = options.enforceCollatedEmailUniqueness ?? false;
        this.logger = (options.logger ?? new Logger('user-store')).child('user-database');
    }

    /**
     * Ensure the unique indexes exist. Runs before every operation and does
     * its work once per instance; concurrent first calls may both issue the
     * idempotent index creations. Call it at startup to take the cost early.
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        const indexes = [
            await this.collection.createIndex(['id'], { unique: true }),
            await this.collection.createIndex(['email'], { unique: true }),
            await this.collection.createIndex(
                ['oauth_accounts.oauth_name', 'oauth_accounts.account_id'],
                { unique: true }
            ),
        ];

        if (this.enforceCollatedEmailUniqueness) {
            indexes.push(
                await this.collection.createIndex(['email'], {
                    unique: true,
                    name: CASE_INSENSITIVE_EMAIL_INDEX,
                    collation: this.emailCollation,
                })
            );
        }

        this.initialized = true;
        this.logger.info('User collection initialized', {
            collection: this.collection.name,
            indexes,
        });
    }

    async get(id: string): Promise<U | null> {
        await this.initialize();
        const document = await this.collection.findOne({ id });
        return document ? this.userSchema.parse(document) : null;
    }

    async getByEmail(email: string): Promise<U | null> {
        await this.initialize();
        const document = await this.collection.findOne({ email }, { collation: this.emailCollation });
        return document ? this.userSchema.parse(document) : null;
    }

    async getByOAuthAccount(oauth: string, accountId: string): Promise<U | null> {
        await this.initialize();
        const document = await this.collection.findOne({
            oauth_accounts: { $elemMatch: { oauth_name: oauth, account_id: accountId } },
        });
        return document ? this.userSchema.parse(document) : null;
    }

    /**
     * @throws DuplicateKeyError if the id, email or a linked OAuth account is taken
     */
    async create(user: U): Promise<U> {
        await this.initialize();
        await this.collection.insertOne(user);
        return user;
    }

    /**
     * Replace the stored user with the same id. Does nothing when no such
     * user is stored.
     *
     * @throws DuplicateKeyError if the new email or a linked OAuth account is taken
     */
    async update(user: U): Promise<U> {
        await this.initialize();
        await this.collection.replaceOne({ id: user.id }, user);
        return user;
    }

    async delete(user: U): Promise<void> {
        await this.initialize();
        await this.collection.deleteOne({ id: user.id });
    }
}
