/**
 * User Store - Framework Contract
 *
 * The operations a user-management layer calls on its persistence adapter.
 * Lookups resolve to null when no user matches; update and delete of a
 * user that is not stored are silent no-ops.
 */

import type { UserIdentity } from '@user-store/shared-types';

export abstract class BaseUserDatabase<U extends UserIdentity> {
    /** Get a single user by id */
    abstract get(id: string): Promise<U | null>;

    /** Get a single user by email */
    abstract getByEmail(email: string): Promise<U | null>;

    /** Get a single user by a linked OAuth account */
    abstract getByOAuthAccount(oauth: string, accountId: string): Promise<U | null>;

    /** Create a user */
    abstract create(user: U): Promise<U>;

    /** Replace a stored user */
    abstract update(user: U): Promise<U>;

    /** Delete a user */
    abstract delete(user: U): Promise<void>;
}
