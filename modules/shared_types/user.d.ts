/**
 * User Store - User Identity Types
 *
 * The minimal shape a user entity must expose for the store to key it.
 * Everything else on the entity is opaque to the store and round-trips
 * through the caller's schema.
 */

/** One linked OAuth account; (oauth_name, account_id) is unique across users */
export interface OAuthAccountIdentity {
    oauth_name: string;
    account_id: string;
}

export interface UserIdentity {
    /** Immutable primary key (UUID) */
    id: string;
    /** Unique email address */
    email: string;
    oauth_accounts?: readonly OAuthAccountIdentity[];
}
