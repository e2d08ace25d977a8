/**
 * User Store - Default User Schema
 *
 * zod schemas for the user entity the store persists by default. Objects
 * pass unknown fields through, so an application can extend the user with
 * its own fields and have them round-trip.
 *
 * @example
 * ```typescript
 * const userWithProfile = baseUserSchema.extend({ display_name: z.string() });
 * type UserWithProfile = z.infer<typeof userWithProfile>;
 * ```
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const oauthAccountSchema = z
    .object({
        id: z.string().uuid().default(() => randomUUID()),
        oauth_name: z.string(),
        access_token: z.string(),
        /** Access token expiry, seconds since the epoch */
        expires_at: z.number().int().nullable().optional(),
        refresh_token: z.string().nullable().optional(),
        account_id: z.string(),
        account_email: z.string(),
    })
    .passthrough();

export const baseUserSchema = z
    .object({
        id: z.string().uuid().default(() => randomUUID()),
        email: z.string().email(),
        hashed_password: z.string(),
        is_active: z.boolean().default(true),
        is_superuser: z.boolean().default(false),
        is_verified: z.boolean().default(false),
        oauth_accounts: z.array(oauthAccountSchema).default([]),
    })
    .passthrough();

export type OAuthAccount = z.infer<typeof oauthAccountSchema>;

export type BaseUser = z.infer<typeof baseUserSchema>;

/** Schema descriptor accepted by the store: parses a stored document into U */
export type UserSchema<U> = z.ZodType<U, z.ZodTypeDef, unknown>;
