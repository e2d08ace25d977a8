/**
 * User Store - Configuration
 *
 * Centralized environment configuration with validation.
 */

import type { Collation } from '@user-store/shared-types';
import {
    DocumentCollection,
    createLogger,
    createTableGateway,
    isCollation,
} from '@user-store/shared';
import { baseUserSchema } from './schema';
import type { BaseUser } from './schema';
import { DynamoDBUserDatabase } from './user-database';

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    USERS_COLLECTION: 'users',
    EMAIL_COLLATION_LOCALE: 'en',
    EMAIL_COLLATION_STRENGTH: 2,
    ENFORCE_COLLATED_EMAIL_UNIQUENESS: false,
} as const;

export interface UserStoreEnvConfig {
    tableName: string;
    region?: string;
    endpoint?: string;
    collectionName: string;
    emailCollation: Collation;
    enforceCollatedEmailUniqueness: boolean;
}

// =============================================================================
// Environment Validation
// =============================================================================

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

/**
 * Gets an optional environment variable with a default value.
 */
function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Gets an optional numeric environment variable with a default value.
 */
function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}

/**
 * Gets an optional boolean environment variable ("true" / "false").
 */
function optionalBooleanEnv(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    if (value === 'true' || value === 'false') {
        return value === 'true';
    }
    throw new Error(`Invalid boolean value for ${name}: ${value}`);
}

// =============================================================================
// Configuration Loader
// =============================================================================

let configCache: UserStoreEnvConfig | null = null;

/**
 * Load and validate the user store configuration.
 * Configuration is cached after first load.
 */
export function getUserStoreConfig(): UserStoreEnvConfig {
    if (configCache) {
        return configCache;
    }

    const emailCollation = {
        locale: optionalEnv('EMAIL_COLLATION_LOCALE', DEFAULTS.EMAIL_COLLATION_LOCALE),
        strength: optionalNumericEnv('EMAIL_COLLATION_STRENGTH', DEFAULTS.EMAIL_COLLATION_STRENGTH),
    };
    if (!isCollation(emailCollation)) {
        throw new Error(`Invalid collation strength for EMAIL_COLLATION_STRENGTH: ${emailCollation.strength}`);
    }

    configCache = {
        tableName: requireEnv('TABLE_NAME'),
        region: process.env.AWS_REGION || undefined,
        endpoint: process.env.DYNAMODB_ENDPOINT || undefined,
        collectionName: optionalEnv('USERS_COLLECTION', DEFAULTS.USERS_COLLECTION),
        emailCollation,
        enforceCollatedEmailUniqueness: optionalBooleanEnv(
            'ENFORCE_COLLATED_EMAIL_UNIQUENESS',
            DEFAULTS.ENFORCE_COLLATED_EMAIL_UNIQUENESS
        ),
    };

    return configCache;
}

/**
 * Clear configuration cache (for testing).
 */
export function clearConfigCache(): void {
    configCache = null;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a user database for the default user schema from the environment.
 *
 * @example
 * ```typescript
 * const users = createUserDatabase();
 * await users.initialize();
 * const user = await users.getByEmail('ada@example.com');
 * ```
 */
export function createUserDatabase(): DynamoDBUserDatabase<BaseUser> {
    const config = getUserStoreConfig();
    const logger = createLogger('user-store');

    const gateway = createTableGateway({
        tableName: config.tableName,
        region: config.region,
        endpoint: config.endpoint,
    });
    const collection = new DocumentCollection(gateway, config.collectionName, { logger });

    return new DynamoDBUserDatabase(baseUserSchema, collection, config.emailCollation, {
        logger,
        enforceCollatedEmailUniqueness: config.enforceCollatedEmailUniqueness,
    });
}
