import { z } from 'zod';
import { ConfigGuard } from './config-guard.js';
import { DB_CONFIG_GUARDS } from './config/db-config.js';
import type { ShipmentLimits } from '../shipment/registry.js';
import type { Thresholds } from '../shipment/shipment.js';

const numberFromEnv = (fallback: number) =>
    z.coerce.number().finite().default(fallback);

const positiveIntFromEnv = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    CUSTODY_ADMINISTRATOR_ID: z.string().trim().min(1),
    CUSTODY_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DEFAULT_TEMP_MIN: numberFromEnv(2),
    DEFAULT_TEMP_MAX: numberFromEnv(8),
    MAX_LOG_ENTRIES: positiveIntFromEnv(1000),
    MAX_GPS_LEN: positiveIntFromEnv(128),
    DB_HOST: z.string().optional(),
    DB_PORT: z.coerce.number().int().positive().optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_POOL_MAX: positiveIntFromEnv(20),
    DB_CA_CERT: z.string().optional(),
    DB_SSL_QUERY: z.enum(['true', 'false']).optional()
}).refine(env => env.DEFAULT_TEMP_MIN < env.DEFAULT_TEMP_MAX, {
    message: 'DEFAULT_TEMP_MIN must be below DEFAULT_TEMP_MAX',
    path: ['DEFAULT_TEMP_MIN']
});

export interface DbConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    poolMax: number;
    ssl: false | { rejectUnauthorized: true; ca?: string };
}

export interface CustodyConfig {
    environment: string;
    administrator: string;
    store: 'memory' | 'postgres';
    defaultThresholds: Thresholds;
    limits: ShipmentLimits;
    db?: DbConfig;
}

/**
 * Reads the custody node configuration from the environment.
 * Database settings are mandatory only for the postgres store.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CustodyConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid custody configuration: ${issues.join('; ')}`);
    }
    const values = parsed.data;

    const config: CustodyConfig = {
        environment: values.NODE_ENV,
        administrator: values.CUSTODY_ADMINISTRATOR_ID,
        store: values.CUSTODY_STORE,
        defaultThresholds: { min: values.DEFAULT_TEMP_MIN, max: values.DEFAULT_TEMP_MAX },
        limits: { maxLogEntries: values.MAX_LOG_ENTRIES, maxLocationBytes: values.MAX_GPS_LEN }
    };

    if (values.CUSTODY_STORE === 'postgres') {
        ConfigGuard.enforce(DB_CONFIG_GUARDS, env);
        const isProtectedEnv = values.NODE_ENV === 'production' || values.NODE_ENV === 'staging';
        const useTls = isProtectedEnv || values.DB_SSL_QUERY === 'true';
        config.db = {
            host: values.DB_HOST ?? '',
            port: values.DB_PORT ?? 5432,
            user: values.DB_USER ?? '',
            password: values.DB_PASSWORD ?? '',
            database: values.DB_NAME ?? '',
            poolMax: values.DB_POOL_MAX,
            ssl: useTls ? { rejectUnauthorized: true, ca: values.DB_CA_CERT } : false
        };
    }

    return config;
}
