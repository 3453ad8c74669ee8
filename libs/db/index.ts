import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import type { DbConfig } from '../bootstrap/config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DB_ROLES, DbRole } from './roles.js';

const { Pool } = pg;

export type Row = Record<string, unknown>;

export type Queryable = {
    query(text: string, params?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
};

export type TxClient = Queryable;

export type RoleBoundClient = Queryable;

export type SessionClient = Queryable & {
    release(destroy?: Error): void;
};

/**
 * Anything that hands out session-scoped clients; normally a pg Pool.
 */
export type ConnectionSource = {
    connect(): Promise<SessionClient>;
    end(): Promise<void>;
};

/**
 * Pooled PostgreSQL connection source built from validated configuration.
 */
export function createPoolSource(config: DbConfig): ConnectionSource {
    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl
    });

    return {
        connect: async () => {
            const client = await pool.connect();
            return {
                query: (text: string, params?: unknown[]) => client.query(text, params),
                release: (destroy?: Error) => client.release(destroy)
            };
        },
        end: () => pool.end()
    };
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: Queryable, role: DbRole): Promise<void> {
    const roleCheck = await client.query('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${String(currentUser)}`);
    }
}

async function resetRole(client: Queryable, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

function releaseClient(client: SessionClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

class RollbackFailure extends Error {
    constructor(public readonly original: unknown) {
        super('Transaction rollback failed');
        this.name = 'RollbackFailure';
    }
}

export function createDb(source: ConnectionSource) {
    async function withSession<T>(
        role: DbRole,
        context: string,
        callback: (client: SessionClient) => Promise<T>
    ): Promise<T> {
        assertDbRole(role);
        const client = await source.connect();
        let forceDestroy = false;
        try {
            return await callback(client);
        } catch (error) {
            if (error instanceof RollbackFailure) {
                forceDestroy = true;
                throw error.original;
            }
            throw error;
        } finally {
            const resetOk = await resetRole(client, context);
            forceDestroy = forceDestroy || !resetOk;
            releaseClient(client, forceDestroy, context);
        }
    }

    return {
        /**
         * Multi-step work on one connection without forcing a transaction.
         */
        withRoleClient: <T>(role: DbRole, callback: (client: RoleBoundClient) => Promise<T>): Promise<T> =>
            withSession(role, 'withRoleClient', async client => {
                try {
                    await client.query(`SET ROLE ${quoteIdentifier(role)}`);
                    await verifyRole(client, role);
                    return await callback({ query: (text, params) => client.query(text, params) });
                } catch (error) {
                    throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:WithRoleClientFailure');
                }
            }),

        /**
         * Managed transaction. Rolls back on any error; nesting is rejected.
         */
        transactionAsRole: <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
            if (transactionContext.getStore()?.inTx) {
                return Promise.reject(new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.'));
            }
            return withSession(role, 'transactionAsRole', client =>
                transactionContext.run({ inTx: true }, () => runTransaction(client, role, callback))
            );
        },

        /**
         * Boot-time probe that DB_USER can SET ROLE into each required role.
         */
        probeRoles: async (): Promise<void> => {
            const client = await source.connect();
            try {
                for (const role of DB_ROLES) {
                    await client.query('BEGIN');
                    try {
                        await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                        await verifyRole(client, role);
                        await client.query('ROLLBACK');
                    } catch (error) {
                        try {
                            await client.query('ROLLBACK');
                        } catch (rollbackError) {
                            logger.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                        }
                        throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ProbeRolesFailure');
                    }
                }
            } finally {
                releaseClient(client, false, 'probeRoles');
            }
        },

        end: (): Promise<void> => source.end()
    };
}

export type Db = ReturnType<typeof createDb>;

async function runTransaction<T>(
    client: Queryable,
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<T> {
    try {
        await client.query('BEGIN');
        await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
        await verifyRole(client, role);

        const txClient: TxClient = {
            query: (text, params) => client.query(text, params)
        };

        const result = await callback(txClient);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        const sanitized = ErrorSanitizer.sanitize(error, 'DatabaseLayer:TransactionFailed');
        try {
            await client.query('ROLLBACK');
        } catch (rollbackError) {
            logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            throw new RollbackFailure(sanitized);
        }
        throw sanitized;
    }
}
