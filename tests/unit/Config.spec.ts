/**
 * Unit Tests: Configuration loading and guards
 *
 * @see libs/bootstrap/config.ts
 * @see libs/bootstrap/config-guard.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from '../../libs/bootstrap/config.js';
import { ConfigGuardViolation } from '../../libs/bootstrap/config-guard.js';

const PG_ENV = {
    CUSTODY_ADMINISTRATOR_ID: 'admin-1',
    CUSTODY_STORE: 'postgres',
    DB_HOST: 'localhost',
    DB_PORT: '5432',
    DB_USER: 'custody',
    DB_PASSWORD: 'test-secret',
    DB_NAME: 'custody'
};

function violationsOf(run: () => unknown): readonly string[] {
    try {
        run();
    } catch (err) {
        if (err instanceof ConfigGuardViolation) return err.violations;
        throw err;
    }
    assert.fail('expected a configuration guard violation');
}

describe('loadConfig', () => {
    it('applies defaults for the in-memory store', () => {
        const config = loadConfig({ CUSTODY_ADMINISTRATOR_ID: 'admin-1' });

        assert.deepStrictEqual(config, {
            environment: 'development',
            administrator: 'admin-1',
            store: 'memory',
            defaultThresholds: { min: 2, max: 8 },
            limits: { maxLogEntries: 1000, maxLocationBytes: 128 }
        });
    });

    it('reads thresholds and limits from the environment', () => {
        const config = loadConfig({
            CUSTODY_ADMINISTRATOR_ID: 'admin-1',
            DEFAULT_TEMP_MIN: '-25',
            DEFAULT_TEMP_MAX: '-15',
            MAX_LOG_ENTRIES: '50',
            MAX_GPS_LEN: '64'
        });

        assert.deepStrictEqual(config.defaultThresholds, { min: -25, max: -15 });
        assert.deepStrictEqual(config.limits, { maxLogEntries: 50, maxLocationBytes: 64 });
    });

    it('requires an administrator identity', () => {
        assert.throws(() => loadConfig({}), /Invalid custody configuration: CUSTODY_ADMINISTRATOR_ID/);
        assert.throws(() => loadConfig({ CUSTODY_ADMINISTRATOR_ID: '  ' }), /CUSTODY_ADMINISTRATOR_ID/);
    });

    it('rejects an inverted default range', () => {
        assert.throws(
            () => loadConfig({ CUSTODY_ADMINISTRATOR_ID: 'admin-1', DEFAULT_TEMP_MIN: '8', DEFAULT_TEMP_MAX: '2' }),
            /DEFAULT_TEMP_MIN must be below DEFAULT_TEMP_MAX/
        );
    });

    it('rejects an unknown store kind', () => {
        assert.throws(
            () => loadConfig({ CUSTODY_ADMINISTRATOR_ID: 'admin-1', CUSTODY_STORE: 'sqlite' }),
            /CUSTODY_STORE/
        );
    });

    describe('postgres store', () => {
        it('builds the pool settings without TLS outside protected environments', () => {
            const config = loadConfig(PG_ENV);

            assert.deepStrictEqual(config.db, {
                host: 'localhost',
                port: 5432,
                user: 'custody',
                password: 'test-secret',
                database: 'custody',
                poolMax: 20,
                ssl: false
            });
        });

        it('requires every database variable', () => {
            const violations = violationsOf(() => loadConfig({ CUSTODY_ADMINISTRATOR_ID: 'admin-1', CUSTODY_STORE: 'postgres' }));

            assert.deepStrictEqual(violations, [
                'FATAL CONFIG: Required env var DB_HOST is missing',
                'FATAL CONFIG: Required env var DB_PORT is missing',
                'FATAL CONFIG: Required env var DB_USER is missing',
                'FATAL CONFIG: Required env var DB_PASSWORD is missing',
                'FATAL CONFIG: Required env var DB_NAME is missing'
            ]);
        });

        it('requires a CA certificate in production', () => {
            const violations = violationsOf(() => loadConfig({ ...PG_ENV, NODE_ENV: 'production' }));
            assert.deepStrictEqual(violations, ['FATAL CONFIG: DB_CA_CERT is required in production/staging']);
        });

        it('forbids disabling TLS in staging', () => {
            const violations = violationsOf(() => loadConfig({
                ...PG_ENV,
                NODE_ENV: 'staging',
                DB_CA_CERT: 'test-ca',
                DB_SSL_QUERY: 'false'
            }));
            assert.deepStrictEqual(violations, [
                'FATAL CONFIG: DB_SSL_QUERY=false is forbidden in production/staging (Rule: DB_SSL_QUERY)'
            ]);
        });

        it('verifies the server certificate in production', () => {
            const config = loadConfig({ ...PG_ENV, NODE_ENV: 'production', DB_CA_CERT: 'test-ca' });
            assert.deepStrictEqual(config.db?.ssl, { rejectUnauthorized: true, ca: 'test-ca' });
        });
    });
});
