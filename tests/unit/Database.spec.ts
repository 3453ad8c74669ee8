/**
 * Unit Tests: Database layer
 *
 * Role scoping, transaction boundaries and client release on a scripted session.
 *
 * @see libs/db/index.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createDb, ConnectionSource, SessionClient } from '../../libs/db/index.js';
import { ColdChainError } from '../../libs/errors/ColdChainError.js';
import { SanitizedError } from '../../libs/errors/sanitizer.js';

class ScriptedSession implements SessionClient {
    readonly calls: string[] = [];
    readonly released: Array<Error | undefined> = [];
    failOn: string | null = null;
    reportedRole: string | null = null;
    private role = 'app_login';

    async query(text: string) {
        this.calls.push(text);
        if (this.failOn !== null && text.startsWith(this.failOn)) {
            throw new Error(`scripted failure: ${text}`);
        }
        const setRole = /^SET (?:LOCAL )?ROLE "(.+)"$/.exec(text);
        if (setRole?.[1]) {
            this.role = setRole[1];
        }
        if (text === 'RESET ROLE') {
            this.role = 'app_login';
        }
        if (text === 'SELECT current_user') {
            return { rows: [{ current_user: this.reportedRole ?? this.role }], rowCount: 1 };
        }
        return { rows: [], rowCount: 0 };
    }

    release(destroy?: Error): void {
        this.released.push(destroy);
    }
}

describe('Database layer', () => {
    let session: ScriptedSession;
    let ended: boolean;
    let db: ReturnType<typeof createDb>;

    beforeEach(() => {
        session = new ScriptedSession();
        ended = false;
        const source: ConnectionSource = {
            connect: async () => session,
            end: async () => {
                ended = true;
            }
        };
        db = createDb(source);
    });

    describe('transactionAsRole()', () => {
        it('wraps the callback in BEGIN / SET LOCAL ROLE / COMMIT', async () => {
            const result = await db.transactionAsRole('coldchain_writer', async client => {
                await client.query('SELECT 1');
                return 'done';
            });

            assert.strictEqual(result, 'done');
            assert.deepStrictEqual(session.calls, [
                'BEGIN',
                'SET LOCAL ROLE "coldchain_writer"',
                'SELECT current_user',
                'SELECT 1',
                'COMMIT',
                'RESET ROLE'
            ]);
            assert.deepStrictEqual(session.released, [undefined]);
        });

        it('rolls back and sanitizes infrastructure errors', async () => {
            await assert.rejects(
                db.transactionAsRole('coldchain_writer', async () => {
                    throw new Error('duplicate key value violates unique constraint');
                }),
                (err: unknown) => {
                    assert.ok(err instanceof SanitizedError);
                    assert.strictEqual(err.contextLabel, 'DatabaseLayer:TransactionFailed');
                    return true;
                }
            );
            assert.deepStrictEqual(session.calls, [
                'BEGIN',
                'SET LOCAL ROLE "coldchain_writer"',
                'SELECT current_user',
                'ROLLBACK',
                'RESET ROLE'
            ]);
            assert.deepStrictEqual(session.released, [undefined]);
        });

        it('passes domain errors through unchanged', async () => {
            const domainError = new ColdChainError('NotFound', 'Policy P1 not found');
            await assert.rejects(
                db.transactionAsRole('coldchain_writer', async () => {
                    throw domainError;
                }),
                (err: unknown) => err === domainError
            );
            assert.ok(session.calls.includes('ROLLBACK'));
        });

        it('refuses to run when the session is not in the requested role', async () => {
            session.reportedRole = 'app_login';
            let ran = false;

            await assert.rejects(
                db.transactionAsRole('coldchain_writer', async () => {
                    ran = true;
                }),
                SanitizedError
            );
            assert.strictEqual(ran, false);
            assert.ok(session.calls.includes('ROLLBACK'));
        });

        it('destroys the client when rollback fails', async () => {
            session.failOn = 'ROLLBACK';

            await assert.rejects(
                db.transactionAsRole('coldchain_writer', async () => {
                    throw new Error('statement timeout');
                }),
                SanitizedError
            );
            assert.strictEqual(session.released.length, 1);
            assert.ok(session.released[0] instanceof Error);
        });

        it('rejects nested transactions', async () => {
            await db.transactionAsRole('coldchain_writer', async () => {
                await assert.rejects(
                    db.transactionAsRole('coldchain_writer', async () => undefined),
                    /Nested transaction detected/
                );
            });
            assert.strictEqual(session.calls.filter(call => call === 'BEGIN').length, 1);
        });
    });

    describe('withRoleClient()', () => {
        it('keeps one session for several statements', async () => {
            const count = await db.withRoleClient('coldchain_reader', async client => {
                await client.query('SELECT 1');
                await client.query('SELECT 2');
                return 2;
            });

            assert.strictEqual(count, 2);
            assert.deepStrictEqual(session.calls, [
                'SET ROLE "coldchain_reader"',
                'SELECT current_user',
                'SELECT 1',
                'SELECT 2',
                'RESET ROLE'
            ]);
            assert.deepStrictEqual(session.released, [undefined]);
        });

        it('destroys the client when the role cannot be reset', async () => {
            session.failOn = 'RESET ROLE';

            await db.withRoleClient('coldchain_reader', async client => client.query('SELECT 42'));
            assert.ok(session.released[0] instanceof Error);
        });
    });

    describe('probeRoles()', () => {
        it('checks every ledger role inside a rolled-back transaction', async () => {
            await db.probeRoles();

            assert.deepStrictEqual(session.calls, [
                'BEGIN',
                'SET LOCAL ROLE "coldchain_writer"',
                'SELECT current_user',
                'ROLLBACK',
                'BEGIN',
                'SET LOCAL ROLE "coldchain_reader"',
                'SELECT current_user',
                'ROLLBACK'
            ]);
            assert.deepStrictEqual(session.released, [undefined]);
        });

        it('fails when a role is not granted', async () => {
            session.failOn = 'SET LOCAL ROLE "coldchain_reader"';
            await assert.rejects(db.probeRoles(), SanitizedError);
            assert.deepStrictEqual(session.released, [undefined]);
        });
    });

    it('closes the connection source on end()', async () => {
        await db.end();
        assert.strictEqual(ended, true);
    });
});
