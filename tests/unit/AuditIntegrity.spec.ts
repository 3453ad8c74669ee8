import { describe, it } from 'node:test';
import assert from 'node:assert';
import { verifyAuditChain } from '../../libs/audit/integrity.js';
import { HashChainedAuditLog } from '../../libs/audit/logger.js';
import { AuditRecordV1, GENESIS_HASH } from '../../libs/audit/schema.js';

function buildLog(): HashChainedAuditLog {
    const log = new HashChainedAuditLog(() => new Date('2026-03-01T08:00:00.000Z'));
    log.record({ type: 'FUNDS_DEPOSITED', actor: 'admin-1', subject: { kind: 'treasury', id: 'pool' }, fields: { amount: '50', balance: '50' } });
    log.record({ type: 'POLICY_CREATED', actor: 'admin-1', subject: { kind: 'policy', id: 'P1' }, fields: { claimAmount: '100' } });
    log.record({ type: 'SYSTEM_PAUSED', actor: 'admin-1', subject: { kind: 'access', id: 'system' }, fields: {} });
    return log;
}

describe('verifyAuditChain (Integrity)', () => {
    it('should verify a valid chain', () => {
        const log = buildLog();
        const records = log.entries();

        assert.deepStrictEqual(verifyAuditChain(records), { valid: true });
        assert.strictEqual(records[0]?.integrity.prevHash, GENESIS_HASH);
        assert.deepStrictEqual(records.map(r => r.sequence), [1, 2, 3]);
        assert.strictEqual(log.head(), records[2]?.integrity.hash);
    });

    it('should accept an empty chain', () => {
        assert.deepStrictEqual(verifyAuditChain([]), { valid: true });
    });

    it('should detect an edited record', () => {
        const records: AuditRecordV1[] = [...buildLog().entries()];
        const target = records[1];
        assert.ok(target);
        records[1] = { ...target, fields: { claimAmount: '999' } };

        const result = verifyAuditChain(records);
        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.ok(result.reason?.startsWith('Integrity violation at record 1'));
    });

    it('should detect a removed record', () => {
        const [first, , third] = buildLog().entries();
        assert.ok(first && third);

        const result = verifyAuditChain([first, third]);
        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.ok(result.reason?.startsWith('Chain broken at record 1: prevHash mismatch'));
    });

    it('should freeze appended records', () => {
        const [first] = buildLog().entries();
        assert.ok(Object.isFrozen(first));
    });
});
