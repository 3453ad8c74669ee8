/**
 * End-to-end custody scenarios over the in-memory store.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { verifyAuditChain } from '../../libs/audit/integrity.js';
import { InternalAccountRail } from '../../libs/treasury/payoutRail.js';
import {
    ADMIN,
    createHarness,
    HOLDER,
    ORACLE,
    registerS1,
    rejectsWithCode
} from '../helpers/custodyHarness.js';

describe('Custody scenarios', () => {
    it('latches a breach across later nominal readings', async () => {
        const harness = await createHarness();
        await registerS1(harness);

        await harness.shipments.logReading(ORACLE, 'S1', { location: 'ramp', temperature: 10 });
        assert.strictEqual(await harness.shipments.isBreached('S1'), true);
        assert.ok(harness.audit.entries().some(record => record.eventType === 'TEMPERATURE_BREACH_DETECTED'));

        await harness.shipments.logReading(ORACLE, 'S1', { location: 'ramp', temperature: 5 });
        assert.strictEqual(await harness.shipments.isBreached('S1'), true);
    });

    it('settles a breached claim once the pool covers it', async () => {
        const rail = new InternalAccountRail();
        const harness = await createHarness({ rail });
        await registerS1(harness);
        await harness.shipments.logReading(ORACLE, 'S1', { location: 'ramp', temperature: 10 });

        await harness.policies.createPolicy(ADMIN, {
            policyId: 'P1',
            shipmentId: 'S1',
            holder: HOLDER,
            premiumAmount: 10n,
            claimAmount: 100n
        });
        const paid = await harness.policies.payPremium(HOLDER, 'P1', 10n);
        assert.strictEqual(paid.premiumPaid, true);

        await harness.policies.fileClaim(HOLDER, 'P1');
        await harness.policies.approveClaim(ADMIN, 'P1');
        await harness.treasury.depositFunds(ADMIN, 40n);
        assert.strictEqual(await harness.treasury.balance(), 50n);

        await rejectsWithCode(harness.policies.payClaim(ADMIN, 'P1'), 'InsufficientFunds');
        assert.strictEqual((await harness.policies.getPolicy('P1')).isActive, true);

        await harness.treasury.depositFunds(ADMIN, 50n);
        const receipt = await harness.policies.payClaim(ADMIN, 'P1');

        assert.strictEqual(receipt.remainingBalance, 0n);
        assert.strictEqual(await harness.treasury.balance(), 0n);
        assert.strictEqual((await harness.policies.getPolicy('P1')).isActive, false);
        assert.strictEqual(rail.balanceOf(HOLDER), 100n);
        assert.deepStrictEqual(verifyAuditChain(harness.audit.entries()), { valid: true });
    });

    it('refuses a claim on a shipment without a breach', async () => {
        const harness = await createHarness();
        await registerS1(harness, 'S2');
        await harness.shipments.logReading(ORACLE, 'S2', { location: 'ramp', temperature: 5 });
        await harness.policies.createPolicy(ADMIN, {
            policyId: 'P2',
            shipmentId: 'S2',
            holder: HOLDER,
            premiumAmount: 10n,
            claimAmount: 100n
        });
        await harness.policies.payPremium(HOLDER, 'P2', 10n);

        await rejectsWithCode(
            harness.policies.fileClaim(HOLDER, 'P2'),
            'PreconditionFailed',
            'No breach detected for shipment S2'
        );
        assert.strictEqual((await harness.policies.getPolicy('P2')).isClaimed, false);
    });

    it('refuses approval from anyone but the administrator', async () => {
        const harness = await createHarness();
        await registerS1(harness);
        await harness.shipments.logReading(ORACLE, 'S1', { location: 'ramp', temperature: 10 });
        await harness.policies.createPolicy(ADMIN, {
            policyId: 'P1',
            shipmentId: 'S1',
            holder: HOLDER,
            premiumAmount: 10n,
            claimAmount: 100n
        });
        await harness.policies.payPremium(HOLDER, 'P1', 10n);
        await harness.policies.fileClaim(HOLDER, 'P1');
        const before = await harness.policies.getPolicy('P1');
        const eventCount = harness.audit.entries().length;

        await rejectsWithCode(harness.policies.approveClaim(HOLDER, 'P1'), 'Unauthorized');

        assert.deepStrictEqual(await harness.policies.getPolicy('P1'), before);
        assert.strictEqual(harness.audit.entries().length, eventCount);
    });
});
