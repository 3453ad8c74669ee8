/**
 * Policy Registry
 *
 * Drives the claim lifecycle. Breach status is read exclusively through the
 * BreachOracleLink, at filing time and again at approval time, before the
 * claim transaction opens.
 */

import type { AccessControl } from '../access/accessControl.js';
import { ColdChainError, isColdChainError } from '../errors/ColdChainError.js';
import { getOperationLogger } from '../logging/logger.js';
import type { BreachOracleLink } from '../shipment/breachOracleLink.js';
import type { LedgerReader, LedgerStore } from '../store/ledgerStore.js';
import type { SettlementReceipt, Treasury } from '../treasury/treasury.js';
import { validate } from '../validation/zod-middleware.js';
import { AmountSchema, PolicyIdSchema, PolicyTermsSchema, ShipmentIdSchema } from '../validation/schema.js';
import { isActive, newPolicy, Policy, PolicyRecord, toPolicyView, transition } from './policy.js';

export interface PolicyTerms {
    policyId: string;
    shipmentId: string;
    holder: string;
    premiumAmount: bigint;
    claimAmount: bigint;
}

export class PolicyRegistry {
    constructor(
        private readonly store: LedgerStore,
        private readonly access: AccessControl,
        private readonly breachLink: BreachOracleLink,
        private readonly treasury: Treasury,
        private readonly clock: () => Date = () => new Date()
    ) { }

    async createPolicy(caller: string, terms: PolicyTerms): Promise<Policy> {
        const input = validate(PolicyTermsSchema, terms, 'PolicyRegistry:createPolicy');

        const record = await this.store.transaction('policy.create', async tx => {
            await this.access.requireNotPaused(tx, 'createPolicy');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'createPolicy');

            if (await tx.getPolicy(input.policyId)) {
                throw new ColdChainError('AlreadyExists', `Policy ${input.policyId} already exists`);
            }

            // The shipment may not be registered yet; it is resolved when a claim is filed.
            const created = newPolicy({ ...input, createdAt: this.clock().toISOString() });
            await tx.putPolicy(created);
            tx.emit({
                type: 'POLICY_CREATED',
                actor: caller,
                subject: { kind: 'policy', id: created.policyId },
                fields: {
                    shipmentId: created.shipmentId,
                    holder: created.holder,
                    premiumAmount: created.premiumAmount.toString(),
                    claimAmount: created.claimAmount.toString()
                }
            });
            return created;
        });

        getOperationLogger('createPolicy', caller).info({
            policyId: record.policyId,
            shipmentId: record.shipmentId
        }, 'Policy created');
        return toPolicyView(record);
    }

    async payPremium(caller: string, policyId: string, amount: bigint): Promise<Policy> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyRegistry:payPremium');
        const paid = validate(AmountSchema, amount, 'PolicyRegistry:payPremium');

        const record = await this.store.transaction('policy.payPremium', async tx => {
            await this.access.requireNotPaused(tx, 'payPremium');

            const current = await requirePolicy(tx, id);
            requireHolder(current, caller, 'payPremium');
            requireActive(current);
            if (current.stage !== 'CREATED') {
                throw new ColdChainError('InvalidState', `Premium for policy ${id} already paid`, { policyId: id });
            }
            if (paid !== current.premiumAmount) {
                throw new ColdChainError(
                    'InvalidInput',
                    `Premium for policy ${id} must be exactly ${current.premiumAmount}, got ${paid}`,
                    { expected: current.premiumAmount.toString(), received: paid.toString() }
                );
            }

            const next = transition(current, 'payPremium');
            const settings = await tx.getSettings();
            await tx.putPolicy(next);
            await tx.putSettings({ ...settings, balance: settings.balance + paid });
            tx.emit({
                type: 'PREMIUM_PAID',
                actor: caller,
                subject: { kind: 'policy', id },
                fields: { amount: paid.toString() }
            });
            return next;
        });

        getOperationLogger('payPremium', caller).info({ policyId: id }, 'Premium received');
        return toPolicyView(record);
    }

    async fileClaim(caller: string, policyId: string): Promise<Policy> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyRegistry:fileClaim');
        const verdict = await this.checkBreach(id);

        const record = await this.store.transaction('policy.fileClaim', async tx => {
            await this.access.requireNotPaused(tx, 'fileClaim');

            const current = await requirePolicy(tx, id);
            requireHolder(current, caller, 'fileClaim');
            requireActive(current);
            if (current.stage === 'CREATED') {
                throw new ColdChainError('InvalidState', `Premium for policy ${id} has not been paid`, { policyId: id });
            }
            if (current.stage !== 'PREMIUM_PAID') {
                throw new ColdChainError('InvalidState', `Claim for policy ${id} already filed`, { policyId: id });
            }
            requireBreach(verdict, current);

            const next = transition(current, 'fileClaim');
            await tx.putPolicy(next);
            tx.emit({
                type: 'CLAIM_FILED',
                actor: caller,
                subject: { kind: 'policy', id },
                fields: { shipmentId: current.shipmentId, claimAmount: current.claimAmount.toString() }
            });
            return next;
        });

        getOperationLogger('fileClaim', caller).info({ policyId: id }, 'Claim filed');
        return toPolicyView(record);
    }

    async approveClaim(caller: string, policyId: string): Promise<Policy> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyRegistry:approveClaim');
        const verdict = await this.checkBreach(id);

        const record = await this.store.transaction('policy.approveClaim', async tx => {
            await this.access.requireNotPaused(tx, 'approveClaim');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'approveClaim');

            const current = await requirePolicy(tx, id);
            requireActive(current);
            if (current.stage !== 'CLAIMED') {
                throw new ColdChainError(
                    'InvalidState',
                    current.stage === 'APPROVED'
                        ? `Claim for policy ${id} already approved`
                        : `No open claim on policy ${id}`,
                    { policyId: id, stage: current.stage }
                );
            }
            requireBreach(verdict, current);

            const next = transition(current, 'approveClaim');
            await tx.putPolicy(next);
            tx.emit({
                type: 'CLAIM_APPROVED',
                actor: caller,
                subject: { kind: 'policy', id },
                fields: { claimAmount: current.claimAmount.toString() }
            });
            return next;
        });

        getOperationLogger('approveClaim', caller).info({ policyId: id }, 'Claim approved');
        return toPolicyView(record);
    }

    async declineClaim(caller: string, policyId: string): Promise<Policy> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyRegistry:declineClaim');

        const record = await this.store.transaction('policy.declineClaim', async tx => {
            await this.access.requireNotPaused(tx, 'declineClaim');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'declineClaim');

            const current = await requirePolicy(tx, id);
            requireActive(current);
            if (current.stage !== 'CLAIMED') {
                throw new ColdChainError(
                    'InvalidState',
                    current.stage === 'APPROVED'
                        ? `Claim for policy ${id} is approved and can no longer be declined`
                        : `No open claim on policy ${id}`,
                    { policyId: id, stage: current.stage }
                );
            }

            const next = transition(current, 'declineClaim');
            await tx.putPolicy(next);
            tx.emit({
                type: 'CLAIM_DECLINED',
                actor: caller,
                subject: { kind: 'policy', id },
                fields: { declineCount: next.declineCount }
            });
            return next;
        });

        getOperationLogger('declineClaim', caller).info({ policyId: id }, 'Claim declined');
        return toPolicyView(record);
    }

    async payClaim(caller: string, policyId: string): Promise<SettlementReceipt> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyRegistry:payClaim');
        return this.treasury.settleClaim(caller, id);
    }

    async getPolicy(policyId: string): Promise<Policy> {
        const record = await this.store.read(reader => requirePolicy(reader, policyId));
        return toPolicyView(record);
    }

    async policiesForShipment(shipmentId: string): Promise<Policy[]> {
        const id = validate(ShipmentIdSchema, shipmentId, 'PolicyRegistry:policiesForShipment');
        const records = await this.store.read(reader => reader.listPoliciesForShipment(id));
        return records.map(toPolicyView);
    }

    /**
     * Resolves the breach status of the policy's shipment before the claim
     * transaction opens, so the lookup never needs a second store session
     * while the transaction holds one. Breach is monotonic; a verdict taken
     * here still holds when the transaction commits.
     */
    private async checkBreach(policyId: string): Promise<BreachVerdict | null> {
        const policy = await this.store.read(reader => reader.getPolicy(policyId));
        if (!policy) return null;

        try {
            const breached = await this.breachLink.isBreached(policy.shipmentId);
            return {
                shipmentId: policy.shipmentId,
                failure: breached ? null : new ColdChainError(
                    'PreconditionFailed',
                    `No breach detected for shipment ${policy.shipmentId}`,
                    { policyId, shipmentId: policy.shipmentId }
                )
            };
        } catch (error) {
            if (isColdChainError(error, 'NotFound')) {
                return { shipmentId: policy.shipmentId, failure: error };
            }
            throw error;
        }
    }
}

interface BreachVerdict {
    shipmentId: string;
    failure: ColdChainError | null;
}

function requireBreach(verdict: BreachVerdict | null, policy: PolicyRecord): void {
    // Policy created after the pre-check; its shipment was never looked up.
    if (!verdict || verdict.shipmentId !== policy.shipmentId) {
        throw new ColdChainError('InvalidState', `Policy ${policy.policyId} changed during the breach check, retry`, {
            policyId: policy.policyId
        });
    }
    if (verdict.failure) {
        throw verdict.failure;
    }
}

async function requirePolicy(reader: LedgerReader, policyId: string): Promise<PolicyRecord> {
    const record = await reader.getPolicy(policyId);
    if (!record) {
        throw new ColdChainError('NotFound', `Policy ${policyId} not found`, { policyId });
    }
    return record;
}

function requireHolder(policy: PolicyRecord, caller: string, action: string): void {
    if (policy.holder !== caller) {
        throw new ColdChainError('Unauthorized', `Only the holder of policy ${policy.policyId} may ${action}`, {
            policyId: policy.policyId,
            action
        });
    }
}

function requireActive(policy: PolicyRecord): void {
    if (!isActive(policy)) {
        throw new ColdChainError('InvalidState', `Policy ${policy.policyId} is no longer active`, {
            policyId: policy.policyId
        });
    }
}
