/**
 * Treasury
 *
 * Custodies the pooled balance and settles approved claims.
 *
 * Settlement order:
 *   1. per-policy in-flight guard
 *   2. commit: policy -> PAID, balance debited
 *   3. dispatch payout
 *   4a. success: record CLAIM_PAID, POLICY_DEACTIVATED
 *   4b. failure: compensate (policy -> APPROVED, balance credited), TransferFailed
 *
 * Because step 2 commits before step 3, a call that re-enters during the
 * dispatch sees a closed policy.
 */

import type { AccessControl } from '../access/accessControl.js';
import { ColdChainError } from '../errors/ColdChainError.js';
import { transition } from '../insurance/policy.js';
import { getOperationLogger, logger } from '../logging/logger.js';
import type { LedgerStore } from '../store/ledgerStore.js';
import { validate } from '../validation/zod-middleware.js';
import { AmountSchema } from '../validation/schema.js';
import type { PayoutInstruction, PayoutRail, PayoutResult } from './payoutRail.js';

export interface SettlementReceipt {
    policyId: string;
    beneficiary: string;
    amount: bigint;
    railReference: string | null;
    remainingBalance: bigint;
}

export class Treasury {
    private readonly inFlight = new Set<string>();

    constructor(
        private readonly store: LedgerStore,
        private readonly access: AccessControl,
        private readonly rail: PayoutRail
    ) { }

    async depositFunds(caller: string, amount: bigint): Promise<bigint> {
        const deposit = validate(AmountSchema, amount, 'Treasury:depositFunds');

        const balance = await this.store.transaction('treasury.deposit', async tx => {
            await this.access.requireNotPaused(tx, 'depositFunds');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'depositFunds');

            const settings = await tx.getSettings();
            const next = settings.balance + deposit;
            await tx.putSettings({ ...settings, balance: next });
            tx.emit({
                type: 'FUNDS_DEPOSITED',
                actor: caller,
                subject: { kind: 'treasury', id: 'pool' },
                fields: { amount: deposit.toString(), balance: next.toString() }
            });
            return next;
        });

        getOperationLogger('depositFunds', caller).info({ amount: deposit.toString() }, 'Funds deposited');
        return balance;
    }

    async balance(): Promise<bigint> {
        return this.store.read(async reader => (await reader.getSettings()).balance);
    }

    async settleClaim(caller: string, policyId: string): Promise<SettlementReceipt> {
        if (this.inFlight.has(policyId)) {
            throw new ColdChainError('InvalidState', `Settlement for policy ${policyId} already in progress`, { policyId });
        }

        this.inFlight.add(policyId);
        try {
            return await this.runSettlement(caller, policyId);
        } finally {
            this.inFlight.delete(policyId);
        }
    }

    private async runSettlement(caller: string, policyId: string): Promise<SettlementReceipt> {
        const opLogger = getOperationLogger('payClaim', caller);

        const { instruction, balanceAfterDebit } = await this.store.transaction('treasury.settle.commit', async tx => {
            await this.access.requireNotPaused(tx, 'payClaim');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'payClaim');

            const policy = await tx.getPolicy(policyId);
            if (!policy) {
                throw new ColdChainError('NotFound', `Policy ${policyId} not found`, { policyId });
            }
            if (policy.stage !== 'APPROVED') {
                throw new ColdChainError('InvalidState', `Policy ${policyId} is not payable in stage ${policy.stage}`, {
                    policyId,
                    stage: policy.stage
                });
            }

            const settings = await tx.getSettings();
            if (settings.balance < policy.claimAmount) {
                throw new ColdChainError('InsufficientFunds', `Pool balance ${settings.balance} below claim ${policy.claimAmount}`, {
                    balance: settings.balance.toString(),
                    required: policy.claimAmount.toString()
                });
            }

            await tx.putPolicy(transition(policy, 'settle'));
            const debited = settings.balance - policy.claimAmount;
            await tx.putSettings({ ...settings, balance: debited });

            const payout: PayoutInstruction = {
                reference: `claim:${policyId}`,
                policyId,
                beneficiary: policy.holder,
                amount: policy.claimAmount
            };
            return { instruction: payout, balanceAfterDebit: debited };
        });

        const result = await this.dispatch(instruction);
        if (!result.success) {
            await this.compensate(instruction);
            opLogger.error({
                policyId,
                errorCode: result.errorCode,
                errorMessage: result.errorMessage
            }, 'Claim payout transfer failed, settlement rolled back');
            throw new ColdChainError('TransferFailed', `Payout for policy ${policyId} failed: ${result.errorMessage ?? result.errorCode ?? 'unknown error'}`, {
                policyId,
                errorCode: result.errorCode ?? null
            });
        }

        const railReference = result.railReference ?? null;
        let remainingBalance = balanceAfterDebit;
        // Funds have moved and PAID is committed; a failed record is logged, not raised.
        try {
            remainingBalance = await this.store.transaction('treasury.settle.record', async tx => {
                tx.emit({
                    type: 'CLAIM_PAID',
                    actor: caller,
                    subject: { kind: 'policy', id: policyId },
                    fields: {
                        beneficiary: instruction.beneficiary,
                        amount: instruction.amount.toString(),
                        railReference
                    }
                });
                tx.emit({
                    type: 'POLICY_DEACTIVATED',
                    actor: caller,
                    subject: { kind: 'policy', id: policyId },
                    fields: {}
                });
                return (await tx.getSettings()).balance;
            });
        } catch (error) {
            opLogger.error({
                policyId,
                beneficiary: instruction.beneficiary,
                amount: instruction.amount.toString(),
                railReference,
                error
            }, 'Claim paid but payout events were not recorded');
        }

        opLogger.info({ policyId, amount: instruction.amount.toString() }, 'Claim paid');
        return {
            policyId,
            beneficiary: instruction.beneficiary,
            amount: instruction.amount,
            railReference,
            remainingBalance
        };
    }

    private async dispatch(instruction: PayoutInstruction): Promise<PayoutResult> {
        try {
            return await this.rail.dispatch(instruction);
        } catch (error) {
            logger.error({ policyId: instruction.policyId, error }, 'Payout rail threw during dispatch');
            return {
                success: false,
                errorCode: 'RAIL_EXCEPTION',
                errorMessage: error instanceof Error ? error.message : String(error)
            };
        }
    }

    /**
     * Reverses the committed close. The claim amount is credited back rather
     * than the old balance restored, so deposits made meanwhile are kept.
     */
    private async compensate(instruction: PayoutInstruction): Promise<void> {
        await this.store.transaction('treasury.settle.compensate', async tx => {
            const policy = await tx.getPolicy(instruction.policyId);
            if (!policy) {
                throw new Error(`Settlement compensation lost policy ${instruction.policyId}`);
            }
            const settings = await tx.getSettings();
            await tx.putPolicy(transition(policy, 'reopen'));
            await tx.putSettings({ ...settings, balance: settings.balance + instruction.amount });
        });
    }
}
