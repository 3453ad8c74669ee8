/**
 * Insurance policy model and claim state machine.
 *
 *   CREATED -> PREMIUM_PAID -> CLAIMED -> APPROVED -> PAID
 *                    ^            |
 *                    +-- decline -+
 *
 * PAID is terminal. The only way out of PAID is the settlement compensation
 * path, which restores APPROVED when the payout transfer fails.
 */

import { ColdChainError } from '../errors/ColdChainError.js';

export type PolicyStage = 'CREATED' | 'PREMIUM_PAID' | 'CLAIMED' | 'APPROVED' | 'PAID';

export type PolicyTransition = 'payPremium' | 'fileClaim' | 'approveClaim' | 'declineClaim' | 'settle' | 'reopen';

const TRANSITIONS: Record<PolicyTransition, { from: PolicyStage; to: PolicyStage }> = {
    payPremium: { from: 'CREATED', to: 'PREMIUM_PAID' },
    fileClaim: { from: 'PREMIUM_PAID', to: 'CLAIMED' },
    approveClaim: { from: 'CLAIMED', to: 'APPROVED' },
    declineClaim: { from: 'CLAIMED', to: 'PREMIUM_PAID' },
    settle: { from: 'APPROVED', to: 'PAID' },
    reopen: { from: 'PAID', to: 'APPROVED' }
};

export interface PolicyRecord {
    readonly policyId: string;
    readonly shipmentId: string;
    readonly holder: string;
    readonly premiumAmount: bigint;
    readonly claimAmount: bigint;
    readonly stage: PolicyStage;
    readonly declineCount: number;
    readonly createdAt: string;
}

/**
 * Read projection returned by the query surface.
 */
export interface Policy {
    readonly policyId: string;
    readonly shipmentId: string;
    readonly holder: string;
    readonly premiumAmount: bigint;
    readonly claimAmount: bigint;
    readonly isActive: boolean;
    readonly premiumPaid: boolean;
    readonly isClaimed: boolean;
    readonly isClaimApproved: boolean;
    readonly declineCount: number;
    readonly createdAt: string;
}

export function newPolicy(params: {
    policyId: string;
    shipmentId: string;
    holder: string;
    premiumAmount: bigint;
    claimAmount: bigint;
    createdAt: string;
}): PolicyRecord {
    const record: PolicyRecord = { ...params, stage: 'CREATED', declineCount: 0 };
    return Object.freeze(record);
}

export function canTransition(record: PolicyRecord, transition: PolicyTransition): boolean {
    return TRANSITIONS[transition].from === record.stage;
}

/**
 * Applies a transition or throws `InvalidState` naming the current stage.
 */
export function transition(record: PolicyRecord, name: PolicyTransition): PolicyRecord {
    const rule = TRANSITIONS[name];
    if (rule.from !== record.stage) {
        throw new ColdChainError(
            'InvalidState',
            `Policy ${record.policyId} cannot ${name} from stage ${record.stage}`,
            { policyId: record.policyId, stage: record.stage, transition: name }
        );
    }

    const next: PolicyRecord = {
        ...record,
        stage: rule.to,
        declineCount: name === 'declineClaim' ? record.declineCount + 1 : record.declineCount
    };
    return Object.freeze(next);
}

export function isActive(record: PolicyRecord): boolean {
    return record.stage !== 'PAID';
}

export function toPolicyView(record: PolicyRecord): Policy {
    const stage = record.stage;
    const view: Policy = {
        policyId: record.policyId,
        shipmentId: record.shipmentId,
        holder: record.holder,
        premiumAmount: record.premiumAmount,
        claimAmount: record.claimAmount,
        isActive: stage !== 'PAID',
        premiumPaid: stage !== 'CREATED',
        isClaimed: stage === 'CLAIMED' || stage === 'APPROVED' || stage === 'PAID',
        isClaimApproved: stage === 'APPROVED' || stage === 'PAID',
        declineCount: record.declineCount,
        createdAt: record.createdAt
    };
    return Object.freeze(view);
}
