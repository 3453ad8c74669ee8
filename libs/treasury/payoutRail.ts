/**
 * Payout Rail
 * Outbound value transfer used by the settlement protocol.
 *
 * A rail may report failure by returning `success: false` or by throwing;
 * both are treated the same by the Treasury.
 */

export interface PayoutInstruction {
    /** Stable reference for the payout, unique per policy */
    reference: string;
    policyId: string;
    beneficiary: string;
    amount: bigint;
}

export interface PayoutResult {
    success: boolean;
    railReference?: string;
    errorCode?: string;
    errorMessage?: string;
}

export interface PayoutRail {
    dispatch(instruction: PayoutInstruction): Promise<PayoutResult>;
}

/**
 * In-process rail that credits beneficiary accounts held in memory.
 */
export class InternalAccountRail implements PayoutRail {
    private readonly accounts = new Map<string, bigint>();
    private readonly settled = new Set<string>();

    async dispatch(instruction: PayoutInstruction): Promise<PayoutResult> {
        if (this.settled.has(instruction.reference)) {
            return {
                success: false,
                errorCode: 'DUPLICATE_REFERENCE',
                errorMessage: `Payout ${instruction.reference} already settled`
            };
        }

        this.settled.add(instruction.reference);
        const current = this.accounts.get(instruction.beneficiary) ?? 0n;
        this.accounts.set(instruction.beneficiary, current + instruction.amount);
        return { success: true, railReference: `internal:${instruction.reference}` };
    }

    balanceOf(beneficiary: string): bigint {
        return this.accounts.get(beneficiary) ?? 0n;
    }
}
