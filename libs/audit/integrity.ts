import { AuditRecordV1, GENESIS_HASH } from "./schema.js";
import { hashAuditContents } from "./logger.js";

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of audit records.
 */
export function verifyAuditChain(records: readonly AuditRecordV1[]): {
    valid: boolean;
    violationIndex?: number;
    reason?: string
} {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        if (record.sequence !== i + 1) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Sequence gap at record ${i}: expected ${i + 1}, found ${record.sequence}`
            };
        }

        // Remove integrity field to reconstruct the content that was hashed
        const { integrity, ...contentsOnly } = record;
        const computedHash = hashAuditContents(contentsOnly, integrity.prevHash);

        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}
