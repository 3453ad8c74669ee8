import { AuditRecordV1, AuditSink, DomainEvent, GENESIS_HASH } from "./schema.js";
import { logger } from "../logging/logger.js";
import crypto from "crypto";

export function hashAuditContents(contents: Omit<AuditRecordV1, 'integrity'>, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(JSON.stringify(contents) + prevHash)
        .digest("hex");
}

/**
 * Hash-chained audit log.
 * Every record commits to its predecessor, so any edit or removal breaks the chain.
 */
export class HashChainedAuditLog implements AuditSink {
    private readonly records: AuditRecordV1[] = [];
    private lastHash: string = GENESIS_HASH;

    constructor(private readonly clock: () => Date = () => new Date()) { }

    public record(event: DomainEvent): void {
        const contents: Omit<AuditRecordV1, 'integrity'> = {
            eventId: crypto.randomUUID(),
            sequence: this.records.length + 1,
            eventType: event.type,
            timestamp: this.clock().toISOString(),
            actor: event.actor,
            subject: { ...event.subject },
            fields: { ...event.fields }
        };

        const prevHash = this.lastHash;
        const hash = hashAuditContents(contents, prevHash);
        const signedRecord: AuditRecordV1 = Object.freeze({
            ...contents,
            integrity: { prevHash, hash }
        });

        this.records.push(signedRecord);
        this.lastHash = hash;

        logger.info({
            auditEvent: event.type,
            subject: event.subject,
            sequence: signedRecord.sequence,
            integrityHash: hash.substring(0, 16) + '...'
        }, "Audit record appended");
    }

    public entries(): readonly AuditRecordV1[] {
        return [...this.records];
    }

    public head(): string {
        return this.lastHash;
    }
}
