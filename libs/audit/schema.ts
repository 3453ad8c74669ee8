/**
 * Custody Audit Schema v1
 *
 * Objectives:
 * - Append-only
 * - Ordered per transaction
 * - Tamper-evident through hash chaining
 */

export type AuditEventType =
    // Access control
    | 'ROLE_GRANTED'
    | 'ROLE_REVOKED'
    | 'ADMINISTRATOR_TRANSFERRED'
    | 'SYSTEM_PAUSED'
    | 'SYSTEM_UNPAUSED'
    // Shipments
    | 'THRESHOLDS_UPDATED'
    | 'SHIPMENT_INITIALIZED'
    | 'TEMPERATURE_BREACH_DETECTED'
    | 'DATA_LOGGED'
    | 'SHIPMENT_DELIVERED'
    // Policies
    | 'POLICY_CREATED'
    | 'PREMIUM_PAID'
    | 'CLAIM_FILED'
    | 'CLAIM_APPROVED'
    | 'CLAIM_DECLINED'
    // Treasury
    | 'FUNDS_DEPOSITED'
    | 'CLAIM_PAID'
    | 'POLICY_DEACTIVATED';

export type AuditSubjectKind = 'access' | 'shipment' | 'policy' | 'treasury';

export type AuditFieldValue = string | number | boolean | null;

/**
 * Event as emitted by a ledger component inside a transaction.
 */
export interface DomainEvent {
    type: AuditEventType;
    actor: string;
    subject: {
        kind: AuditSubjectKind;
        id: string;
    };
    fields: Readonly<Record<string, AuditFieldValue>>;
}

export interface AuditRecordV1 {
    eventId: string;        // UUID
    sequence: number;       // position in the chain, from 1
    eventType: AuditEventType;
    timestamp: string;      // ISO-8601
    actor: string;
    subject: DomainEvent['subject'];
    fields: DomainEvent['fields'];
    integrity: {
        prevHash: string;     // Hash of the immediately preceding record
        hash: string;         // SHA-256(this_record_serialized || prevHash)
    };
}

/**
 * Receives committed events, in commit order.
 */
export interface AuditSink {
    record(event: DomainEvent): void;
}

export const GENESIS_HASH = "0".repeat(64);
