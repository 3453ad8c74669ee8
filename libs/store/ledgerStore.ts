/**
 * Ledger Store Contract
 *
 * Logical layout:
 *   shipments:        shipmentId -> ShipmentRecord
 *   policies:         policyId   -> PolicyRecord
 *   role_assignments: (actor, role) pairs for SUPPLIER / ORACLE
 *   custody_settings: administrator, pause flag, default thresholds, pooled balance
 *
 * Every mutation happens inside `transaction()`. A transaction either commits
 * all of its writes and events or none of them. Transactions on one store are
 * serialized; nesting one inside another is rejected.
 */

import type { GrantableRole } from '../access/roles.js';
import type { DomainEvent } from '../audit/schema.js';
import type { PolicyRecord } from '../insurance/policy.js';
import type { ShipmentRecord, Thresholds } from '../shipment/shipment.js';

export interface CustodySettings {
    readonly administrator: string;
    readonly paused: boolean;
    readonly defaultThresholds: Thresholds;
    readonly balance: bigint;
}

export interface LedgerReader {
    getShipment(shipmentId: string): Promise<ShipmentRecord | null>;
    getPolicy(policyId: string): Promise<PolicyRecord | null>;
    listPoliciesForShipment(shipmentId: string): Promise<PolicyRecord[]>;
    hasRole(actor: string, role: GrantableRole): Promise<boolean>;
    getSettings(): Promise<CustodySettings>;
}

export interface LedgerTx extends LedgerReader {
    putShipment(record: ShipmentRecord): Promise<void>;
    putPolicy(record: PolicyRecord): Promise<void>;
    grantRole(actor: string, role: GrantableRole): Promise<void>;
    revokeRole(actor: string, role: GrantableRole): Promise<void>;
    putSettings(settings: CustodySettings): Promise<void>;
    /** Stages an event; it reaches the audit sink only if the transaction commits. */
    emit(event: DomainEvent): void;
}

export interface LedgerStore {
    transaction<T>(label: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
    read<T>(fn: (reader: LedgerReader) => Promise<T>): Promise<T>;
}
