import { AsyncLocalStorage } from 'node:async_hooks';
import type { GrantableRole } from '../access/roles.js';
import type { AuditSink, DomainEvent } from '../audit/schema.js';
import type { PolicyRecord } from '../insurance/policy.js';
import { logger } from '../logging/logger.js';
import type { ShipmentRecord, Thresholds } from '../shipment/shipment.js';
import type { CustodySettings, LedgerReader, LedgerStore, LedgerTx } from './ledgerStore.js';

const transactionContext = new AsyncLocalStorage<{ inTx: boolean; label: string }>();

interface Tables {
    shipments: Map<string, ShipmentRecord>;
    policies: Map<string, PolicyRecord>;
    roles: Set<string>;
    settings: CustodySettings;
}

export interface MemoryLedgerSeed {
    administrator: string;
    defaultThresholds: Thresholds;
    balance?: bigint;
}

function roleKey(actor: string, role: GrantableRole): string {
    return `${role}\u0000${actor}`;
}

function byPolicyId(a: PolicyRecord, b: PolicyRecord): number {
    return a.policyId < b.policyId ? -1 : a.policyId > b.policyId ? 1 : 0;
}

class CommittedReader implements LedgerReader {
    constructor(protected readonly tables: Tables) { }

    async getShipment(shipmentId: string): Promise<ShipmentRecord | null> {
        return this.tables.shipments.get(shipmentId) ?? null;
    }

    async getPolicy(policyId: string): Promise<PolicyRecord | null> {
        return this.tables.policies.get(policyId) ?? null;
    }

    async listPoliciesForShipment(shipmentId: string): Promise<PolicyRecord[]> {
        return [...this.tables.policies.values()]
            .filter(p => p.shipmentId === shipmentId)
            .sort(byPolicyId);
    }

    async hasRole(actor: string, role: GrantableRole): Promise<boolean> {
        return this.tables.roles.has(roleKey(actor, role));
    }

    async getSettings(): Promise<CustodySettings> {
        return this.tables.settings;
    }
}

/**
 * Write-staging transaction. Reads see staged writes first, then committed
 * state; nothing becomes visible to other readers until `applyTo()`.
 */
class StagedTx extends CommittedReader implements LedgerTx {
    private readonly shipments = new Map<string, ShipmentRecord>();
    private readonly policies = new Map<string, PolicyRecord>();
    private readonly roles = new Map<string, boolean>();
    private settings: CustodySettings | null = null;
    readonly events: DomainEvent[] = [];

    override async getShipment(shipmentId: string): Promise<ShipmentRecord | null> {
        return this.shipments.get(shipmentId) ?? super.getShipment(shipmentId);
    }

    override async getPolicy(policyId: string): Promise<PolicyRecord | null> {
        return this.policies.get(policyId) ?? super.getPolicy(policyId);
    }

    override async listPoliciesForShipment(shipmentId: string): Promise<PolicyRecord[]> {
        const merged = new Map(this.tables.policies);
        for (const [id, record] of this.policies) merged.set(id, record);
        return [...merged.values()]
            .filter(p => p.shipmentId === shipmentId)
            .sort(byPolicyId);
    }

    override async hasRole(actor: string, role: GrantableRole): Promise<boolean> {
        const staged = this.roles.get(roleKey(actor, role));
        return staged ?? super.hasRole(actor, role);
    }

    override async getSettings(): Promise<CustodySettings> {
        return this.settings ?? super.getSettings();
    }

    async putShipment(record: ShipmentRecord): Promise<void> {
        this.shipments.set(record.shipmentId, record);
    }

    async putPolicy(record: PolicyRecord): Promise<void> {
        this.policies.set(record.policyId, record);
    }

    async grantRole(actor: string, role: GrantableRole): Promise<void> {
        this.roles.set(roleKey(actor, role), true);
    }

    async revokeRole(actor: string, role: GrantableRole): Promise<void> {
        this.roles.set(roleKey(actor, role), false);
    }

    async putSettings(settings: CustodySettings): Promise<void> {
        this.settings = Object.freeze({ ...settings });
    }

    emit(event: DomainEvent): void {
        this.events.push(event);
    }

    applyTo(tables: Tables): void {
        for (const [id, record] of this.shipments) tables.shipments.set(id, record);
        for (const [id, record] of this.policies) tables.policies.set(id, record);
        for (const [key, granted] of this.roles) {
            if (granted) tables.roles.add(key);
            else tables.roles.delete(key);
        }
        if (this.settings) tables.settings = this.settings;
    }
}

/**
 * In-process ledger store.
 * Transactions run one at a time in submission order.
 */
export class MemoryLedgerStore implements LedgerStore {
    private readonly tables: Tables;
    private queue: Promise<void> = Promise.resolve();

    constructor(private readonly sink: AuditSink, seed: MemoryLedgerSeed) {
        this.tables = {
            shipments: new Map(),
            policies: new Map(),
            roles: new Set(),
            settings: Object.freeze({
                administrator: seed.administrator,
                paused: false,
                defaultThresholds: Object.freeze({ ...seed.defaultThresholds }),
                balance: seed.balance ?? 0n
            })
        };
    }

    transaction<T>(label: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
        const active = transactionContext.getStore();
        if (active?.inTx) {
            return Promise.reject(new Error(
                `Nested transaction detected: ${label} cannot run inside active transaction ${active.label}.`
            ));
        }

        const run = this.queue.then(() => this.runTransaction(label, fn));
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    async read<T>(fn: (reader: LedgerReader) => Promise<T>): Promise<T> {
        return fn(new CommittedReader(this.tables));
    }

    private runTransaction<T>(label: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
        return transactionContext.run({ inTx: true, label }, async () => {
            const tx = new StagedTx(this.tables);
            let result: T;
            try {
                result = await fn(tx);
            } catch (error) {
                logger.debug({ label, error }, '[Ledger] Transaction rolled back');
                throw error;
            }

            tx.applyTo(this.tables);
            this.forward(label, tx.events);
            return result;
        });
    }

    private forward(label: string, events: readonly DomainEvent[]): void {
        for (const event of events) {
            try {
                this.sink.record(event);
            } catch (error) {
                logger.error({ label, eventType: event.type, error }, '[Ledger] Audit sink rejected committed event');
            }
        }
    }
}
