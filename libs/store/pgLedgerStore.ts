/**
 * PostgreSQL ledger store.
 *
 * Every transaction locks the single custody_settings row first (all domain
 * operations read settings for the pause gate), which serializes writers the
 * same way the in-memory store does. Staged events are written to
 * custody_events inside the transaction and forwarded to the audit sink only
 * after COMMIT.
 */

import { z } from 'zod';
import type { GrantableRole } from '../access/roles.js';
import type { AuditSink, DomainEvent } from '../audit/schema.js';
import type { Queryable, RoleBoundClient, Row, TxClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import type { PolicyRecord } from '../insurance/policy.js';
import { logger } from '../logging/logger.js';
import type { ShipmentRecord, Thresholds } from '../shipment/shipment.js';
import type { CustodySettings, LedgerReader, LedgerStore, LedgerTx } from './ledgerStore.js';

export interface LedgerDb {
    transactionAsRole<T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T>;
    withRoleClient<T>(role: DbRole, callback: (client: RoleBoundClient) => Promise<T>): Promise<T>;
}

export interface PgLedgerSeed {
    administrator: string;
    defaultThresholds: Thresholds;
}

const Decimal = z.union([
    z.string().regex(/^-?\d+$/),
    z.number().int(),
    z.bigint()
]).transform(value => BigInt(value));

const Timestamp = z.union([z.date(), z.string()])
    .transform(value => typeof value === 'string' ? value : value.toISOString());

const ShipmentRow = z.object({
    shipment_id: z.string(),
    sender: z.string(),
    receiver: z.string(),
    threshold_min: z.coerce.number(),
    threshold_max: z.coerce.number(),
    custody: z.enum(['IN_TRANSIT', 'DELIVERED']),
    condition: z.enum(['NOMINAL', 'BREACHED']),
    readings: z.array(z.object({
        temperature: z.number(),
        location: z.string(),
        timestamp: z.string()
    })),
    registered_at: Timestamp
});

const PolicyRow = z.object({
    policy_id: z.string(),
    shipment_id: z.string(),
    holder: z.string(),
    premium_amount: Decimal,
    claim_amount: Decimal,
    stage: z.enum(['CREATED', 'PREMIUM_PAID', 'CLAIMED', 'APPROVED', 'PAID']),
    decline_count: z.coerce.number().int().nonnegative(),
    created_at: Timestamp
});

const SettingsRow = z.object({
    administrator: z.string(),
    paused: z.boolean(),
    threshold_min: z.coerce.number(),
    threshold_max: z.coerce.number(),
    balance: Decimal
});

const SHIPMENT_COLUMNS = 'shipment_id, sender, receiver, threshold_min, threshold_max, custody, condition, readings, registered_at';
const POLICY_COLUMNS = 'policy_id, shipment_id, holder, premium_amount, claim_amount, stage, decline_count, created_at';
const SETTINGS_COLUMNS = 'administrator, paused, threshold_min, threshold_max, balance';

function toShipmentRecord(row: Row): ShipmentRecord {
    const parsed = ShipmentRow.parse(row);
    return {
        shipmentId: parsed.shipment_id,
        sender: parsed.sender,
        receiver: parsed.receiver,
        thresholds: { min: parsed.threshold_min, max: parsed.threshold_max },
        custody: parsed.custody,
        condition: parsed.condition,
        readings: Object.freeze(parsed.readings.map(reading => Object.freeze(reading))),
        registeredAt: parsed.registered_at
    };
}

function toPolicyRecord(row: Row): PolicyRecord {
    const parsed = PolicyRow.parse(row);
    return {
        policyId: parsed.policy_id,
        shipmentId: parsed.shipment_id,
        holder: parsed.holder,
        premiumAmount: parsed.premium_amount,
        claimAmount: parsed.claim_amount,
        stage: parsed.stage,
        declineCount: parsed.decline_count,
        createdAt: parsed.created_at
    };
}

function toSettings(row: Row): CustodySettings {
    const parsed = SettingsRow.parse(row);
    return {
        administrator: parsed.administrator,
        paused: parsed.paused,
        defaultThresholds: { min: parsed.threshold_min, max: parsed.threshold_max },
        balance: parsed.balance
    };
}

class PgLedgerReader implements LedgerReader {
    constructor(
        protected readonly client: Queryable,
        private readonly lockClause: string
    ) { }

    async getShipment(shipmentId: string): Promise<ShipmentRecord | null> {
        const result = await this.client.query(
            `SELECT ${SHIPMENT_COLUMNS} FROM shipments WHERE shipment_id = $1${this.lockClause}`,
            [shipmentId]
        );
        const row = result.rows[0];
        return row ? toShipmentRecord(row) : null;
    }

    async getPolicy(policyId: string): Promise<PolicyRecord | null> {
        const result = await this.client.query(
            `SELECT ${POLICY_COLUMNS} FROM policies WHERE policy_id = $1${this.lockClause}`,
            [policyId]
        );
        const row = result.rows[0];
        return row ? toPolicyRecord(row) : null;
    }

    async listPoliciesForShipment(shipmentId: string): Promise<PolicyRecord[]> {
        const result = await this.client.query(
            `SELECT ${POLICY_COLUMNS} FROM policies WHERE shipment_id = $1 ORDER BY policy_id`,
            [shipmentId]
        );
        return result.rows.map(toPolicyRecord);
    }

    async hasRole(actor: string, role: GrantableRole): Promise<boolean> {
        const result = await this.client.query(
            'SELECT 1 FROM role_assignments WHERE actor = $1 AND role = $2',
            [actor, role]
        );
        return result.rows.length > 0;
    }

    async getSettings(): Promise<CustodySettings> {
        const result = await this.client.query(
            `SELECT ${SETTINGS_COLUMNS} FROM custody_settings WHERE id = 1${this.lockClause}`
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error('custody_settings row missing; ledger has not been seeded');
        }
        return toSettings(row);
    }
}

class PgLedgerTx extends PgLedgerReader implements LedgerTx {
    readonly events: DomainEvent[] = [];

    constructor(client: TxClient, private readonly clock: () => Date) {
        super(client, ' FOR UPDATE');
    }

    async putShipment(record: ShipmentRecord): Promise<void> {
        await this.client.query(
            `INSERT INTO shipments (${SHIPMENT_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9)
             ON CONFLICT (shipment_id) DO UPDATE
             SET custody = EXCLUDED.custody,
                 condition = EXCLUDED.condition,
                 readings = EXCLUDED.readings`,
            [
                record.shipmentId,
                record.sender,
                record.receiver,
                record.thresholds.min,
                record.thresholds.max,
                record.custody,
                record.condition,
                JSON.stringify(record.readings),
                record.registeredAt
            ]
        );
    }

    async putPolicy(record: PolicyRecord): Promise<void> {
        await this.client.query(
            `INSERT INTO policies (${POLICY_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (policy_id) DO UPDATE
             SET stage = EXCLUDED.stage,
                 decline_count = EXCLUDED.decline_count`,
            [
                record.policyId,
                record.shipmentId,
                record.holder,
                record.premiumAmount.toString(),
                record.claimAmount.toString(),
                record.stage,
                record.declineCount,
                record.createdAt
            ]
        );
    }

    async grantRole(actor: string, role: GrantableRole): Promise<void> {
        await this.client.query(
            'INSERT INTO role_assignments (actor, role) VALUES ($1, $2) ON CONFLICT DO NOTHING',
            [actor, role]
        );
    }

    async revokeRole(actor: string, role: GrantableRole): Promise<void> {
        await this.client.query(
            'DELETE FROM role_assignments WHERE actor = $1 AND role = $2',
            [actor, role]
        );
    }

    async putSettings(settings: CustodySettings): Promise<void> {
        await this.client.query(
            `UPDATE custody_settings
             SET administrator = $1, paused = $2, threshold_min = $3, threshold_max = $4, balance = $5
             WHERE id = 1`,
            [
                settings.administrator,
                settings.paused,
                settings.defaultThresholds.min,
                settings.defaultThresholds.max,
                settings.balance.toString()
            ]
        );
    }

    emit(event: DomainEvent): void {
        this.events.push(event);
    }

    async flushEvents(): Promise<void> {
        const recordedAt = this.clock().toISOString();
        for (const event of this.events) {
            await this.client.query(
                `INSERT INTO custody_events (event_type, actor, subject_kind, subject_id, fields, recorded_at)
                 VALUES ($1, $2, $3, $4, $5::jsonb, $6)`,
                [event.type, event.actor, event.subject.kind, event.subject.id, JSON.stringify(event.fields), recordedAt]
            );
        }
    }
}

export class PgLedgerStore implements LedgerStore {
    constructor(
        private readonly sink: AuditSink,
        private readonly dbClient: LedgerDb,
        private readonly clock: () => Date = () => new Date()
    ) { }

    async transaction<T>(label: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
        const { result, events } = await this.dbClient.transactionAsRole('coldchain_writer', async client => {
            const tx = new PgLedgerTx(client, this.clock);
            // Lock order: settings row before any table row.
            await tx.getSettings();
            const value = await fn(tx);
            await tx.flushEvents();
            return { result: value, events: tx.events };
        });

        for (const event of events) {
            try {
                this.sink.record(event);
            } catch (error) {
                logger.error({ label, eventType: event.type, error }, '[Ledger] Audit sink rejected committed event');
            }
        }
        return result;
    }

    read<T>(fn: (reader: LedgerReader) => Promise<T>): Promise<T> {
        return this.dbClient.withRoleClient('coldchain_reader', client => fn(new PgLedgerReader(client, '')));
    }

    /**
     * Creates the settings row on first start. An existing row is left untouched,
     * so a handed-over administrator survives restarts.
     */
    async seed(seed: PgLedgerSeed): Promise<void> {
        await this.dbClient.transactionAsRole('coldchain_writer', async client => {
            await client.query(
                `INSERT INTO custody_settings (id, administrator, paused, threshold_min, threshold_max, balance)
                 VALUES (1, $1, false, $2, $3, 0)
                 ON CONFLICT (id) DO NOTHING`,
                [seed.administrator, seed.defaultThresholds.min, seed.defaultThresholds.max]
            );
        });
    }
}
