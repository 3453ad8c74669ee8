/**
 * Shipment Registry
 *
 * Owns shipment records. Suppliers register, oracles append telemetry and the
 * receiver closes custody. Breach detection runs on every appended reading.
 */

import type { AccessControl } from '../access/accessControl.js';
import { ColdChainError } from '../errors/ColdChainError.js';
import { getOperationLogger } from '../logging/logger.js';
import type { LedgerReader, LedgerStore } from '../store/ledgerStore.js';
import { validate } from '../validation/zod-middleware.js';
import {
    ReadingInputSchema,
    ShipmentIdSchema,
    ShipmentRegistrationSchema,
    ThresholdsSchema
} from '../validation/schema.js';
import type { BreachOracleLink } from './breachOracleLink.js';
import {
    appendReading,
    deliver,
    newShipment,
    Shipment,
    ShipmentRecord,
    Thresholds,
    toShipmentView
} from './shipment.js';

export interface ShipmentLimits {
    /** Maximum readings stored per shipment */
    readonly maxLogEntries: number;
    /** Maximum UTF-8 size of one reading's location */
    readonly maxLocationBytes: number;
}

export interface ShipmentRegistration {
    shipmentId: string;
    sender: string;
    receiver: string;
}

export interface ReadingInput {
    location: string;
    temperature: number;
}

export class ShipmentRegistry implements BreachOracleLink {
    constructor(
        private readonly store: LedgerStore,
        private readonly access: AccessControl,
        private readonly limits: ShipmentLimits,
        private readonly clock: () => Date = () => new Date()
    ) { }

    async registerShipment(caller: string, registration: ShipmentRegistration): Promise<Shipment> {
        const input = validate(ShipmentRegistrationSchema, registration, 'ShipmentRegistry:registerShipment');

        const record = await this.store.transaction('shipment.register', async tx => {
            await this.access.requireNotPaused(tx, 'registerShipment');
            await this.access.requireRole(tx, 'SUPPLIER', caller, 'registerShipment');

            if (await tx.getShipment(input.shipmentId)) {
                throw new ColdChainError('AlreadyExists', `Shipment ${input.shipmentId} already exists`);
            }

            const { defaultThresholds } = await tx.getSettings();
            const created = newShipment({
                ...input,
                thresholds: defaultThresholds,
                registeredAt: this.clock().toISOString()
            });
            await tx.putShipment(created);

            tx.emit({
                type: 'SHIPMENT_INITIALIZED',
                actor: caller,
                subject: { kind: 'shipment', id: created.shipmentId },
                fields: {
                    sender: created.sender,
                    receiver: created.receiver,
                    thresholdMin: created.thresholds.min,
                    thresholdMax: created.thresholds.max
                }
            });
            return created;
        });

        getOperationLogger('registerShipment', caller).info({ shipmentId: record.shipmentId }, 'Shipment registered');
        return toShipmentView(record);
    }

    async logReading(caller: string, shipmentId: string, reading: ReadingInput): Promise<Shipment> {
        const id = validate(ShipmentIdSchema, shipmentId, 'ShipmentRegistry:logReading');
        const input = validate(ReadingInputSchema, reading, 'ShipmentRegistry:logReading');

        const { record, breached } = await this.store.transaction('shipment.logReading', async tx => {
            await this.access.requireNotPaused(tx, 'logReading');
            await this.access.requireRole(tx, 'ORACLE', caller, 'logReading');

            const current = await requireShipment(tx, id);
            if (current.custody === 'DELIVERED') {
                throw new ColdChainError('InvalidState', `Shipment ${id} is already delivered`);
            }
            if (current.readings.length >= this.limits.maxLogEntries) {
                throw new ColdChainError('LimitExceeded', `Shipment ${id} reached ${this.limits.maxLogEntries} readings`, {
                    limit: this.limits.maxLogEntries
                });
            }
            const locationBytes = Buffer.byteLength(input.location, 'utf8');
            if (locationBytes > this.limits.maxLocationBytes) {
                throw new ColdChainError('LimitExceeded', `Location exceeds ${this.limits.maxLocationBytes} bytes`, {
                    limit: this.limits.maxLocationBytes,
                    actual: locationBytes
                });
            }

            const timestamp = this.clock().toISOString();
            const outcome = appendReading(current, { ...input, timestamp });
            await tx.putShipment(outcome.record);

            if (outcome.breached) {
                tx.emit({
                    type: 'TEMPERATURE_BREACH_DETECTED',
                    actor: caller,
                    subject: { kind: 'shipment', id },
                    fields: {
                        temperature: input.temperature,
                        thresholdMin: current.thresholds.min,
                        thresholdMax: current.thresholds.max,
                        location: input.location
                    }
                });
            }
            tx.emit({
                type: 'DATA_LOGGED',
                actor: caller,
                subject: { kind: 'shipment', id },
                fields: {
                    temperature: input.temperature,
                    location: input.location,
                    timestamp,
                    readingIndex: outcome.record.readings.length - 1
                }
            });
            return outcome;
        });

        if (breached) {
            getOperationLogger('logReading', caller).warn({
                shipmentId: id,
                temperature: input.temperature
            }, 'Temperature breach detected');
        }
        return toShipmentView(record);
    }

    async markDelivered(caller: string, shipmentId: string): Promise<Shipment> {
        const id = validate(ShipmentIdSchema, shipmentId, 'ShipmentRegistry:markDelivered');

        const record = await this.store.transaction('shipment.markDelivered', async tx => {
            await this.access.requireNotPaused(tx, 'markDelivered');

            const current = await requireShipment(tx, id);
            if (current.receiver !== caller) {
                throw new ColdChainError('Unauthorized', `Only the receiver may mark shipment ${id} delivered`, {
                    shipmentId: id
                });
            }

            const delivered = deliver(current);
            await tx.putShipment(delivered);
            tx.emit({
                type: 'SHIPMENT_DELIVERED',
                actor: caller,
                subject: { kind: 'shipment', id },
                fields: { readings: delivered.readings.length, breached: delivered.condition === 'BREACHED' }
            });
            return delivered;
        });

        getOperationLogger('markDelivered', caller).info({ shipmentId: id }, 'Shipment delivered');
        return toShipmentView(record);
    }

    async updateDefaultThresholds(caller: string, thresholds: Thresholds): Promise<Thresholds> {
        const next = validate(ThresholdsSchema, thresholds, 'ShipmentRegistry:updateDefaultThresholds');

        return this.store.transaction('shipment.updateDefaultThresholds', async tx => {
            await this.access.requireNotPaused(tx, 'updateDefaultThresholds');
            await this.access.requireRole(tx, 'ADMINISTRATOR', caller, 'updateDefaultThresholds');

            const settings = await tx.getSettings();
            const defaultThresholds = Object.freeze({ min: next.min, max: next.max });
            await tx.putSettings({ ...settings, defaultThresholds });
            tx.emit({
                type: 'THRESHOLDS_UPDATED',
                actor: caller,
                subject: { kind: 'shipment', id: 'defaults' },
                fields: {
                    previousMin: settings.defaultThresholds.min,
                    previousMax: settings.defaultThresholds.max,
                    min: next.min,
                    max: next.max
                }
            });
            return defaultThresholds;
        });
    }

    async isBreached(shipmentId: string): Promise<boolean> {
        const record = await this.store.read(reader => requireShipment(reader, shipmentId));
        return record.condition === 'BREACHED';
    }

    async getShipment(shipmentId: string): Promise<Shipment> {
        const record = await this.store.read(reader => requireShipment(reader, shipmentId));
        return toShipmentView(record);
    }

    async defaultThresholds(): Promise<Thresholds> {
        return this.store.read(async reader => (await reader.getSettings()).defaultThresholds);
    }
}

async function requireShipment(reader: LedgerReader, shipmentId: string): Promise<ShipmentRecord> {
    const record = await reader.getShipment(shipmentId);
    if (!record) {
        throw new ColdChainError('NotFound', `Shipment ${shipmentId} not found`, { shipmentId });
    }
    return record;
}
