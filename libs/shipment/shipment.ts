/**
 * Shipment custody model.
 *
 * Delivery and breach are one-way transitions. They are stored as explicit
 * state values and only move through the transition functions below; the
 * boolean flags exist on the read projection only.
 */

import { ColdChainError } from '../errors/ColdChainError.js';

export type CustodyState = 'IN_TRANSIT' | 'DELIVERED';

export type ConditionState = 'NOMINAL' | 'BREACHED';

export interface Thresholds {
    readonly min: number;
    readonly max: number;
}

export interface Reading {
    readonly temperature: number;
    readonly location: string;
    readonly timestamp: string;   // ISO-8601
}

/**
 * Stored shipment record.
 */
export interface ShipmentRecord {
    readonly shipmentId: string;
    readonly sender: string;
    readonly receiver: string;
    readonly thresholds: Thresholds;
    readonly custody: CustodyState;
    readonly condition: ConditionState;
    readonly readings: readonly Reading[];
    readonly registeredAt: string;
}

/**
 * Read projection returned by the query surface.
 */
export interface Shipment {
    readonly shipmentId: string;
    readonly sender: string;
    readonly receiver: string;
    readonly temperatureThresholdMin: number;
    readonly temperatureThresholdMax: number;
    readonly isDelivered: boolean;
    readonly isBreached: boolean;
    readonly readings: readonly Reading[];
    readonly registeredAt: string;
}

export function isOutOfRange(thresholds: Thresholds, temperature: number): boolean {
    return temperature < thresholds.min || temperature > thresholds.max;
}

export function newShipment(params: {
    shipmentId: string;
    sender: string;
    receiver: string;
    thresholds: Thresholds;
    registeredAt: string;
}): ShipmentRecord {
    const record: ShipmentRecord = {
        shipmentId: params.shipmentId,
        sender: params.sender,
        receiver: params.receiver,
        thresholds: Object.freeze({ ...params.thresholds }),
        custody: 'IN_TRANSIT',
        condition: 'NOMINAL',
        readings: Object.freeze([]),
        registeredAt: params.registeredAt
    };
    return Object.freeze(record);
}

/**
 * Appends a reading and latches the breach condition when it is out of range.
 * Returns the new record and whether this reading produced a breach.
 */
export function appendReading(
    record: ShipmentRecord,
    reading: Reading
): { record: ShipmentRecord; breached: boolean } {
    if (record.custody === 'DELIVERED') {
        throw new ColdChainError('InvalidState', `Shipment ${record.shipmentId} is already delivered`);
    }

    const breached = isOutOfRange(record.thresholds, reading.temperature);
    const next: ShipmentRecord = {
        ...record,
        condition: breached ? 'BREACHED' : record.condition,
        readings: Object.freeze([...record.readings, Object.freeze({ ...reading })])
    };

    return { record: Object.freeze(next), breached };
}

export function deliver(record: ShipmentRecord): ShipmentRecord {
    if (record.custody === 'DELIVERED') {
        throw new ColdChainError('InvalidState', `Shipment ${record.shipmentId} is already delivered`);
    }
    const next: ShipmentRecord = { ...record, custody: 'DELIVERED' };
    return Object.freeze(next);
}

export function toShipmentView(record: ShipmentRecord): Shipment {
    const view: Shipment = {
        shipmentId: record.shipmentId,
        sender: record.sender,
        receiver: record.receiver,
        temperatureThresholdMin: record.thresholds.min,
        temperatureThresholdMax: record.thresholds.max,
        isDelivered: record.custody === 'DELIVERED',
        isBreached: record.condition === 'BREACHED',
        readings: record.readings,
        registeredAt: record.registeredAt
    };
    return Object.freeze(view);
}
