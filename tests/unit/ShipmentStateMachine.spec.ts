/**
 * Unit Tests: shipment custody transitions
 *
 * @see libs/shipment/shipment.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isColdChainError } from '../../libs/errors/ColdChainError.js';
import { appendReading, deliver, isOutOfRange, newShipment, toShipmentView } from '../../libs/shipment/shipment.js';

const AT = '2026-03-01T08:00:00.000Z';

const fresh = () => newShipment({
    shipmentId: 'S1',
    sender: 'sender-1',
    receiver: 'receiver-1',
    thresholds: { min: 2, max: 8 },
    registeredAt: AT
});

describe('Shipment state machine', () => {
    it('starts in transit with a nominal condition', () => {
        const record = fresh();
        assert.strictEqual(record.custody, 'IN_TRANSIT');
        assert.strictEqual(record.condition, 'NOMINAL');
        assert.ok(Object.isFrozen(record));
    });

    it('classifies temperatures against inclusive bounds', () => {
        const bounds = { min: 2, max: 8 };
        assert.deepStrictEqual(
            [1.99, 2, 5, 8, 8.01].map(t => isOutOfRange(bounds, t)),
            [true, false, false, false, true]
        );
    });

    it('latches the breach and reports only the reading that caused it', () => {
        const first = appendReading(fresh(), { temperature: 9, location: 'a', timestamp: AT });
        assert.strictEqual(first.breached, true);
        assert.strictEqual(first.record.condition, 'BREACHED');

        const second = appendReading(first.record, { temperature: 4, location: 'b', timestamp: AT });
        assert.strictEqual(second.breached, false);
        assert.strictEqual(second.record.condition, 'BREACHED');
        assert.strictEqual(second.record.readings.length, 2);
    });

    it('freezes the reading log and each reading', () => {
        const record = fresh();
        assert.ok(Object.isFrozen(record.readings));

        const { record: next } = appendReading(record, { temperature: 5, location: 'a', timestamp: AT });
        assert.ok(Object.isFrozen(next.readings));
        assert.strictEqual(next.readings.length, 1);
        assert.ok(Object.isFrozen(next.readings[0]));
        assert.ok(Object.isFrozen(toShipmentView(next).readings));
    });

    it('leaves the input record untouched', () => {
        const original = fresh();
        appendReading(original, { temperature: 20, location: 'a', timestamp: AT });
        assert.strictEqual(original.readings.length, 0);
        assert.strictEqual(original.condition, 'NOMINAL');
    });

    it('closes custody exactly once', () => {
        const delivered = deliver(fresh());
        assert.strictEqual(delivered.custody, 'DELIVERED');

        assert.throws(() => deliver(delivered), (err: unknown) => isColdChainError(err, 'InvalidState'));
        assert.throws(
            () => appendReading(delivered, { temperature: 4, location: 'a', timestamp: AT }),
            (err: unknown) => isColdChainError(err, 'InvalidState')
        );
    });

    it('projects the states as flags', () => {
        const { record } = appendReading(fresh(), { temperature: -3, location: 'a', timestamp: AT });
        const view = toShipmentView(deliver(record));

        assert.strictEqual(view.isDelivered, true);
        assert.strictEqual(view.isBreached, true);
        assert.strictEqual(view.temperatureThresholdMin, 2);
        assert.strictEqual(view.temperatureThresholdMax, 8);
    });
});
