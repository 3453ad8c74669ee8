import { AccessControl } from '../access/accessControl.js';
import { PolicyRegistry } from '../insurance/registry.js';
import { ShipmentRegistry, type ShipmentLimits } from '../shipment/registry.js';
import type { LedgerStore } from '../store/ledgerStore.js';
import type { PayoutRail } from '../treasury/payoutRail.js';
import { Treasury } from '../treasury/treasury.js';

export interface CustodyLedgerOptions {
    store: LedgerStore;
    rail: PayoutRail;
    limits: ShipmentLimits;
    clock?: () => Date;
}

export interface CustodyLedger {
    access: AccessControl;
    shipments: ShipmentRegistry;
    policies: PolicyRegistry;
    treasury: Treasury;
}

/**
 * Wires the custody components over one store. The policy registry sees the
 * shipment registry only through its breach link.
 */
export function createCustodyLedger(options: CustodyLedgerOptions): CustodyLedger {
    const clock = options.clock ?? (() => new Date());
    const access = new AccessControl(options.store);
    const shipments = new ShipmentRegistry(options.store, access, options.limits, clock);
    const treasury = new Treasury(options.store, access, options.rail);
    const policies = new PolicyRegistry(options.store, access, shipments, treasury, clock);

    return { access, shipments, policies, treasury };
}
