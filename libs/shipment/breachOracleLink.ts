/**
 * The only view of shipment state that the policy side may consume.
 * Fails with `NotFound` for an unknown shipment.
 */
export interface BreachOracleLink {
    isBreached(shipmentId: string): Promise<boolean>;
}
