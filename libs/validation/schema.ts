import { z } from 'zod';
import { GRANTABLE_ROLES, ROLES } from '../access/roles.js';

/**
 * Central schema definitions for ledger inputs.
 */

// --- Identity Schemas ---

// Identifiers are matched byte for byte; surrounding whitespace is rejected.
const identifier = (label: string) => z.string()
    .min(1, `${label} must not be empty`)
    .max(128)
    .refine(value => value.trim() === value, { message: `${label} must not have leading or trailing whitespace` });

export const ActorIdSchema = identifier('identity');

export const ShipmentIdSchema = identifier('shipment id');

export const PolicyIdSchema = identifier('policy id');

export const RoleSchema = z.enum(ROLES);

export const GrantableRoleSchema = z.enum(GRANTABLE_ROLES, {
    errorMap: () => ({ message: 'only SUPPLIER and ORACLE can be granted or revoked' })
});

// --- Telemetry Schemas ---

export const TemperatureSchema = z.number().finite();

export const ThresholdsSchema = z.object({
    min: TemperatureSchema,
    max: TemperatureSchema
}).refine(t => t.min < t.max, { message: 'min must be strictly below max', path: ['min'] });

export const ShipmentRegistrationSchema = z.object({
    shipmentId: ShipmentIdSchema,
    sender: ActorIdSchema,
    receiver: ActorIdSchema
});

export const ReadingInputSchema = z.object({
    location: z.string(),
    temperature: TemperatureSchema
});

// --- Financial Schemas ---

export const AmountSchema = z.bigint().positive('amount must be greater than zero');

export const PolicyTermsSchema = z.object({
    policyId: PolicyIdSchema,
    shipmentId: ShipmentIdSchema,
    holder: ActorIdSchema,
    premiumAmount: AmountSchema,
    claimAmount: AmountSchema
});
