/**
 * Custody Role Registry
 *
 * - ADMINISTRATOR is singular: exactly one actor holds it at any time.
 * - SUPPLIER registers shipments.
 * - ORACLE appends telemetry.
 */

export const ROLES = ['ADMINISTRATOR', 'SUPPLIER', 'ORACLE'] as const;

export type Role = typeof ROLES[number];

export const GRANTABLE_ROLES = ['SUPPLIER', 'ORACLE'] as const;

export type GrantableRole = typeof GRANTABLE_ROLES[number];

