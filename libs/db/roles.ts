export const DB_ROLES = [
    'coldchain_writer',
    'coldchain_reader'
] as const;

export type DbRole = typeof DB_ROLES[number];

export function assertDbRole(role: string): DbRole {
    const match = DB_ROLES.find(candidate => candidate === role);
    if (match) {
        return match;
    }

    throw new Error(`Invalid DbRole: ${role}`);
}
