import { ColdChainError } from '../errors/ColdChainError.js';
import { logger } from '../logging/logger.js';
import type { LedgerReader, LedgerStore, LedgerTx } from '../store/ledgerStore.js';
import { validate } from '../validation/zod-middleware.js';
import { ActorIdSchema, GrantableRoleSchema, RoleSchema } from '../validation/schema.js';
import type { Role } from './roles.js';

/**
 * Access Control
 * Role assignments and the global pause flag.
 *
 * The guard methods take the caller's open transaction so that the check and
 * the mutation it protects are evaluated against the same state.
 */
export class AccessControl {
    constructor(private readonly store: LedgerStore) { }

    // --- Guards -----------------------------------------------------------

    async requireRole(tx: LedgerReader, role: Role, actor: string, action: string): Promise<void> {
        if (await roleHeld(tx, role, actor)) return;

        logger.warn({ actor, role, action, decision: 'DENY' }, 'Role check failed');
        throw new ColdChainError('Unauthorized', `${actor} lacks role ${role} required for ${action}`, {
            actor,
            role,
            action
        });
    }

    async requireNotPaused(tx: LedgerReader, action: string): Promise<void> {
        const settings = await tx.getSettings();
        if (settings.paused) {
            throw new ColdChainError('InvalidState', `System paused: ${action} rejected`, { action });
        }
    }

    // --- Administration ---------------------------------------------------

    async grant(caller: string, role: Role, actor: string): Promise<void> {
        const grantable = validate(GrantableRoleSchema, role, 'AccessControl:grant');
        const subject = validate(ActorIdSchema, actor, 'AccessControl:grant');

        await this.store.transaction('access.grant', async tx => {
            await this.requireRole(tx, 'ADMINISTRATOR', caller, 'grant');
            if (await tx.hasRole(subject, grantable)) return;

            await tx.grantRole(subject, grantable);
            tx.emit({
                type: 'ROLE_GRANTED',
                actor: caller,
                subject: { kind: 'access', id: subject },
                fields: { role: grantable }
            });
        });
    }

    async revoke(caller: string, role: Role, actor: string): Promise<void> {
        const grantable = validate(GrantableRoleSchema, role, 'AccessControl:revoke');
        const subject = validate(ActorIdSchema, actor, 'AccessControl:revoke');

        await this.store.transaction('access.revoke', async tx => {
            await this.requireRole(tx, 'ADMINISTRATOR', caller, 'revoke');
            if (!(await tx.hasRole(subject, grantable))) return;

            await tx.revokeRole(subject, grantable);
            tx.emit({
                type: 'ROLE_REVOKED',
                actor: caller,
                subject: { kind: 'access', id: subject },
                fields: { role: grantable }
            });
        });
    }

    async transferAdministrator(caller: string, next: string): Promise<void> {
        const successor = validate(ActorIdSchema, next, 'AccessControl:transferAdministrator');

        await this.store.transaction('access.transferAdministrator', async tx => {
            await this.requireRole(tx, 'ADMINISTRATOR', caller, 'transferAdministrator');
            const settings = await tx.getSettings();
            if (settings.administrator === successor) return;

            await tx.putSettings({ ...settings, administrator: successor });
            tx.emit({
                type: 'ADMINISTRATOR_TRANSFERRED',
                actor: caller,
                subject: { kind: 'access', id: successor },
                fields: { previous: settings.administrator }
            });
        });
    }

    async pause(caller: string): Promise<void> {
        await this.setPaused(caller, true);
    }

    async unpause(caller: string): Promise<void> {
        await this.setPaused(caller, false);
    }

    // --- Queries ------------------------------------------------------------

    async hasRole(role: Role, actor: string): Promise<boolean> {
        const checked = validate(RoleSchema, role, 'AccessControl:hasRole');
        return this.store.read(reader => roleHeld(reader, checked, actor));
    }

    async isPaused(): Promise<boolean> {
        return this.store.read(async reader => (await reader.getSettings()).paused);
    }

    async administrator(): Promise<string> {
        return this.store.read(async reader => (await reader.getSettings()).administrator);
    }

    private async setPaused(caller: string, paused: boolean): Promise<void> {
        await this.store.transaction(paused ? 'access.pause' : 'access.unpause', async (tx: LedgerTx) => {
            await this.requireRole(tx, 'ADMINISTRATOR', caller, paused ? 'pause' : 'unpause');
            const settings = await tx.getSettings();
            if (settings.paused === paused) return;

            await tx.putSettings({ ...settings, paused });
            tx.emit({
                type: paused ? 'SYSTEM_PAUSED' : 'SYSTEM_UNPAUSED',
                actor: caller,
                subject: { kind: 'access', id: 'system' },
                fields: {}
            });
            logger.warn({ caller, paused }, paused ? 'Ledger paused' : 'Ledger resumed');
        });
    }
}

async function roleHeld(reader: LedgerReader, role: Role, actor: string): Promise<boolean> {
    if (actor.trim() === '') return false;
    if (role === 'ADMINISTRATOR') {
        return (await reader.getSettings()).administrator === actor;
    }
    return reader.hasRole(actor, role);
}
