import { HashChainedAuditLog } from "../audit/logger.js";
import { createCustodyLedger, CustodyLedger } from "../custody/ledger.js";
import { createDb, createPoolSource } from "../db/index.js";
import { logger } from "../logging/logger.js";
import type { LedgerStore } from "../store/ledgerStore.js";
import { MemoryLedgerStore } from "../store/memoryLedgerStore.js";
import { PgLedgerStore } from "../store/pgLedgerStore.js";
import type { PayoutRail } from "../treasury/payoutRail.js";
import type { CustodyConfig } from "./config.js";

export interface CustodyNode {
    audit: HashChainedAuditLog;
    ledger: CustodyLedger;
    shutdown(): Promise<void>;
}

export async function bootstrap(serviceName: string, config: CustodyConfig, rail: PayoutRail): Promise<CustodyNode> {
    logger.info({ serviceName, store: config.store, environment: config.environment }, "Bootstrapping service");

    const audit = new HashChainedAuditLog();
    let store: LedgerStore;
    let shutdown: () => Promise<void> = async () => { };

    if (config.store === "postgres") {
        if (!config.db) {
            throw new Error("Postgres store selected without database configuration");
        }
        const db = createDb(createPoolSource(config.db));
        await db.probeRoles();

        const pgStore = new PgLedgerStore(audit, db);
        await pgStore.seed({
            administrator: config.administrator,
            defaultThresholds: config.defaultThresholds
        });
        store = pgStore;
        shutdown = () => db.end();
    } else {
        store = new MemoryLedgerStore(audit, {
            administrator: config.administrator,
            defaultThresholds: config.defaultThresholds
        });
    }

    const ledger = createCustodyLedger({ store, rail, limits: config.limits });
    const administrator = await ledger.access.administrator();

    logger.info({ serviceName, administrator }, "Startup checks passed");
    return { audit, ledger, shutdown };
}
