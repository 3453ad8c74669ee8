import { loadConfig } from "../../../libs/bootstrap/config.js";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { ErrorSanitizer } from "../../../libs/errors/sanitizer.js";
import { logger } from "../../../libs/logging/logger.js";
import { InternalAccountRail } from "../../../libs/treasury/payoutRail.js";

async function main() {
    const config = loadConfig();
    const rail = new InternalAccountRail();
    const node = await bootstrap("custody-node", config, rail);

    const [paused, balance] = await Promise.all([
        node.ledger.access.isPaused(),
        node.ledger.treasury.balance()
    ]);
    logger.info({ paused, balance: balance.toString() }, "Custody node ready");

    const stop = (signal: string) => {
        logger.info({ signal }, "Shutting down custody node");
        node.shutdown()
            .then(() => process.exit(0))
            .catch(err => {
                logger.error({ err: ErrorSanitizer.sanitize(err, "CustodyNode:Shutdown") }, "Shutdown failed");
                process.exit(1);
            });
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    // Keeps the process alive until a signal arrives.
    setInterval(() => {
        logger.debug({ auditHead: node.audit.head() }, "Custody node heartbeat");
    }, 60_000);
}

main().catch(err => {
    logger.fatal({ err }, "Custody node failed to start");
    process.exit(1);
});
