import { logger } from "../../../libs/logging/logger.js";
import { createAuditPipeline } from "../../../libs/bootstrap/auditPipeline.js";
import { db } from "../../../libs/db/index.js";
import { createApp, GATEWAY_AUDIT_DEFAULTS } from "./app.js";

async function main() {
    const pipeline = await createAuditPipeline({ defaults: GATEWAY_AUDIT_DEFAULTS });
    const app = createApp(pipeline);

    const port = Number(process.env.PORT ?? '8080');
    const server = app.listen(port, () => {
        logger.info({ port }, "Audit gateway listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
            pipeline.shutdown()
                .then(() => db.close())
                .then(() => process.exit(0))
                .catch(err => {
                    logger.fatal({ error: err }, "Shutdown failed");
                    process.exit(1);
                });
        });
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
