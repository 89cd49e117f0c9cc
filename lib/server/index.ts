/**
 * HTTP entry point.
 *
 * Run: npm start (reads .env; GEMINI_API_KEY is required)
 */

import { loadConfigFromEnv } from "../config";
import { createGateway } from "../core/extraction-gateway";
import { createLogger, setLogLevel } from "../core/logger";
import { ConversationOrchestrator } from "../conversation/orchestrator";
import { InMemoryInvoiceRepository } from "../conversation/invoice-repository";
import { InMemorySessionStore } from "../conversation/session-store";
import { createApp } from "./app";

const logger = createLogger("server");

function main() {
    const config = loadConfigFromEnv();
    setLogLevel(config.logLevel);

    const orchestrator = new ConversationOrchestrator({
        gateway: createGateway(config.extraction),
        sessions: new InMemorySessionStore(),
        invoices: new InMemoryInvoiceRepository({ publicBaseUrl: config.server.publicBaseUrl }),
    });

    const app = createApp({
        orchestrator,
        version: config.apiVersion,
        corsOrigins: config.server.corsOrigins,
    });

    app.listen(config.server.port, config.server.host, () => {
        logger.info(`Invoice assistant API listening`, {
            host: config.server.host,
            port: config.server.port,
            model: config.extraction.model,
        });
    });
}

try {
    main();
} catch (err) {
    logger.error(`Startup failed`, { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
}
