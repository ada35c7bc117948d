import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { configValidator } from './lib/config/config-validator.js';
import { logger } from './lib/logger/structured-logger.js';
import { createDialogueRuntime } from './services/dialogue/dialogue.factory.js';

const config = getConfig();
configValidator.report(config);

const runtime = createDialogueRuntime(config);
runtime.sessions.startCleanup();

const app = createApp(runtime);
const server = app.listen(config.port, () => {
    logger.info({ port: config.port, nodeEnv: config.nodeEnv }, `Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    runtime.sessions.destroy();
    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
