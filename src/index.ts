import dotenv from 'dotenv';
import { ApiGateway } from './api/app';
import { ConfigManager } from './config';
import { createServices } from './services';
import { logger } from './utils/logger';

dotenv.config();

async function main(): Promise<void> {
    const configManager = ConfigManager.getInstance();
    const config = await configManager.loadConfig(process.env.CONFIG_FILE);

    logger.info('Grounded answer service starting', {
        host: config.server.host,
        port: config.server.port,
        searchUrl: config.search.url,
        collection: config.search.collectionName,
        provider: config.completion.provider,
        chatModel: config.completion.chatModel
    });

    const services = createServices(config);
    await services.searchGateway.initialize();

    const gateway = new ApiGateway(services, config);
    await gateway.start();

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down`);
        Promise.all([gateway.stop(), services.cache?.disconnect()])
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
                process.exit(1);
            });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error('Failed to start grounded answer service', {
            error: error instanceof Error ? error.message : String(error)
        });
        process.exit(1);
    });
}

export { ApiGateway } from './api/app';
export * from './config';
export * from './models/chat';
export * from './models/config';
export * from './models/document';
export * from './models/response';
export * from './services';
export * from './utils/errors';
export { logger, StructuredLogger } from './utils/logger';
export type { Logger, LogContext } from './utils/logger';
