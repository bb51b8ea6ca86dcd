/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app and route handlers
 * - services/: the knowledge base and the query pipeline
 * - clients/: external service clients (OllamaClient)
 * - storage/: JSON file persistence and the index snapshot
 *
 * When run directly, this file loads the configuration, starts the
 * server and brings the knowledge base up.
 * When imported, it exports the factories.
 */

import { Server } from 'http';
import { Assistant, AssistantOverrides, createAssistant } from './assistant';
import { AppConfig, loadConfig, loadEnvFile } from './config';
import { logger, setLogLevel } from './logger';
import { createServer } from './server';

export { Assistant, createAssistant } from './assistant';
export type { AssistantOverrides, AssistantState, InitReport } from './assistant';
export { loadConfig, loadEnvFile, ConfigError, envSchema } from './config';
export type { AppConfig, EmbeddingProviderKind } from './config';
export { createApp, createServer, startServer, ApiError, DEFAULT_SERVER_CONFIG } from './server';
export type { ServerConfig } from './server';
export * from './errors';
export * from './services';
export * from './clients';
export * from './storage';

/**
 * Starts listening, then brings the knowledge base up.
 *
 * /api/health answers 503 while the knowledge base loads. When it cannot be
 * loaded (a corrupted index without REBUILD_INDEX) the server stays up in
 * the failed state and keeps answering 503.
 */
export async function startAssistant(
    config: AppConfig,
    overrides?: AssistantOverrides
): Promise<{ assistant: Assistant; server: Server }> {
    const assistant = createAssistant(config, overrides);
    const server = await createServer(assistant, {
        port: config.port,
        corsOrigin: config.corsOrigin,
    });

    try {
        await assistant.init();
    } catch (error) {
        logger.error('Knowledge base failed to start; health checks will report 503:', error);
    }
    return { assistant, server };
}

/**
 * Starts the assistant and the HTTP server, and shuts both down on
 * SIGINT/SIGTERM.
 */
export async function main(): Promise<{ assistant: Assistant; server: Server }> {
    loadEnvFile();
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const { assistant, server } = await startAssistant(config);

    let stopping = false;
    const shutdown = (signal: string): void => {
        if (stopping) return;
        stopping = true;
        logger.info(`Received ${signal}, shutting down`);
        server.close();
        assistant
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed:', error);
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    return { assistant, server };
}

// Main entry point - start server when run directly
if (require.main === module) {
    main()
        .then(({ assistant }) => {
            logger.info(`Server started (${assistant.state})`);
        })
        .catch((error: unknown) => {
            logger.error('Failed to start server:', error);
            process.exit(1);
        });
}
