import { config, validateEnvironment } from './config';
import { createDatabase, closeDatabase } from './db/client';
import { loadSalonConfig } from './models/salon-config';
import { createApp } from './api/app';
import { createServices } from './services/container';
import { logger } from './services/logging';

const SESSION_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

function errorDetails(error: unknown) {
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
        };
    }
    return { value: String(error) };
}

async function main(): Promise<void> {
    const problems = validateEnvironment();
    if (problems.length > 0) {
        logger.error('Invalid environment configuration', { problems });
        process.exit(1);
    }

    logger.info(`Starting salon receptionist in ${config.nodeEnv} mode`);

    const salon = loadSalonConfig(config.paths.salonConfig);
    const db = createDatabase(config.database.path);
    const services = createServices(config, db, salon);

    if (services.redis) {
        await services.redis.init();
    }

    try {
        await services.knowledgeBase.loadFaq();
    } catch (error) {
        // The lexical tier still works from the cached list; the semantic tier
        // comes back on the next refresh.
        logger.warn('Initial FAQ sync failed', { error: errorDetails(error) });
    }
    services.knowledgeBase.startAutoRefresh(config.knowledge.refreshIntervalMs);
    services.dispatcher.start();
    services.dispatcher.kick();

    const sweepTimer = setInterval(() => services.sessions.sweep(), SESSION_SWEEP_INTERVAL_MS);
    sweepTimer.unref();

    const app = createApp(services, {
        apiKey: config.admin.apiKey,
        logRequests: config.nodeEnv === 'development',
    });

    const server = app.listen(config.port, '0.0.0.0', () => {
        logger.info('Server listening', { port: config.port, business: salon.businessName });
    });

    let shuttingDown = false;
    function gracefulShutdown(signal: string) {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down gracefully`);

        server.close(() => {
            logger.info('HTTP server closed');
            clearInterval(sweepTimer);
            services.knowledgeBase.stopAutoRefresh();

            const closeRedis = services.redis ? services.redis.close() : Promise.resolve();
            Promise.all([services.dispatcher.stop(), closeRedis])
                .catch((error) => logger.error('Error during shutdown', { error: errorDetails(error) }))
                .finally(() => {
                    closeDatabase(db);
                    logger.info('Shutdown complete');
                    logger.close();
                    process.exit(0);
                });
        });

        // Force close after 10 seconds
        setTimeout(() => {
            logger.error('Forced shutdown after timeout');
            process.exit(1);
        }, 10000).unref();
    }

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { error: errorDetails(reason) });
});

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: errorDetails(error) });
});

main().catch((error) => {
    logger.error('Failed to start server', { error: errorDetails(error) });
    process.exit(1);
});
