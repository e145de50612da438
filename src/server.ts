import { getConfig } from './config/env.js';
import { getRecommenderConfig } from './config/recommender.config.js';
import { createApp } from './app.js';
import { ConfigValidator } from './lib/config/config-validator.js';
import { logger } from './lib/logger/structured-logger.js';
import { createRecommender } from './services/recipes/recommender.service.js';

async function main(): Promise<void> {
    const { port } = getConfig();
    const config = getRecommenderConfig();
    new ConfigValidator(config).validateOrThrow();

    const recommender = await createRecommender(config);

    const app = createApp({ recommender });
    const server = app.listen(port, () => {
        logger.info(`Server listening on http://localhost:${port}`);
    });

    function shutdown(signal: NodeJS.Signals) {
        logger.info(`Received ${signal}. Shutting down gracefully...`);
        server.close(() => {
            logger.info('Server closed');
            process.exit(0);
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
    logger.fatal({
        error: err instanceof Error ? { name: err.name, message: err.message } : String(err)
    }, 'Startup failed');
    process.exit(1);
});
