import 'dotenv/config';

// Load centralized configuration
import { config, validateConfig } from './config';
import logger from './utils/logger';
import express from 'express';
import gameRoutes from './routes/gameRoutes';
import targetRoutes from './routes/targetRoutes';
import { apiLimiter } from './middleware/rateLimiter';
import { closeAll as closeCaches } from './utils/cache';
import { formatErrorForLogging } from './utils/errorHandler';
import { TIME } from './utils/constants';

function startServer(): void {
    // Validate configuration on startup
    try {
        validateConfig();
        logger.info('✅ Configuration validated successfully', { environment: config.env });
    } catch (error: unknown) {
        logger.error('❌ Configuration validation failed', formatErrorForLogging(error));
        process.exit(1);
    }

    const app = express();

    if (config.server.trustProxy) {
        app.enable('trust proxy');
    }
    app.use(express.json({ limit: config.limits.jsonBodySize }));

    app.use('/api', apiLimiter);
    app.use('/api', targetRoutes);
    app.use('/api', gameRoutes);

    const server = app.listen(config.server.port, config.server.host, () => {
        logger.info('🚀 Server running', {
            port: config.server.port,
            host: config.server.host,
            environment: config.env
        });
        logger.info('📋 Available endpoints', {
            endpoints: [
                'GET /api/health - Liveness and geocode cache statistics',
                'GET /api/target - Pick a one-off random target',
                'POST /api/games - Start a game with its first target',
                'GET /api/games/:gameId/target - Current target of a game',
                'POST /api/games/:gameId/target - Replace the current target',
                'DELETE /api/games/:gameId - End a game'
            ]
        });
    });

    // Graceful shutdown
    const gracefulShutdown = (): void => {
        logger.info('🛑 Received shutdown signal. Closing server...');

        const forceExit = setTimeout(() => {
            logger.error('❌ Shutdown timed out, forcing exit');
            process.exit(1);
        }, TIME.SHUTDOWN_GRACE);
        forceExit.unref();

        server.close((err?: Error) => {
            closeCaches();
            if (err) {
                logger.error('❌ Error during shutdown:', formatErrorForLogging(err));
                process.exit(1);
            }
            logger.info('🔌 HTTP server closed.');
            process.exit(0);
        });
    };

    process.on('SIGTERM', gracefulShutdown);
    process.on('SIGINT', gracefulShutdown);
}

startServer();
