import { createServer } from 'http';
import { createApp } from './app';
import { config } from './config/environment';
import { closePool } from './database/connection';
import { prepareSchema } from './database/migrate';

const start = async (): Promise<void> => {
    // Schema first: nothing may read or write the evolved columns before this
    await prepareSchema();

    const app = createApp();
    const server = createServer(app);

    server.listen(config.port, () => {
        console.log(`Server running on port ${config.port}`);
        console.log(`Environment: ${config.nodeEnv}`);
    });

    const shutdown = (signal: string): void => {
        console.log(`${signal} received, shutting down gracefully`);
        server.close(() => {
            closePool()
                .then(() => {
                    console.log('Server closed');
                    process.exit(0);
                })
                .catch((error: unknown) => {
                    console.error('Error while closing database pool:', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};

if (require.main === module) {
    start().catch((error: unknown) => {
        console.error('Failed to start server:', error);
        process.exit(1);
    });
}

export { start };
