import "reflect-metadata";
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createDataSource, isSingleConnection } from './config/database';
import { createApp } from './server';
import { Broadcaster } from './services/Broadcaster';
import { loadDefaultSites } from './services/defaultSites';
import { HttpFetcher } from './services/Fetcher';
import { Registry } from './services/Registry';
import { Scheduler } from './services/Scheduler';
import { UpdateStore } from './services/UpdateStore';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
    const config = loadConfig();
    console.log('Config loaded:', {
        updateCacheSize: config.updateCacheSize,
        defaultIntervalSecs: config.defaultIntervalSecs,
        intervalJitterMaxMs: config.intervalJitterMaxMs,
        database: config.database.type,
    });

    const dataSource = createDataSource(config.database);
    await dataSource.initialize();
    console.log("Database connection initialized");

    const store = new UpdateStore(dataSource, {
        updateCacheSize: config.updateCacheSize,
        serializeAllWrites: isSingleConnection(dataSource),
    });
    if (config.resetDb) {
        console.log('RESET_DB is set; wiping all sites and updates');
        await store.resetAll();
    }

    const broadcaster = new Broadcaster(config.subscriberQueueSize);
    const scheduler = new Scheduler({
        fetcher: new HttpFetcher(undefined, { maxContentBytes: config.maxContentBytes }),
        store,
        broadcaster,
        settings: {
            intervalJitterMaxMs: config.intervalJitterMaxMs,
            maxBackoffSecs: config.maxBackoffSecs,
            fetchTimeoutMs: config.fetchTimeoutMs,
            previewLength: config.previewLength,
        },
    });
    const registry = new Registry(store, scheduler, {
        defaultIntervalSecs: config.defaultIntervalSecs,
        defaultSites: config.seedDefaultSites ? loadDefaultSites() : [],
    });
    await registry.start();

    const app = createApp({ registry, store, broadcaster });
    const server = app.listen(config.port, () => {
        console.log(`Server running at http://localhost:${config.port}`);
    });

    let shuttingDown = false;
    async function gracefulShutdown(signal: string): Promise<void> {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`Received ${signal}. Graceful shutdown...`);
        try {
            await registry.stop();
            broadcaster.close();
            await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
            await dataSource.destroy();
            console.log('Scheduler, server and database connection closed.');
            process.exit(0);
        } catch (err) {
            console.error('Error during shutdown:', err);
            process.exit(1);
        }
    }

    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch((error) => {
        console.error('Failed to start:', error);
        process.exit(1);
    });
}

export { main };
