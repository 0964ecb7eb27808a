import { loadEnv } from './config/env';
import { buildAppConfig } from './config/app-config';
import { connectToDatabase, disconnectFromDatabase } from './infra/db';
import type { BlobStore } from './domain/pipeline/interfaces';
import { GridFsBlobStore } from './infra/storage/gridfs-blob-store';
import { InMemoryBlobStore } from './infra/storage/memory-blob-store';
import { createPromptPipeline } from './services/pipeline-factory';
import { buildApp } from './app';

async function bootstrap() {
    const config = buildAppConfig(loadEnv());

    let blobStore: BlobStore;
    if (config.storage.driver === 'gridfs') {
        const db = await connectToDatabase(config.storage.mongoUri);
        blobStore = new GridFsBlobStore(db);
    } else {
        blobStore = new InMemoryBlobStore();
    }

    // Composition root: every collaborator gets its slice of the config explicitly
    const server = await buildApp({
        createPipeline: (logger) => createPromptPipeline(config, blobStore, logger),
        corsOrigin: config.http.corsOrigin,
        maxUploadBytes: config.http.maxUploadBytes,
        maxImagesPerBatch: config.http.maxImagesPerBatch,
        isProduction: config.isProduction,
    });

    const port = config.http.port;
    const host = '0.0.0.0';

    await server.listen({ port, host });

    server.log.info({ storage: config.storage.driver, bucket: config.storage.bucket }, `🚀 API execution started on http://localhost:${port}`);

    // Graceful Shutdown
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    signals.forEach((signal) => {
        process.on(signal, async () => {
            server.log.info(`Received ${signal}, closing server...`);
            await server.close();
            await disconnectFromDatabase();
            process.exit(0);
        });
    });
}

bootstrap().catch((err) => {
    console.error('❌ Failed to start server:', err);
    process.exit(1);
});
