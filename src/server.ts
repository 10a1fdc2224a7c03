import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { initLangfuseTracing } from './instrumentation';
import { createServices } from './services';
import { debugLogger } from './utils/debug-logger';

dotenv.config();

function main(): void {
  const config = loadConfig();
  debugLogger.setEnabled(config.debug);
  const spanProcessor = initLangfuseTracing(config);

  const services = createServices(config);
  const app = createApp(services);
  const { host, port } = config.server;

  const server = app.listen(port, host, () => {
    console.log(`🚀 Server running on ${host}:${port}`);
    console.log(`📊 Health check: http://localhost:${port}/health`);
    console.log(`🔎 Search: http://localhost:${port}/search?q=...`);
    console.log(
      `🧩 Chunking: ${config.chunking.strategy}, embeddings: ${services.embeddings.modelName} (${config.embeddings.provider}), store: ${services.store.name}`
    );

    if (config.ingestion.schedulerEnabled) {
      services.scheduler.start();
    }
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    services.scheduler
      .gracefulShutdown()
      .then(() => spanProcessor?.forceFlush())
      .then(() => {
        server.close(() => process.exit(0));
      })
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  console.error('❌ Failed to start server:', error instanceof Error ? error.message : error);
  process.exit(1);
}
