import { flushTracing } from './instrumentation'; // Must be first - loads .env and initializes Langfuse
import { loadConfig } from './config';
import { createApp, createServices } from './app';

async function main(): Promise<void> {
  const config = loadConfig();
  const services = await createServices(config);
  const app = createApp(services);

  const server = app.listen(config.port, config.host, () => {
    console.log(`🚀 Server running on ${config.host}:${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/health`);
    console.log(`📈 Status: http://localhost:${config.port}/api/status`);

    services.scheduler.start();
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down gracefully...`);

    server.close();
    await services.scheduler.gracefulShutdown();
    await services.store.close();
    await flushTracing();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error instanceof Error ? error.message : error);
  process.exit(1);
});
