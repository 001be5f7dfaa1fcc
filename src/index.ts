import { loadConfig } from './config/index.js';
import { ServerStartError } from './errors/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig();
  const sentryEnabled = initSentry(config.sentry);

  // Registry construction fails here if two backends share a type or charm
  const server = await createServer({ config });
  server.log.info({ sentry: sentryEnabled }, 'Error tracking configured');

  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error';
    server.log.error(new ServerStartError(reason), 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
