// src/index.ts
import { loadConfig, Config } from './config.js';
import { configureLogger, levelFromName, info, error } from './utils/logger.js';
import { initServices, closeServices, ServiceContainer } from './services/index.js';
import { NluServer } from './server/index.js';
import { startRepl } from './repl.js';

async function main(): Promise<void> {
  // 1. Load config
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('Failed to load config:', err);
    process.exit(1);
  }

  // 2. Configure logging
  configureLogger({
    level: levelFromName(config.logging.level),
    file: config.logging.file,
    console: config.logging.console,
  });

  info('Weather intent service starting...');

  // 3. Initialize services
  let services: ServiceContainer;
  try {
    services = await initServices(config);
  } catch (err) {
    error('Failed to initialize services', { error: String(err) });
    process.exit(1);
  }

  // 4. Interactive mode skips the HTTP server
  if (process.argv.includes('--repl')) {
    await startRepl(services.queries);
    closeServices(services);
    return;
  }

  const server = new NluServer({ queries: services.queries, corsOrigin: config.server.corsOrigin });
  await server.start(config.server.port, config.server.host);

  // 5. Handle shutdown
  const shutdown = async () => {
    info('Shutting down...');
    await server.stop();
    closeServices(services);
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
