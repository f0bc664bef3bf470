import { createApp } from './app/createApp.js';
import { ConfigError, loadProcessConfig, type AppConfig } from './config/index.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

function loadConfigOrExit(): AppConfig {
  try {
    return loadProcessConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('config_invalid', { problems: err.problems });
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const config = loadConfigOrExit();

  const { app, registry } = createApp(config);
  logger.info('offers_loaded', { slugs: registry.slugs() });
  for (const slug of config.unconfiguredOffers) {
    logger.warn('offer_not_configured', { slug });
  }

  const host = '0.0.0.0';
  const server = app.listen({ port: config.port, host }, () => {
    logger.info('server_listening', { port: config.port, address: `${host}:${config.port}` });
  });

  const shutdown = (signal: string) => {
    logger.info('shutting_down', { signal });
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main();
