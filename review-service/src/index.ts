import dotenv from 'dotenv';
import pino from 'pino';
import { ConfigError, loadConfig } from './config/config';
import type { AppConfig } from './config/config';
import { createLogger } from './logger';
import { startServer } from './server';

dotenv.config();

function readConfig(): AppConfig | undefined {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    pino({ name: 'code-sentinel' }).fatal({ issues: err.issues }, err.message);
    process.exitCode = 1;
    return undefined;
  }
}

const config = readConfig();

if (config) {
  const logger = createLogger(config);

  startServer({ config, logger })
    .then(handle => {
      logger.info(
        { url: handle.url, title: config.apiTitle, version: config.apiVersion },
        'code-sentinel listening',
      );
      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'shutting down');
        handle.close().catch(err => {
          logger.error({ err }, 'failed to close server');
          process.exitCode = 1;
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    })
    .catch(err => {
      logger.fatal({ err }, 'failed to start server');
      process.exitCode = 1;
    });
}
