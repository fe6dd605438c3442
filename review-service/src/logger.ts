import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import type { AppConfig } from './config/config';

export function createLogger(
  config: Pick<AppConfig, 'environment' | 'logLevel'>,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    name: 'code-sentinel',
    level: config.logLevel,
    base: { environment: config.environment },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
