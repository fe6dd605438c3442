import http from 'node:http';
import type { Logger } from 'pino';
import { createApp } from './app';
import type { AppConfig } from './config/config';

export type StartServerOptions = {
  config: AppConfig;
  logger: Logger;
  // Overrides config.host / config.port; tests bind to 127.0.0.1:0.
  host?: string;
  port?: number;
};

export type ServerHandle = {
  url: string;
  close: () => Promise<void>;
};

export async function startServer(options: StartServerOptions): Promise<ServerHandle> {
  const host = options.host ?? options.config.host;
  const port = options.port ?? options.config.port;
  if (!Number.isInteger(port) || port < 0) {
    throw new Error('Port must be a non-negative integer.');
  }

  const app = createApp(options.config, options.logger);
  const server = http.createServer(app);
  server.requestTimeout = options.config.requestTimeoutMs;

  await listen(server, host, port);

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Unable to determine server address.');
  }

  const urlHost = address.family === 'IPv6' ? `[${address.address}]` : address.address;
  return {
    url: `http://${urlHost}:${address.port}`,
    close: () => closeServer(server),
  };
}

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
