import type { Server } from 'node:http';
import type { Express } from 'express';
import { invalidConfigError } from '../utils/errors.js';

/**
 * Port from `--port`/`-p`, then PORT, then 3000.
 */
export function parsePort(args: string[], env: NodeJS.ProcessEnv = process.env): number {
  let raw = env.PORT || '3000';
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--port' || args[i] === '-p') {
      raw = args[++i] ?? '';
    }
  }

  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw invalidConfigError(`port must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

/**
 * Start listening; resolves once bound, rejects when the port cannot be used.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolvePromise, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once('listening', () => resolvePromise(server));
    server.once('error', (error: Error) => {
      const wrapped = invalidConfigError(`cannot listen on port ${port}: ${error.message}`);
      wrapped.cause = error;
      reject(wrapped);
    });
  });
}
