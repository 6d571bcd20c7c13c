import { resolveConfig } from '../config/load.js';
import { createApp } from '../http/app.js';
import { startServer, RunningServer } from '../http/server.js';
import { UserStore } from '../store/user-store.js';
import { PACKAGE_VERSION } from './version.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ServeOptions {
  config?: string;
  host?: string;
  port?: string;
  quiet?: boolean;
}

/**
 * Start the HTTP service. The returned server is already listening; SIGINT
 * and SIGTERM close it and let the process exit.
 */
export async function serveCommand(options: ServeOptions): Promise<RunningServer | null> {
  let config;
  try {
    config = resolveConfig({
      configPath: options.config,
      overrides: {
        host: options.host,
        port: options.port,
        accessLog: options.quiet ? false : undefined
      }
    });
  } catch (err) {
    console.error(`Config: FAIL - ${errorMessage(err)}`);
    process.exitCode = 1;
    return null;
  }

  const store = new UserStore();
  const app = createApp({
    store,
    service: {
      name: config.service.name,
      version: config.service.version ?? PACKAGE_VERSION
    },
    log: config.logging.access_log ? (line) => console.log(line) : undefined
  });

  let running: RunningServer;
  try {
    running = await startServer(app, config.server.host, config.server.port);
  } catch (err) {
    console.error(`Failed to listen on ${config.server.host}:${config.server.port}: ${errorMessage(err)}`);
    process.exitCode = 1;
    return null;
  }
  console.log(`${config.service.name} listening on ${running.url}`);

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    running.close().then(
      () => console.log('Server stopped'),
      (err: unknown) => {
        console.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return running;
}
