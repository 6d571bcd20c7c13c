#!/usr/bin/env node
import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { healthcheckCommand, parseTimeout, DEFAULT_TIMEOUT_MS } from './commands/healthcheck.js';
import { versionCommand, PACKAGE_VERSION } from './commands/version.js';

const program = new Command();

program
  .name('user-health-api')
  .description('In-memory user registry with a health check, served over HTTP')
  .version(PACKAGE_VERSION);

program
  .command('serve')
  .description('Start the HTTP service')
  .option('--config <path>', 'Path to user-api.config.json (or .yaml)')
  .option('--host <host>', 'Interface to bind (default: 0.0.0.0, env HOST)')
  .option('--port <port>', 'Port to listen on (default: 5000, env PORT)')
  .option('--quiet', 'Disable the access log', false)
  .action(async (options) => {
    await serveCommand({
      config: options.config,
      host: options.host,
      port: options.port,
      quiet: options.quiet
    });
  });

program
  .command('healthcheck')
  .description('Probe GET /health of a running instance; exit 1 unless it is ok')
  .option('--url <url>', 'Base URL of the service (default: http://127.0.0.1:<port>)')
  .option('--port <port>', 'Port on 127.0.0.1 when --url is not given (default: env PORT or 5000)')
  .option('--timeout <ms>', 'Request timeout in milliseconds', parseTimeout, DEFAULT_TIMEOUT_MS)
  .option('--json', 'Output JSON', false)
  .action(async (options) => {
    await healthcheckCommand({
      url: options.url,
      port: options.port,
      timeout: options.timeout,
      json: options.json
    });
  });

program
  .command('version')
  .description('Show version information')
  .option('--json', 'Output JSON', false)
  .action(async (options) => {
    await versionCommand({ json: options.json });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
