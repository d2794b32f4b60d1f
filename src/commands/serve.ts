/**
 * Serve command - start the gatekeeper HTTP server
 */

import { Command } from 'commander';
import { createGatewayServer } from '../gateway/server.js';
import { createLogger } from '../gateway/logger.js';
import { GatewayConfig, createGatewayConfig, readEnvOverrides } from '../gateway/config.js';

export interface ServeOptions {
  port?: string;
  host?: string;
}

/**
 * Build configuration from the environment, with CLI flags taking precedence
 */
export function buildServeConfig(
  options: ServeOptions,
  env: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  const overrides = readEnvOverrides(env);

  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!Number.isInteger(port)) {
      throw new Error(`Invalid port number: ${options.port}`);
    }
    overrides.port = port;
  }
  if (options.host !== undefined) {
    overrides.host = options.host;
  }

  return createGatewayConfig(overrides);
}

export function createServeCommand(): Command {
  const cmd = new Command('serve')
    .description('Start the gatekeeper HTTP server')
    .option('-p, --port <port>', 'Server port (overrides PORTCULLIS_PORT)')
    .option('-H, --host <host>', 'Server host (overrides PORTCULLIS_HOST)')
    .action(async (options: ServeOptions) => {
      let config: GatewayConfig;
      try {
        config = buildServeConfig(options);
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }

      const logger = createLogger(console.log, config.log_level);
      const gateway = createGatewayServer({ config, logger });

      try {
        const address = await gateway.start();
        console.error(`portcullis listening at ${address}`);
        console.error('Press Ctrl+C to stop');

        // Signal handlers in server.ts handle graceful shutdown and process.exit()
        await new Promise<void>(() => {
          // Never resolves
        });
      } catch (error) {
        console.error('Failed to start server:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  return cmd;
}
