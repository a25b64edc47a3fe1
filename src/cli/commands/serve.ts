/**
 * Serve Command - runs the image chat gateway in the foreground
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { DEFAULT_PURPOSE } from '../../domain/image-chat/presets.js';
import { GatewayServer } from '../../gateway/index.js';
import { loadRuntimeConfig } from '../../infra/config/runtime-config.js';
import { createImageBackend } from '../../infra/generation/backend-factory.js';
import { InMemorySessionStore } from '../../infra/persistence/in-memory-session-store.js';
import type { ISessionStore } from '../../infra/persistence/session-store.js';
import { describeError } from '../lib/format.js';
import { openSessionStore } from '../lib/open-store.js';

interface ServeOptions {
  host?: string;
  port?: string;
  db?: string;
  memory?: boolean;
  mock?: boolean;
  debug?: boolean;
}

export const serveCommand = new Command('serve')
  .description('Start the image chat WebSocket gateway')
  .option('-h, --host <host>', 'Host to bind to')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-d, --db <url>', 'Database URL (sqlite:///path or a file path)')
  .option('--memory', 'Keep sessions in memory only (nothing is written to disk)')
  .option('--mock', 'Use the offline mock image backend')
  .option('--debug', 'Print debug events')
  .action(async (options: ServeOptions) => {
    let server: GatewayServer;
    let closeStore: () => void;

    try {
      const config = loadRuntimeConfig();
      const port = options.port !== undefined ? parseInt(options.port, 10) : config.gateway.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.error(chalk.red(`Invalid port: ${options.port}`));
        process.exit(1);
      }

      const store: ISessionStore = options.memory
        ? new InMemorySessionStore()
        : openSessionStore(options.db ?? config.storage.databaseUrl);
      closeStore = () => store.close();

      server = new GatewayServer(
        {
          store,
          backend: createImageBackend(config.generation, { mock: options.mock }),
          generationTimeoutMs: config.generation.timeoutMs,
          contextWindow: config.generation.contextWindow,
          debugMode: options.debug ?? config.debug.enabled,
        },
        {
          ...config.gateway,
          host: options.host ?? config.gateway.host,
          port,
        }
      );

      await server.start();

      if (options.memory) {
        const session = store.createSession({ purpose: DEFAULT_PURPOSE, title: 'In-memory session' });
        console.log(chalk.green(`✓ Created in-memory session ${chalk.cyan(session.id)}`));
        console.log(chalk.gray(`  Connect: imgchat chat ${session.id}`));
      }
    } catch (error) {
      console.error(chalk.red(`Failed to start gateway: ${describeError(error)}`));
      process.exit(1);
    }

    const shutdown = (signal: string) => {
      console.log(chalk.yellow(`\nReceived ${signal}, shutting down...`));
      server
        .stop()
        .then(() => {
          closeStore();
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error(chalk.red(`Shutdown failed: ${describeError(error)}`));
          process.exit(1);
        });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
