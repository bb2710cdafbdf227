#!/usr/bin/env node
/**
 * CLI for the collaboration room server
 */

import { configFromEnv, parseDelay } from './config.js';
import { createCollaborationServer } from './collaboration-server.js';
import { createFileContentsManager } from './contents/file-contents-manager.js';
import { createMemoryFileIdManager } from './contents/memory-file-id-manager.js';
import { createLogger } from './logger.js';
import type { CollaborationServerConfig } from './types.js';
import { createFileUpdateStores } from './ystore/file-update-store.js';

/**
 * Parse command line arguments
 */
function parseArgs(args: string[]): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) continue;

    if (arg.startsWith('--no-')) {
      result[arg.slice(5)] = false;
      continue;
    }

    const key = arg.replace(/^--?/, '');
    const nextArg = args[i + 1];

    if (nextArg !== undefined && !nextArg.startsWith('-')) {
      result[key] = nextArg;
      i++;
    } else {
      result[key] = true;
    }
  }

  return result;
}

function stringArg(args: Record<string, string | boolean>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = args[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
docroom-collab - Real-time collaboration rooms for the files of a directory

Usage: docroom-collab [options]

Options:
  -p, --port <port>          Port to listen on (default: 8888)
  --host <host>              Host to bind to (default: 0.0.0.0)
  --root <dir>               Directory holding the documents (default: .)
  --token <token>            Token clients must present
  --no-auth                  Accept unauthenticated clients
  --cleanup-delay <seconds>  Keep idle rooms this long, or "off" (default: 60)
  --save-delay <seconds>     Save edits after this much quiet, or "off" (default: 1)
  --poll-interval <seconds>  Check files for outside changes, or "off" (default: 1)
  --debug                    Enable debug logging
  --help                     Show this help message
  --version                  Show version

Environment Variables:
  DOCROOM_PORT, DOCROOM_HOST, DOCROOM_ROOT, DOCROOM_TOKEN,
  DOCROOM_CLEANUP_DELAY, DOCROOM_SAVE_DELAY, DOCROOM_POLL_INTERVAL
`);
}

/**
 * Print version
 */
function printVersion(): void {
  console.log('docroom-collab v0.1.0');
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  const env = configFromEnv(process.env);
  const config: CollaborationServerConfig = { ...env.config };

  const port = stringArg(args, 'port', 'p');
  if (port !== undefined) config.port = parseInt(port, 10);

  const host = stringArg(args, 'host');
  if (host !== undefined) config.host = host;

  const cleanupDelay = stringArg(args, 'cleanup-delay');
  if (cleanupDelay !== undefined) config.documentCleanupDelay = parseDelay(cleanupDelay, 'cleanup delay');

  const saveDelay = stringArg(args, 'save-delay');
  if (saveDelay !== undefined) config.documentSaveDelay = parseDelay(saveDelay, 'save delay');

  const pollInterval = stringArg(args, 'poll-interval');
  if (pollInterval !== undefined) config.filePollInterval = parseDelay(pollInterval, 'poll interval');

  const rootDir = stringArg(args, 'root') ?? env.rootDir ?? '.';
  const token = stringArg(args, 'token') ?? env.token;
  config.requireAuth = args.auth !== false;
  config.logging = args.debug ? 'debug' : 'info';
  if (token !== undefined) {
    config.validateAuth = async (candidate) => candidate === token;
  }

  const logger = createLogger({ level: config.logging, prefix: 'docroom' });
  const contentsManager = createFileContentsManager({ rootDir });

  const server = createCollaborationServer({
    ...config,
    contentsManager,
    fileIdManager: createMemoryFileIdManager(contentsManager),
    createUpdateStore: createFileUpdateStores(rootDir, logger),
    logger,
  });

  // Handle shutdown
  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down...');
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      console.error('Failed to stop server:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await server.start();

    const { host: boundHost, port: boundPort, basePath, requireAuth } = server.config;
    console.log(`
Collaboration server running
  Rooms:    ws://${boundHost}:${boundPort}${basePath}/room/<roomId>
  Sessions: http://${boundHost}:${boundPort}${basePath}/session/<path>
  Root:     ${rootDir}
  Auth:     ${requireAuth ? 'Required' : 'Disabled'}

Press Ctrl+C to stop
`);

    server.coordinator.events$.subscribe((event) => {
      const line = `[${event.action ?? 'event'}] ${event.path ?? event.room}: ${event.msg ?? ''}`;
      if (event.level === 'warn' || event.level === 'error') {
        logger[event.level](line);
      } else if (args.debug || event.action !== 'initialize') {
        logger.info(line);
      }
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
