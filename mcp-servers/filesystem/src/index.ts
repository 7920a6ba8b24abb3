/**
 * Filesystem MCP Server — Entry Point
 *
 * Builds the server from environment config and serves it over stdio or
 * HTTP.
 *
 * Tools (6):
 *   read_file         — read a file as text
 *   write_file        — overwrite or create a file
 *   list_directory    — list direct children of a directory
 *   delete_file       — delete a file
 *   create_directory  — mkdir -p
 *   file_info         — file or directory metadata
 */

import type { Server } from 'http';

import { MCPServer } from '../../_shared/ts/mcp-base';
import { closeHttp, createHttpApp, listenHttp } from '../../_shared/ts/http-transport';
import { createLogger } from '../../_shared/ts/logger';
import { ConfigError, loadConfig, resolveTransport } from './config';
import { filesystemGateway } from './gateway';

const SERVER_NAME = 'lean-fs-mcp';
const SERVER_VERSION = '1.0.0';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const server = new MCPServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    registry: filesystemGateway,
    context: { cwd: config.root, logger },
  });

  const transport = resolveTransport(config, process.stdin.isTTY === true);
  logger.info(`Serving ${filesystemGateway.names.length} tools from '${config.root}'`);

  // ─── Process Guards ─────────────────────────────────────────────────────────

  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    const detail = reason instanceof Error ? reason.message : String(reason);
    logger.fatal({ reason: detail }, 'Unhandled rejection');
    process.exit(1);
  });

  // ─── Start ──────────────────────────────────────────────────────────────────

  if (transport === 'stdio') {
    logger.info('Starting server with STDIO transport');
    process.on('SIGINT', () => process.exit(0));
    process.on('SIGTERM', () => process.exit(0));

    await server.start();
    process.exit(0);
  }

  const httpServer: Server = await listenHttp(
    createHttpApp(server, logger),
    config.port,
    config.host,
  );
  logger.info(`Starting server on http://${config.host}:${config.port}/mcp`);

  const shutdown = (): void => {
    closeHttp(httpServer).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ error: String(err) }, 'Failed to close HTTP listener');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  const logger = createLogger();
  if (err instanceof ConfigError) {
    logger.fatal({ issues: err.issues }, 'Invalid configuration');
  } else {
    logger.fatal(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
