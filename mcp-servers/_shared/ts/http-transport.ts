/**
 * HTTP transport for MCPServer.
 *
 *   POST /mcp     one JSON-RPC message per request
 *   GET  /health  liveness probe
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';

import { errorResponse } from './json-rpc';
import { ErrorCodes } from './mcp-base';
import type { MCPServer } from './mcp-base';
import type { Logger } from './logger';

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
  );
}

export function createHttpApp(server: MCPServer, logger: Logger): Express {
  const app = express();
  const log = logger.child('http');

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', name: server.name, version: server.version });
  });

  app.post('/mcp', (req: Request, res: Response, next: NextFunction) => {
    server
      .handleMessage(req.body)
      .then((response) => {
        if (response === null) {
          res.status(202).end();
          return;
        }
        res.json(response);
      })
      .catch(next);
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyParseError(err)) {
      log.warn('Rejected request body that is not valid JSON');
      res.status(400).json(errorResponse(null, ErrorCodes.PARSE_ERROR, 'Invalid JSON'));
      return;
    }
    next(err);
  });

  return app;
}

/** Bind the app; resolves once the socket is listening */
export function listenHttp(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => resolve(httpServer));
    httpServer.once('error', reject);
  });
}

export function closeHttp(httpServer: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    httpServer.close((err) => (err ? reject(err) : resolve()));
  });
}
