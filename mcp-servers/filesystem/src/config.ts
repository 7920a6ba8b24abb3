/**
 * Server configuration, read from the environment.
 *
 *   LEANFS_ROOT        directory relative tool paths resolve against (default: cwd)
 *   LEANFS_TRANSPORT   stdio | http | auto (default: auto)
 *   LEANFS_HOST        HTTP bind host (default: 0.0.0.0)
 *   PORT               HTTP port (default: 8080)
 *   LEANFS_LOG_LEVEL   trace | debug | info | warn | error | fatal (default: info)
 */

import * as path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  LEANFS_ROOT: z.string().min(1).optional(),
  LEANFS_TRANSPORT: z.enum(['stdio', 'http', 'auto']).default('auto'),
  LEANFS_HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LEANFS_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type TransportMode = 'stdio' | 'http';

export interface ServerConfig {
  root: string;
  transport: TransportMode | 'auto';
  host: string;
  port: number;
  logLevel: z.infer<typeof envSchema>['LEANFS_LOG_LEVEL'];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
    this.name = 'ConfigError';
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    root: path.resolve(cwd, vars.LEANFS_ROOT ?? '.'),
    transport: vars.LEANFS_TRANSPORT,
    host: vars.LEANFS_HOST,
    port: vars.PORT,
    logLevel: vars.LEANFS_LOG_LEVEL,
  };
}

/** `auto` picks stdio when stdin is piped (an MCP client spawned us), HTTP on a terminal */
export function resolveTransport(config: ServerConfig, stdinIsTTY: boolean): TransportMode {
  if (config.transport !== 'auto') return config.transport;
  return stdinIsTTY ? 'http' : 'stdio';
}
