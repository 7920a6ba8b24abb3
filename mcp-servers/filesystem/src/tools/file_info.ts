/**
 * file_info — Metadata for a file or directory.
 *
 * Read-only.
 */

import * as fs from 'fs/promises';
import { constants } from 'fs';
import type { Stats } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { runFileOperation } from '../file-operation';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface FileInfo {
  name: string;
  /** Absolute, resolved path */
  path: string;
  kind: 'file' | 'directory';
  size: number;
  /** Omitted where the filesystem records no creation time */
  created?: string;
  modified: string;
  permissions: string;
  readable: boolean;
  writable: boolean;
  /** Files only, including the leading dot; '' when there is none */
  extension?: string;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path to the file or directory'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Helpers ────────────────────────────────────────────────────────────────

export function formatPermissions(mode: number): string {
  const perms = ['---', '--x', '-w-', '-wx', 'r--', 'r-x', 'rw-', 'rwx'];
  const owner = perms[(mode >> 6) & 7];
  const group = perms[(mode >> 3) & 7];
  const others = perms[mode & 7];
  return `${owner}${group}${others}`;
}

/** Birth time as ISO, or undefined when the filesystem reports the epoch */
export function creationTime(stat: Pick<Stats, 'birthtime' | 'birthtimeMs'>): string | undefined {
  return stat.birthtimeMs > 0 ? stat.birthtime.toISOString() : undefined;
}

async function hasAccess(target: string, mode: number): Promise<boolean> {
  try {
    await fs.access(target, mode);
    return true;
  } catch {
    return false;
  }
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const fileInfo: MCPTool<Params, FileInfo> = {
  name: 'file_info',
  description: 'Get detailed information about a file or directory',
  paramsSchema,
  readOnly: true,
  destructive: false,
  idempotent: true,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<FileInfo>> {
    return runFileOperation(
      context,
      'file_info',
      params.path,
      { notFound: 'Path not found', ioFailure: 'Error reading file info' },
      async (resolved) => {
        const stat = await fs.stat(resolved);
        const isDirectory = stat.isDirectory();

        const info: FileInfo = {
          name: path.basename(resolved),
          path: resolved,
          kind: isDirectory ? 'directory' : 'file',
          size: stat.size,
          modified: stat.mtime.toISOString(),
          permissions: formatPermissions(stat.mode),
          readable: await hasAccess(resolved, constants.R_OK),
          writable: await hasAccess(resolved, constants.W_OK),
        };

        const created = creationTime(stat);
        if (created !== undefined) {
          info.created = created;
        }
        if (!isDirectory) {
          info.extension = path.extname(resolved);
        }

        return info;
      },
    );
  },
};
