/**
 * list_directory — List the direct children of a directory.
 *
 * Read-only. Entries are sorted by name so listings are deterministic.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { FsToolError } from '../errors';
import { runFileOperation } from '../file-operation';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface DirectoryEntry {
  name: string;
  kind: 'file' | 'directory';
  /** Bytes; omitted for directories */
  size?: number;
}

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z
    .string()
    .optional()
    .default('.')
    .describe('Directory to list. Defaults to the working directory'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Implementation ─────────────────────────────────────────────────────────

async function describeEntry(dirPath: string, name: string): Promise<DirectoryEntry> {
  // follows symlinks, so a link to a directory lists as a directory
  const stat = await fs.stat(path.join(dirPath, name)).catch(() => null);
  if (stat === null) {
    // dangling link or a race with a delete: still list the name
    return { name, kind: 'file' };
  }

  if (stat.isDirectory()) {
    return { name, kind: 'directory' };
  }
  return { name, kind: 'file', size: stat.size };
}

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ─── Tool Definition ────────────────────────────────────────────────────────

export const listDirectory: MCPTool<Params, DirectoryEntry[]> = {
  name: 'list_directory',
  description: 'List all files and directories in the specified path',
  paramsSchema,
  readOnly: true,
  destructive: false,
  idempotent: true,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<DirectoryEntry[]>> {
    return runFileOperation(
      context,
      'list_directory',
      params.path,
      {
        notFound: 'Directory not found',
        wrongKind: 'Not a directory',
        ioFailure: 'Error listing directory',
      },
      async (resolved) => {
        const dirStat = await fs.stat(resolved);
        if (!dirStat.isDirectory()) {
          throw new FsToolError('WrongKind', `Not a directory: ${params.path}`);
        }

        const names = (await fs.readdir(resolved)).sort(byName);
        return Promise.all(names.map((name) => describeEntry(resolved, name)));
      },
    );
  },
};
