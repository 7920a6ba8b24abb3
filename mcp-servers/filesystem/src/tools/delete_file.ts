/**
 * delete_file — Permanently remove a file.
 *
 * Destructive. Directories are refused. A dangling symlink is removed
 * like a file, matching how list_directory shows it.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { FsToolError, errnoCode } from '../errors';
import { runFileOperation } from '../file-operation';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path of the file to delete'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export const deleteFile: MCPTool<Params, string> = {
  name: 'delete_file',
  description: 'Delete a file',
  paramsSchema,
  readOnly: false,
  destructive: true,
  idempotent: false,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<string>> {
    return runFileOperation(
      context,
      'delete_file',
      params.path,
      { notFound: 'File not found', wrongKind: 'Not a file', ioFailure: 'Error deleting file' },
      async (resolved) => {
        const stat = await fs.stat(resolved).catch((err: unknown) => {
          if (errnoCode(err) === 'ENOENT') return fs.lstat(resolved);
          throw err;
        });
        if (stat.isDirectory()) {
          throw new FsToolError('WrongKind', `Not a file: ${params.path}`);
        }

        await fs.unlink(resolved);
        return `Successfully deleted file '${params.path}'`;
      },
    );
  },
};
