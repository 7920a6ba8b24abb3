/**
 * write_file — Write content to a file, creating parent directories.
 *
 * Destructive: an existing file is truncated and replaced.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { runFileOperation } from '../file-operation';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path to the file to write'),
  content: z.string().describe('Content to write to the file'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export const writeFile: MCPTool<Params, string> = {
  name: 'write_file',
  description: "Write content to a file, creating it if it doesn't exist",
  paramsSchema,
  readOnly: false,
  destructive: true,
  idempotent: true,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<string>> {
    return runFileOperation(
      context,
      'write_file',
      params.path,
      { ioFailure: 'Error writing file' },
      async (resolved) => {
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, params.content, { encoding: 'utf8' });

        const bytes = Buffer.byteLength(params.content, 'utf8');
        return `Successfully wrote ${bytes} bytes to '${params.path}'`;
      },
    );
  },
};
