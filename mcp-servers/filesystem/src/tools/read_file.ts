/**
 * read_file — Read a whole file as UTF-8 text.
 *
 * Read-only. Bytes that are not valid UTF-8 fail the read instead of
 * being replaced.
 */

import * as fs from 'fs/promises';
import { TextDecoder } from 'util';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { FsToolError } from '../errors';
import { runFileOperation } from '../file-operation';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  path: z.string().describe('Path to the file to read'),
});

type Params = z.infer<typeof paramsSchema>;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

// ─── Tool Definition ────────────────────────────────────────────────────────

export const readFile: MCPTool<Params, string> = {
  name: 'read_file',
  description: 'Read and return the contents of a file',
  paramsSchema,
  readOnly: true,
  destructive: false,
  idempotent: true,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<string>> {
    return runFileOperation(
      context,
      'read_file',
      params.path,
      { notFound: 'File not found', wrongKind: 'Not a file', ioFailure: 'Error reading file' },
      async (resolved) => {
        const stat = await fs.stat(resolved);
        if (!stat.isFile()) {
          throw new FsToolError('WrongKind', `Not a file: ${params.path}`);
        }
        const bytes = await fs.readFile(resolved);
        return utf8.decode(bytes);
      },
    );
  },
};
