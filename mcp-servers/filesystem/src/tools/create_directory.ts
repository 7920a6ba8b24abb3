/**
 * create_directory — Create a directory and any missing parents.
 *
 * Idempotent: an existing directory is left untouched.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { MCPTool, MCPResult, ToolContext } from '../../../_shared/ts/mcp-base';
import { runFileOperation } from '../file-operation';

const paramsSchema = z.object({
  path: z.string().describe('Path of the directory to create'),
});

type Params = z.infer<typeof paramsSchema>;

export const createDirectory: MCPTool<Params, string> = {
  name: 'create_directory',
  description: 'Create a new directory, including parent directories if needed',
  paramsSchema,
  readOnly: false,
  destructive: false,
  idempotent: true,

  async execute(params: Params, context: ToolContext): Promise<MCPResult<string>> {
    return runFileOperation(
      context,
      'create_directory',
      params.path,
      { ioFailure: 'Error creating directory' },
      async (resolved) => {
        await fs.mkdir(resolved, { recursive: true });
        return `Successfully created directory '${params.path}'`;
      },
    );
  },
};
