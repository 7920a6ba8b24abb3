/**
 * Filesystem tool gateway — the six tools behind one static registry.
 *
 * The registry is built once when this module loads and never changes.
 * It holds no per-call state: everything a call needs arrives in its
 * ToolContext.
 */

import type { MCPResult, MCPTool, ToolContext } from '../../_shared/ts/mcp-base';
import { ToolRegistry } from '../../_shared/ts/mcp-base';
import { readFile } from './tools/read_file';
import { writeFile } from './tools/write_file';
import { listDirectory } from './tools/list_directory';
import { deleteFile } from './tools/delete_file';
import { createDirectory } from './tools/create_directory';
import { fileInfo } from './tools/file_info';

export const filesystemTools: readonly MCPTool[] = [
  readFile,
  writeFile,
  listDirectory,
  deleteFile,
  createDirectory,
  fileInfo,
];

export const filesystemGateway = new ToolRegistry(filesystemTools);

/**
 * Validate `args` against the named tool's schema and run it.
 * Throws MCPError for an unknown tool or invalid arguments.
 */
export function callTool(name: string, args: unknown, context: ToolContext): Promise<MCPResult> {
  return filesystemGateway.call(name, args, context);
}
