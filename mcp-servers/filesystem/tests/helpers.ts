/**
 * Test helpers for the filesystem MCP server.
 *
 * Provides temporary directory setup/teardown and a ToolContext rooted
 * in the temporary directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { MCPResult, ToolContext } from '../../_shared/ts/mcp-base';
import { silentLogger } from '../../_shared/ts/logger';

/** Create a temporary test directory with optional files. */
export async function setupTestDir(opts?: {
  files?: string[];
  subdirs?: string[];
}): Promise<string> {
  const testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lean-fs-test-'));

  if (opts?.subdirs) {
    for (const subdir of opts.subdirs) {
      await fs.mkdir(path.join(testDir, subdir), { recursive: true });
    }
  }

  // each file holds `content of <relative path>`
  if (opts?.files) {
    for (const file of opts.files) {
      const filePath = path.join(testDir, file);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `content of ${file}`, 'utf-8');
    }
  }

  return testDir;
}

/** Remove a temporary test directory. */
export async function teardownTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

/** Context whose relative paths resolve inside `testDir` */
export function testContext(testDir: string): ToolContext {
  return { cwd: testDir, logger: silentLogger };
}

/** Payload of a successful result; fails the test otherwise */
export function unwrap<T>(result: MCPResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got: ${result.error}`);
  }
  return result.data;
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
