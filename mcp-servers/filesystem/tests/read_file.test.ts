import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ToolContext } from '../../_shared/ts/mcp-base';
import { readFile } from '../src/tools/read_file';
import { setupTestDir, teardownTestDir, testContext } from './helpers';

describe('read_file', () => {
  let testDir: string;
  let ctx: ToolContext;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: ['hello.txt', 'docs/notes.md'], subdirs: ['subdir'] });
    ctx = testContext(testDir);
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should read file contents by absolute path', async () => {
    const result = await readFile.execute({ path: path.join(testDir, 'hello.txt') }, ctx);
    expect(result).toEqual({ success: true, data: 'content of hello.txt' });
  });

  it('should resolve relative paths against the context cwd', async () => {
    const result = await readFile.execute({ path: 'docs/notes.md' }, ctx);
    expect(result).toEqual({ success: true, data: 'content of docs/notes.md' });
  });

  it('should fail with File not found for a missing file', async () => {
    const result = await readFile.execute({ path: 'missing.txt' }, ctx);
    expect(result).toEqual({ success: false, error: 'File not found: missing.txt' });
  });

  it('should report missing files with a case-insensitive "not found"', async () => {
    const result = await readFile.execute({ path: 'nowhere/at/all.txt' }, ctx);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.toLowerCase()).toContain('not found');
    }
  });

  it('should fail with Not a file for a directory', async () => {
    const result = await readFile.execute({ path: 'subdir' }, ctx);
    expect(result).toEqual({ success: false, error: 'Not a file: subdir' });
  });

  it('should fail instead of replacing bytes that are not UTF-8', async () => {
    await fs.writeFile(path.join(testDir, 'binary.bin'), Buffer.from([0x68, 0xff, 0xfe, 0x69]));

    const result = await readFile.execute({ path: 'binary.bin' }, ctx);
    expect(result).toEqual({
      success: false,
      error: expect.stringMatching(/^Error reading file: /),
    });
  });

  it('should keep a leading byte order mark', async () => {
    await fs.writeFile(path.join(testDir, 'bom.txt'), Buffer.from([0xef, 0xbb, 0xbf, 0x61]));

    const result = await readFile.execute({ path: 'bom.txt' }, ctx);
    expect(result).toEqual({ success: true, data: '\ufeffa' });
  });

  it('should keep serving after a failure', async () => {
    await readFile.execute({ path: 'missing.txt' }, ctx);
    const result = await readFile.execute({ path: 'hello.txt' }, ctx);
    expect(result).toEqual({ success: true, data: 'content of hello.txt' });
  });

  it('has correct metadata', () => {
    expect(readFile.name).toBe('read_file');
    expect(readFile.readOnly).toBe(true);
    expect(readFile.destructive).toBe(false);
  });
});
