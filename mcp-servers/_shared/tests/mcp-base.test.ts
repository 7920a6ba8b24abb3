import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ErrorCodes,
  MCPServer,
  ToolRegistry,
  fail,
  ok,
  renderToolText,
} from '../ts/mcp-base';
import type { MCPTool, ToolContext } from '../ts/mcp-base';
import { silentLogger } from '../ts/logger';

const echoSchema = z.object({ text: z.string() });
const emptySchema = z.object({}).strict();

const echo: MCPTool<z.infer<typeof echoSchema>, string> = {
  name: 'echo',
  description: 'Echo text back',
  paramsSchema: echoSchema,
  readOnly: true,
  destructive: false,
  idempotent: true,
  execute: async (params) => ok(params.text),
};

const refuse: MCPTool<z.infer<typeof emptySchema>, string> = {
  name: 'refuse',
  description: 'Always fails',
  paramsSchema: emptySchema,
  readOnly: true,
  destructive: false,
  idempotent: true,
  execute: async () => fail('nope'),
};

const crash: MCPTool<z.infer<typeof emptySchema>, string> = {
  name: 'crash',
  description: 'Throws instead of returning a result',
  paramsSchema: emptySchema,
  readOnly: false,
  destructive: false,
  idempotent: false,
  execute: async () => {
    throw new Error('boom');
  },
};

const context: ToolContext = { cwd: '/', logger: silentLogger };

function makeServer(): MCPServer {
  return new MCPServer({
    name: 'fake',
    version: '9.9.9',
    registry: new ToolRegistry([echo, refuse, crash]),
    context,
  });
}

describe('ToolRegistry', () => {
  it('refuses duplicate tool names', () => {
    expect(() => new ToolRegistry([echo, echo])).toThrow('Duplicate tool name: echo');
  });

  it('keeps registration order', () => {
    expect(new ToolRegistry([crash, echo]).names).toEqual(['crash', 'echo']);
  });

  it('validates before executing', async () => {
    const registry = new ToolRegistry([echo]);
    await expect(registry.call('echo', { text: 'hi' }, context)).resolves.toEqual({
      success: true,
      data: 'hi',
    });
    await expect(registry.call('echo', { text: 1 }, context)).rejects.toThrow(/^Invalid parameters: /);
    await expect(registry.call('nope', {}, context)).rejects.toThrow('Unknown tool: nope');
  });

  it('exposes annotations in tool definitions', () => {
    expect(new ToolRegistry([crash]).definitions()).toEqual([
      expect.objectContaining({
        name: 'crash',
        description: 'Throws instead of returning a result',
        annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false },
      }),
    ]);
  });
});

describe('MCPServer', () => {
  it('turns a thrown tool error into an internal error and keeps serving', async () => {
    const server = makeServer();

    const crashed = await server.handleMessage({
      jsonrpc: '2.0',
      id: 1,
      method: 'tools/call',
      params: { name: 'crash', arguments: {} },
    });
    expect(crashed).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal error: boom' },
    });

    const next = await server.handleMessage({
      jsonrpc: '2.0',
      id: 2,
      method: 'tools/call',
      params: { name: 'echo', arguments: { text: 'still up' } },
    });
    expect(next).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { content: [{ type: 'text', text: 'still up' }] },
    });
  });

  it('flags failed results with isError', async () => {
    const response = await makeServer().handleMessage({
      jsonrpc: '2.0',
      id: 'r',
      method: 'tools/call',
      params: { name: 'refuse' },
    });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 'r',
      result: { content: [{ type: 'text', text: 'nope' }], isError: true },
    });
  });
});

describe('renderToolText', () => {
  it('passes strings through', () => {
    expect(renderToolText('plain')).toBe('plain');
  });

  it('indents everything else as JSON', () => {
    expect(renderToolText({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(renderToolText([])).toBe('[]');
  });
});
