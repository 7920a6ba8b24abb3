/**
 * MCP Server Base Classes — TypeScript
 *
 * Shared foundation for the TypeScript MCP servers in this repo.
 * Implements the JSON-RPC 2.0 dispatcher, the stdio transport and a
 * static tool registry.
 *
 * Usage:
 *   import { MCPServer, ToolRegistry, ok, fail } from '../../_shared/ts/mcp-base';
 */

import type { Readable, Writable } from 'stream';
import type { ZodType, ZodTypeDef } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import {
  errorResponse,
  extractId,
  isNotification,
  isValidRequest,
  successResponse,
} from './json-rpc';
import type { JsonRpcRequest, JsonRpcResponse } from './json-rpc';
import type { Logger } from './logger';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Result returned by a tool execution */
export type MCPResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string };

export function ok<T>(data: T): MCPResult<T> {
  return { success: true, data };
}

export function fail(error: string): { success: false; error: string } {
  return { success: false, error };
}

/** Structured error for protocol-level failures */
export class MCPError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
    this.name = 'MCPError';
  }
}

/** Standard JSON-RPC error codes */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export const DEFAULT_PROTOCOL_VERSION = '2025-03-26';

/** Per-call environment handed to every tool */
export interface ToolContext {
  /** Directory relative paths resolve against */
  cwd: string;
  logger: Logger;
}

/** Tool definition interface — every tool implements this */
export interface MCPTool<TParams = unknown, TData = unknown> {
  name: string;

  /** Human-readable description for the LLM */
  description: string;

  /** Zod schema for parameter validation; the input side may differ (defaults) */
  paramsSchema: ZodType<TParams, ZodTypeDef, unknown>;

  /** Does not change anything outside the server */
  readOnly: boolean;

  /** May remove or overwrite existing data */
  destructive: boolean;

  /** Repeating the call with the same params has no additional effect */
  idempotent: boolean;

  execute(params: TParams, context: ToolContext): Promise<MCPResult<TData>>;
}

// ─── Tool Registry ──────────────────────────────────────────────────────────

/**
 * Static name → tool mapping. Built once, read-only afterwards.
 *
 * `call` rejects unknown names and invalid arguments with an MCPError
 * before the tool runs.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, MCPTool>;

  constructor(tools: readonly MCPTool[]) {
    const map = new Map<string, MCPTool>();
    for (const tool of tools) {
      if (map.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      map.set(tool.name, tool);
    }
    this.tools = map;
  }

  get names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Tool definitions for `tools/list`.
   *
   * Converts each zod schema to JSON Schema so the client sees property,
   * required and description metadata.
   */
  definitions(): Record<string, unknown>[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.paramsSchema, {
        target: 'openApi3',
        $refStrategy: 'none',
      }),
      annotations: {
        readOnlyHint: tool.readOnly,
        destructiveHint: tool.destructive,
        idempotentHint: tool.idempotent,
      },
    }));
  }

  async call(name: string, args: unknown, context: ToolContext): Promise<MCPResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new MCPError(ErrorCodes.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
    }

    const parseResult = tool.paramsSchema.safeParse(args ?? {});
    if (!parseResult.success) {
      throw new MCPError(
        ErrorCodes.INVALID_PARAMS,
        `Invalid parameters: ${parseResult.error.message}`,
      );
    }

    return tool.execute(parseResult.data, context);
  }
}

// ─── MCPServer ──────────────────────────────────────────────────────────────

export interface MCPServerConfig {
  name: string;
  version: string;
  registry: ToolRegistry;
  context: ToolContext;
}

/** Text sent back to the client for a tool payload */
export function renderToolText(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data, null, 2);
}

/**
 * Base MCP Server class.
 *
 * Validates JSON-RPC envelopes, answers the MCP handshake and dispatches
 * tool calls. Transport-agnostic: `start` runs it over stdio, and
 * `handleMessage` is what the HTTP transport calls per request.
 *
 * Usage:
 *   const server = new MCPServer({ name: 'filesystem', version: '1.0.0', registry, context });
 *   await server.start();
 */
export class MCPServer {
  readonly name: string;
  readonly version: string;
  private readonly registry: ToolRegistry;
  private readonly context: ToolContext;
  private readonly logger: Logger;

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.registry = config.registry;
    this.context = config.context;
    this.logger = config.context.logger.child('dispatcher');
  }

  /**
   * Serve newline-delimited JSON-RPC over a stream pair (stdio by default).
   *
   * Each line is dispatched as soon as it arrives. Resolves once input ends
   * and every in-flight response has been written.
   */
  start(input: Readable = process.stdin, output: Writable = process.stdout): Promise<void> {
    return new Promise((resolve, reject) => {
      const pending = new Set<Promise<void>>();
      let buffer = '';

      const dispatch = (line: string): void => {
        const task: Promise<void> = this.handleLine(line)
          .then((response) => {
            if (response) {
              output.write(JSON.stringify(response) + '\n');
            }
          })
          .catch((err: unknown) => {
            this.logger.error({ error: describeError(err) }, 'Failed to answer request');
          })
          .finally(() => {
            pending.delete(task);
          });
        pending.add(task);
      };

      input.setEncoding('utf-8');

      input.on('data', (chunk: string) => {
        buffer += chunk;

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (line.trim().length > 0) dispatch(line);
        }
      });

      input.on('end', () => {
        if (buffer.trim().length > 0) dispatch(buffer);
        buffer = '';
        Promise.all(pending).then(() => resolve(), reject);
      });

      input.on('error', reject);
    });
  }

  /** Handle one raw line of the stdio stream */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    let message: unknown;
    try {
      message = JSON.parse(line.trim());
    } catch {
      this.logger.warn('Discarding unparseable input line');
      return errorResponse(null, ErrorCodes.PARSE_ERROR, 'Invalid JSON');
    }
    return this.handleMessage(message);
  }

  /** Handle one decoded JSON-RPC message; null means nothing to send back */
  async handleMessage(message: unknown): Promise<JsonRpcResponse | null> {
    if (isNotification(message)) {
      this.logger.debug(`Notification: ${message.method}`);
      return null;
    }

    if (!isValidRequest(message)) {
      return errorResponse(extractId(message), ErrorCodes.INVALID_REQUEST, 'Invalid JSON-RPC request');
    }

    return this.handleRequest(message);
  }

  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    switch (request.method) {
      case 'initialize':
        return this.handleInitialize(request);
      case 'tools/list':
        return successResponse(request.id, { tools: this.registry.definitions() });
      case 'tools/call':
        return this.handleToolCall(request);
      case 'ping':
        return successResponse(request.id, {});
      default:
        return errorResponse(
          request.id,
          ErrorCodes.METHOD_NOT_FOUND,
          `Unknown method: ${request.method}`,
        );
    }
  }

  private handleInitialize(request: JsonRpcRequest): JsonRpcResponse {
    const requested = request.params?.protocolVersion;
    const protocolVersion = typeof requested === 'string' ? requested : DEFAULT_PROTOCOL_VERSION;

    this.logger.info(`Client initialized (protocol ${protocolVersion})`);

    return successResponse(request.id, {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { name: this.name, version: this.version },
    });
  }

  /** Handle a tools/call request */
  private async handleToolCall(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const name = request.params?.name;
    if (typeof name !== 'string') {
      return errorResponse(request.id, ErrorCodes.INVALID_PARAMS, 'Missing tool name');
    }

    try {
      const result = await this.registry.call(name, request.params?.arguments, this.context);
      if (!result.success) {
        return successResponse(request.id, {
          content: [{ type: 'text', text: result.error }],
          isError: true,
        });
      }
      return successResponse(request.id, {
        content: [{ type: 'text', text: renderToolText(result.data) }],
      });
    } catch (err) {
      if (err instanceof MCPError) {
        return errorResponse(request.id, err.code, err.message);
      }
      this.logger.error({ tool: name, error: describeError(err) }, 'Tool crashed');
      return errorResponse(
        request.id,
        ErrorCodes.INTERNAL_ERROR,
        `Internal error: ${describeError(err)}`,
      );
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
