/**
 * JSON-RPC 2.0 Transport Utilities — TypeScript
 *
 * Message shapes and builders shared by the dispatcher and transports.
 * Tool implementations never import this directly.
 */

// ─── JSON-RPC Types ─────────────────────────────────────────────────────────

export type JsonRpcId = string | number;

export interface JsonRpcMessage {
  jsonrpc: '2.0';
}

export interface JsonRpcRequest extends JsonRpcMessage {
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification extends JsonRpcMessage {
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse extends JsonRpcMessage {
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse extends JsonRpcMessage {
  /** null when the request id could not be determined (parse errors) */
  id: JsonRpcId | null;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Create a success response */
export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

/** Create an error response */
export function errorResponse(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcErrorResponse {
  const error: JsonRpcErrorResponse['error'] = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', id, error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasValidParams(obj: Record<string, unknown>): boolean {
  return obj.params === undefined || isRecord(obj.params);
}

/** Validate that a parsed message is a valid JSON-RPC request */
export function isValidRequest(msg: unknown): msg is JsonRpcRequest {
  if (!isRecord(msg)) return false;
  return (
    msg.jsonrpc === '2.0' &&
    typeof msg.method === 'string' &&
    (typeof msg.id === 'string' || typeof msg.id === 'number') &&
    hasValidParams(msg)
  );
}

/** A notification is a request without an id; it never gets a response */
export function isNotification(msg: unknown): msg is JsonRpcNotification {
  if (!isRecord(msg)) return false;
  return (
    msg.jsonrpc === '2.0' &&
    typeof msg.method === 'string' &&
    !('id' in msg) &&
    hasValidParams(msg)
  );
}

/** Best-effort id recovery for error responses to malformed requests */
export function extractId(msg: unknown): JsonRpcId | null {
  if (!isRecord(msg)) return null;
  return typeof msg.id === 'string' || typeof msg.id === 'number' ? msg.id : null;
}
