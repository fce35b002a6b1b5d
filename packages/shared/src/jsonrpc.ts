/**
 * Newline-delimited JSON-RPC 2.0 codec.
 *
 * Every message on the wire is one JSON object on a single line,
 * terminated by "\n". The tagged Message union never leaks the
 * "jsonrpc" field; it is added on encode and checked on decode.
 */

import { ProtocolError } from './errors.js';
import type { JsonObject, JsonRpcErrorObject, JsonRpcId, Message } from './types.js';

const JSONRPC_VERSION = '2.0';
const MAX_LOGGED_LINE = 200;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Serialize a message as a single newline-terminated line. */
export function encodeMessage(message: Message): string {
  return JSON.stringify(toWire(message)) + '\n';
}

function toWire(message: Message): JsonObject {
  switch (message.kind) {
    case 'request':
      return {
        jsonrpc: JSONRPC_VERSION,
        id: message.id,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    case 'notification':
      return {
        jsonrpc: JSONRPC_VERSION,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    case 'response':
      return 'error' in message
        ? { jsonrpc: JSONRPC_VERSION, id: message.id, error: message.error }
        : { jsonrpc: JSONRPC_VERSION, id: message.id, result: message.result };
  }
}

/**
 * Parse one line into a Message.
 * Throws ProtocolError for anything that is not a JSON-RPC 2.0 message.
 */
export function decodeMessage(line: string): Message {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    throw new ProtocolError(`Invalid JSON: ${truncate(line)}`, { cause: err });
  }

  if (!isJsonObject(value)) {
    throw new ProtocolError(`JSON-RPC message must be an object: ${truncate(line)}`);
  }
  if (value['jsonrpc'] !== undefined && value['jsonrpc'] !== JSONRPC_VERSION) {
    throw new ProtocolError(`Unsupported JSON-RPC version: ${String(value['jsonrpc'])}`);
  }

  const id = value['id'];
  const method = value['method'];

  if (typeof method === 'string') {
    const params = isJsonObject(value['params']) ? value['params'] : undefined;
    if (id === undefined) {
      return { kind: 'notification', method, ...(params ? { params } : {}) };
    }
    if (!isJsonRpcId(id)) {
      throw new ProtocolError(`Invalid request id: ${JSON.stringify(id)}`);
    }
    return { kind: 'request', id, method, ...(params ? { params } : {}) };
  }

  const error = value['error'];
  const hasError = error !== undefined && error !== null;
  if (!hasError && !('result' in value)) {
    throw new ProtocolError(`Not a JSON-RPC request, notification or response: ${truncate(line)}`);
  }
  const responseId = id === null || id === undefined ? null : isJsonRpcId(id) ? id : undefined;
  if (responseId === undefined) {
    throw new ProtocolError(`Invalid response id: ${JSON.stringify(id)}`);
  }

  if (hasError) {
    if (!isErrorObject(error)) {
      throw new ProtocolError(`Malformed error object: ${JSON.stringify(error)}`);
    }
    return { kind: 'response', id: responseId, error };
  }
  return { kind: 'response', id: responseId, result: value['result'] };
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'number' || typeof value === 'string';
}

function isErrorObject(value: unknown): value is JsonRpcErrorObject {
  return isJsonObject(value)
    && typeof value['code'] === 'number'
    && typeof value['message'] === 'string';
}

function truncate(line: string): string {
  return line.length > MAX_LOGGED_LINE ? `${line.slice(0, MAX_LOGGED_LINE)}...` : line;
}
