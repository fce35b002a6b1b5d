/**
 * Shared types for toolscout packages.
 *
 * JSON-RPC messages are modelled as a tagged union so the variant in hand
 * is always explicit: requests carry an id, notifications never do, and
 * responses carry either a result or an error.
 */

// ---------------------------------------------------------------------------
// JSON-RPC messages
// ---------------------------------------------------------------------------

export type JsonObject = Record<string, unknown>;

export type JsonRpcId = number | string;

export interface RequestMessage {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: JsonObject;
}

export interface NotificationMessage {
  kind: 'notification';
  method: string;
  params?: JsonObject;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type ResponseMessage =
  | { kind: 'response'; id: JsonRpcId | null; result: unknown }
  | { kind: 'response'; id: JsonRpcId | null; error: JsonRpcErrorObject };

export type Message = RequestMessage | NotificationMessage | ResponseMessage;

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** A tool advertised by an MCP server in its tools/list result. */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonObject;
}

export interface ToolContent {
  type: string;
  text?: string;
  data?: string;
  mimeType?: string;
  [key: string]: unknown;
}

/** Normalized tools/call result. */
export interface ToolCallResult {
  content: ToolContent[];
  isError: boolean;
}

export interface ServerInfo {
  name: string;
  version?: string;
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/** Which path produced a discovery result. */
export type DiscoveryMethod =
  | 'stdio'
  | 'http'
  | 'docker-stdio'
  | 'docker-http'
  | 'kubernetes-http';

export interface DiscoveryResult {
  tools: ToolDescriptor[];
  discoveryMethod: DiscoveryMethod;
  serverInfo?: ServerInfo;
  /** ISO-8601 time the result was produced. */
  timestamp?: string;
}

/** How the target server speaks MCP. */
export type ServerTransport = 'stdio' | 'http';

export type ProbeBackend = 'docker' | 'kubernetes';

export type ProbeTarget =
  | {
      kind: 'command';
      command: string[];
      args?: string[];
      env?: Record<string, string>;
      workingDir?: string;
      timeoutMs?: number;
    }
  | {
      kind: 'image';
      backend: ProbeBackend;
      image: string;
      serverArgs?: string[];
      envVars?: Record<string, string>;
      transport?: ServerTransport;
      timeoutMs?: number;
    };
