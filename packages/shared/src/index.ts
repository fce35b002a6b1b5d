export type {
  JsonObject,
  JsonRpcId,
  JsonRpcErrorObject,
  RequestMessage,
  NotificationMessage,
  ResponseMessage,
  Message,
  ToolDescriptor,
  ToolContent,
  ToolCallResult,
  ServerInfo,
  DiscoveryMethod,
  DiscoveryResult,
  ServerTransport,
  ProbeBackend,
  ProbeTarget,
} from './types.js';

export type {
  ProbeErrorCategory,
  ProvisionFailureReason,
} from './errors.js';

export {
  ProbeError,
  ConnectionError,
  HandshakeError,
  ProtocolError,
  TimeoutError,
  ResourceProvisionError,
  CleanupError,
  toError,
} from './errors.js';

export { encodeMessage, decodeMessage, isJsonObject } from './jsonrpc.js';
export { LineReader } from './line-reader.js';
