import type { Logger } from '@ledbridge/types';
import { IpcChannel } from './ipc-channel.js';
import { ClientSession, ServerSession } from './session.js';

export { SessionError, toSessionErrorCode } from './errors.js';
export type { SessionErrorCode } from './errors.js';
export { ObjectDefinitionBuilder } from './definition.js';
export type { ObjectDefinitionHeader } from './definition.js';
export { IpcChannel } from './ipc-channel.js';
export { ClientSession, ServerSession, DEFAULT_OPERATION_TIMEOUT_MS } from './session.js';
export { MemoryClientDaemon, MemoryServerDaemon } from './memory.js';
export type { FailureOptions, RecordedRequest } from './memory.js';
export type {
  SessionEndpoint,
  SessionTransport,
  SessionState,
  WriteMode,
  ResourceSession,
  GetResponse,
  SetOptions,
  LocalSession,
  RemoteSession,
  SessionOptions,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════

export interface DaemonSessionOptions {
  address: string;
  port: number;
  operationTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Session with the client daemon, over its datagram IPC port.
 */
export function createClientSession(options: DaemonSessionOptions): ClientSession {
  const endpoint = { address: options.address, port: options.port };
  const channel = new IpcChannel(endpoint, undefined, options.logger);
  return new ClientSession(channel, { endpoint, operationTimeoutMs: options.operationTimeoutMs });
}

/**
 * Session with the server daemon, over its datagram IPC port.
 */
export function createServerSession(options: DaemonSessionOptions): ServerSession {
  const endpoint = { address: options.address, port: options.port };
  const channel = new IpcChannel(endpoint, undefined, options.logger);
  return new ServerSession(channel, { endpoint, operationTimeoutMs: options.operationTimeoutMs });
}
