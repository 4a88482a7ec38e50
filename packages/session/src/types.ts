import type { ResourcePathIds, ResourceValue } from '@ledbridge/types';
import type { IpcOperation, ObjectDefinition } from '@ledbridge/protocol';

// ═══════════════════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════════════════

export interface SessionEndpoint {
  address: string;
  port: number;
}

/**
 * Request/response channel to one daemon.
 * Rejects with a SessionError on timeout, transport failure or a daemon error.
 */
export interface SessionTransport {
  open(): Promise<void>;
  request(type: IpcOperation, payload: unknown, timeoutMs: number): Promise<unknown>;
  close(): void;
}

// ═══════════════════════════════════════════════════════════════════════════
// SESSIONS
// ═══════════════════════════════════════════════════════════════════════════

export type SessionState = 'created' | 'connected' | 'disconnected' | 'freed';

export type WriteMode = 'update' | 'replace';

/**
 * Lifecycle: create → connect → (define)* → (read|write)* → disconnect → free.
 * A freed session rejects every call.
 */
export interface ResourceSession {
  readonly endpoint: SessionEndpoint;
  getState(): SessionState;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  free(): void;
  isObjectDefined(objectId: number): Promise<boolean>;
  getObjectDefinition(objectId: number): Promise<ObjectDefinition | undefined>;
  /** Submit several definitions as one batch */
  defineObjects(definitions: ObjectDefinition[]): Promise<void>;
}

export interface GetResponse {
  containsPath(path: string): boolean;
  valueOf(path: string): ResourceValue | undefined;
}

export interface SetOptions {
  /** Instance path to create before the value is set */
  createInstance?: string;
}

/**
 * Session with the client daemon colocated with the bridge.
 */
export interface LocalSession extends ResourceSession {
  get(paths: string | string[]): Promise<GetResponse>;
  set(path: string, value: ResourceValue, options?: SetOptions): Promise<void>;
}

/**
 * Session with the server daemon the constrained devices register with.
 */
export interface RemoteSession extends ResourceSession {
  /** Resolves undefined when the client holds no value for the path */
  read(clientId: string, path: string): Promise<ResourceValue | undefined>;
  write(clientId: string, path: string, value: ResourceValue, mode?: WriteMode): Promise<void>;
  listClients(): Promise<string[]>;
  pathToIds(path: string): ResourcePathIds;
}

export interface SessionOptions {
  endpoint: SessionEndpoint;
  operationTimeoutMs?: number;
}
