/**
 * ClientSession / ServerSession - Resource sessions over a SessionTransport
 *
 * The transport decides where requests go (a daemon over UDP, or an
 * in-process stand-in); the sessions own lifecycle, definition caching and
 * response validation.
 */

import { parsePath } from '@ledbridge/types';
import type { ResourcePathIds, ResourceValue } from '@ledbridge/types';
import {
  IPC_OPERATIONS,
  ClientGetResponseSchema,
  ConnectResponseSchema,
  ListClientsResponseSchema,
  ServerReadResponseSchema,
} from '@ledbridge/protocol';
import type {
  ClientGetRequest,
  ClientSetRequest,
  DefineRequest,
  IpcOperation,
  ObjectDefinition,
  ServerReadRequest,
  ServerWriteRequest,
} from '@ledbridge/protocol';
import type { z } from 'zod';
import { SessionError } from './errors.js';
import type {
  GetResponse,
  LocalSession,
  RemoteSession,
  ResourceSession,
  SessionEndpoint,
  SessionOptions,
  SessionState,
  SessionTransport,
  SetOptions,
  WriteMode,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_OPERATION_TIMEOUT_MS = 5000;

// ═══════════════════════════════════════════════════════════════════════════
// BASE
// ═══════════════════════════════════════════════════════════════════════════

abstract class BaseSession implements ResourceSession {
  readonly endpoint: SessionEndpoint;
  protected readonly transport: SessionTransport;
  protected readonly operationTimeoutMs: number;
  private state: SessionState = 'created';
  private definitions = new Map<number, ObjectDefinition>();

  constructor(transport: SessionTransport, options: SessionOptions) {
    this.transport = transport;
    this.endpoint = options.endpoint;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
  }

  getState(): SessionState {
    return this.state;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    this.assertNotFreed();
    if (this.state === 'connected') return;

    await this.transport.open();
    const response = await this.call(IPC_OPERATIONS.CONNECT, {}, ConnectResponseSchema);

    this.definitions = new Map(response.definitions.map((d) => [d.id, d]));
    this.state = 'connected';
  }

  async disconnect(): Promise<void> {
    this.assertConnected();
    try {
      await this.transport.request(IPC_OPERATIONS.DISCONNECT, {}, this.operationTimeoutMs);
    } finally {
      this.transport.close();
      this.state = 'disconnected';
    }
  }

  free(): void {
    if (this.state === 'freed') return;
    this.transport.close();
    this.definitions.clear();
    this.state = 'freed';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // DEFINITIONS
  // ─────────────────────────────────────────────────────────────────────────

  async isObjectDefined(objectId: number): Promise<boolean> {
    this.assertConnected();
    return this.definitions.has(objectId);
  }

  async getObjectDefinition(objectId: number): Promise<ObjectDefinition | undefined> {
    this.assertConnected();
    return this.definitions.get(objectId);
  }

  async defineObjects(definitions: ObjectDefinition[]): Promise<void> {
    this.assertConnected();
    if (definitions.length === 0) {
      throw new SessionError('rejected', 'Define batch is empty');
    }

    const request: DefineRequest = { definitions };
    await this.transport.request(IPC_OPERATIONS.DEFINE, request, this.operationTimeoutMs);

    for (const definition of definitions) {
      this.definitions.set(definition.id, definition);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PROTECTED
  // ─────────────────────────────────────────────────────────────────────────

  protected async call<S extends z.ZodTypeAny>(
    type: IpcOperation,
    payload: unknown,
    schema: S,
  ): Promise<z.infer<S>> {
    const response = await this.transport.request(type, payload, this.operationTimeoutMs);
    const result = schema.safeParse(response);
    if (!result.success) {
      throw new SessionError('transport', `Invalid ${type} response: ${result.error.message}`);
    }
    return result.data;
  }

  protected assertConnected(): void {
    this.assertNotFreed();
    if (this.state !== 'connected') {
      throw new SessionError('not-connected', `Session ${this.describe()} is ${this.state}`);
    }
  }

  protected requirePath(path: string): ResourcePathIds {
    const ids = parsePath(path);
    if (!ids) {
      throw new SessionError('invalid-path', `Invalid path: ${path}`);
    }
    return ids;
  }

  private assertNotFreed(): void {
    if (this.state === 'freed') {
      throw new SessionError('freed', `Session ${this.describe()} used after free`);
    }
  }

  private describe(): string {
    return `${this.endpoint.address}:${this.endpoint.port}`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT SESSION (local)
// ═══════════════════════════════════════════════════════════════════════════

export class ClientSession extends BaseSession implements LocalSession {
  async get(paths: string | string[]): Promise<GetResponse> {
    this.assertConnected();
    const list = Array.isArray(paths) ? paths : [paths];
    list.forEach((path) => this.requirePath(path));

    const request: ClientGetRequest = { paths: list };
    const response = await this.call(IPC_OPERATIONS.CLIENT_GET, request, ClientGetResponseSchema);

    const entries = new Map(response.entries.map((e) => [e.path, e.value]));
    return {
      containsPath: (path) => entries.has(path),
      valueOf: (path) => entries.get(path),
    };
  }

  async set(path: string, value: ResourceValue, options?: SetOptions): Promise<void> {
    this.assertConnected();
    this.requirePath(path);

    const request: ClientSetRequest = { path, value, createInstance: options?.createInstance };
    await this.transport.request(IPC_OPERATIONS.CLIENT_SET, request, this.operationTimeoutMs);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVER SESSION (remote)
// ═══════════════════════════════════════════════════════════════════════════

export class ServerSession extends BaseSession implements RemoteSession {
  async read(clientId: string, path: string): Promise<ResourceValue | undefined> {
    this.assertConnected();
    this.requirePath(path);

    const request: ServerReadRequest = { clientId, path };
    const response = await this.call(IPC_OPERATIONS.SERVER_READ, request, ServerReadResponseSchema);
    return response.value ?? undefined;
  }

  async write(
    clientId: string,
    path: string,
    value: ResourceValue,
    mode: WriteMode = 'update',
  ): Promise<void> {
    this.assertConnected();
    this.requirePath(path);

    const request: ServerWriteRequest = { clientId, path, value, mode };
    await this.transport.request(IPC_OPERATIONS.SERVER_WRITE, request, this.operationTimeoutMs);
  }

  async listClients(): Promise<string[]> {
    this.assertConnected();
    const response = await this.call(IPC_OPERATIONS.SERVER_LIST_CLIENTS, {}, ListClientsResponseSchema);
    return response.clients;
  }

  pathToIds(path: string): ResourcePathIds {
    this.assertConnected();
    return this.requirePath(path);
  }
}
