/**
 * In-process stand-ins for the client and server daemons.
 *
 * They speak the same operations as the real daemons, so ClientSession and
 * ServerSession run unchanged on top of them. Used by the test suites.
 */

import { parsePath } from '@ledbridge/types';
import type { ResourcePathIds, ResourceType, ResourceValue } from '@ledbridge/types';
import {
  IPC_OPERATIONS,
  ClientGetRequestSchema,
  ClientSetRequestSchema,
  DefineRequestSchema,
  ServerReadRequestSchema,
  ServerWriteRequestSchema,
} from '@ledbridge/protocol';
import type {
  ClientGetResponse,
  ConnectResponse,
  IpcOperation,
  ListClientsResponse,
  ObjectDefinition,
  ServerReadResponse,
} from '@ledbridge/protocol';
import type { z } from 'zod';
import { SessionError } from './errors.js';
import type { SessionErrorCode } from './errors.js';
import { ClientSession, ServerSession } from './session.js';
import type { SessionEndpoint, SessionTransport } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RecordedRequest {
  type: IpcOperation;
  payload: unknown;
}

export interface FailureOptions {
  code?: SessionErrorCode;
  message?: string;
  /** How many calls fail before the operation recovers (default 1) */
  times?: number;
}

interface InjectedFailure {
  code: SessionErrorCode;
  message: string;
  remaining: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE DAEMON
// ═══════════════════════════════════════════════════════════════════════════

abstract class MemoryDaemon {
  readonly endpoint: SessionEndpoint;
  readonly requests: RecordedRequest[] = [];
  protected readonly definitions = new Map<number, ObjectDefinition>();
  private readonly failures = new Map<IpcOperation, InjectedFailure>();
  private offline = false;
  private openTransports = 0;
  private transportsCreated = 0;

  constructor(endpoint: SessionEndpoint) {
    this.endpoint = endpoint;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // TEST CONTROLS
  // ─────────────────────────────────────────────────────────────────────────

  /** While offline every open and request times out */
  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  injectFailure(type: IpcOperation, options?: FailureOptions): void {
    this.failures.set(type, {
      code: options?.code ?? 'rejected',
      message: options?.message ?? `Injected ${type} failure`,
      remaining: options?.times ?? 1,
    });
  }

  defineDirectly(definition: ObjectDefinition): void {
    this.definitions.set(definition.id, definition);
  }

  getDefinitions(): ObjectDefinition[] {
    return Array.from(this.definitions.values());
  }

  countRequests(type: IpcOperation): number {
    return this.requests.filter((r) => r.type === type).length;
  }

  getOpenTransportCount(): number {
    return this.openTransports;
  }

  getTransportsCreated(): number {
    return this.transportsCreated;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // TRANSPORT
  // ─────────────────────────────────────────────────────────────────────────

  createTransport(): SessionTransport {
    let open = false;
    this.transportsCreated++;

    return {
      open: async () => {
        if (this.offline) {
          throw new SessionError('timeout', `Daemon ${this.describe()} unreachable`);
        }
        if (!open) {
          open = true;
          this.openTransports++;
        }
      },
      request: async (type, payload, timeoutMs) => {
        if (!open) {
          throw new SessionError('not-connected', 'Channel is not open');
        }
        return this.dispatch(type, payload, timeoutMs);
      },
      close: () => {
        if (open) {
          open = false;
          this.openTransports--;
        }
      },
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // DISPATCH
  // ─────────────────────────────────────────────────────────────────────────

  private dispatch(type: IpcOperation, payload: unknown, timeoutMs: number): unknown {
    this.requests.push({ type, payload: structuredClone(payload) });

    if (this.offline) {
      throw new SessionError('timeout', `${type} timed out after ${timeoutMs}ms`);
    }

    const failure = this.failures.get(type);
    if (failure && failure.remaining > 0) {
      failure.remaining--;
      if (failure.remaining === 0) {
        this.failures.delete(type);
      }
      throw new SessionError(failure.code, failure.message);
    }

    switch (type) {
      case IPC_OPERATIONS.CONNECT: {
        const response: ConnectResponse = { definitions: structuredClone(this.getDefinitions()) };
        return response;
      }
      case IPC_OPERATIONS.DISCONNECT:
        return {};
      case IPC_OPERATIONS.DEFINE: {
        const request = parseRequest(DefineRequestSchema, type, payload);
        for (const definition of request.definitions) {
          if (this.definitions.has(definition.id)) {
            throw new SessionError('rejected', `Object ${definition.id} already defined`);
          }
        }
        for (const definition of request.definitions) {
          this.definitions.set(definition.id, definition);
        }
        return {};
      }
      default:
        return this.handleOperation(type, payload);
    }
  }

  protected abstract handleOperation(type: IpcOperation, payload: unknown): unknown;

  protected requireResourceType(ids: ResourcePathIds, path: string): ResourceType {
    const definition = this.definitions.get(ids.objectId);
    const resource = definition?.resources.find((r) => r.id === ids.resourceId);
    if (ids.resourceId === undefined || !resource) {
      throw new SessionError('rejected', `Resource ${path} is not defined`);
    }
    return resource.type;
  }

  private describe(): string {
    return `${this.endpoint.address}:${this.endpoint.port}`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT DAEMON
// ═══════════════════════════════════════════════════════════════════════════

export class MemoryClientDaemon extends MemoryDaemon {
  private readonly instances = new Set<string>();
  private readonly values = new Map<string, ResourceValue>();

  createSession(operationTimeoutMs?: number): ClientSession {
    return new ClientSession(this.createTransport(), { endpoint: this.endpoint, operationTimeoutMs });
  }

  createInstance(path: string): void {
    this.instances.add(path);
  }

  hasInstance(path: string): boolean {
    return this.instances.has(path);
  }

  getValue(path: string): ResourceValue | undefined {
    return this.values.get(path);
  }

  protected handleOperation(type: IpcOperation, payload: unknown): unknown {
    switch (type) {
      case IPC_OPERATIONS.CLIENT_GET: {
        const request = parseRequest(ClientGetRequestSchema, type, payload);
        const response: ClientGetResponse = { entries: [] };
        for (const path of request.paths) {
          if (this.instances.has(path)) {
            response.entries.push({ path });
          } else if (this.values.has(path)) {
            response.entries.push({ path, value: this.values.get(path) });
          }
        }
        return response;
      }
      case IPC_OPERATIONS.CLIENT_SET: {
        const request = parseRequest(ClientSetRequestSchema, type, payload);
        const ids = requireIds(request.path);

        if (request.createInstance) {
          if (!this.definitions.has(ids.objectId)) {
            throw new SessionError('rejected', `Object ${ids.objectId} is not defined`);
          }
          if (this.instances.has(request.createInstance)) {
            throw new SessionError('rejected', `Instance ${request.createInstance} already exists`);
          }
          this.instances.add(request.createInstance);
        }

        const instancePath = `/${ids.objectId}/${ids.instanceId ?? 0}`;
        if (!this.instances.has(instancePath)) {
          throw new SessionError('rejected', `Instance ${instancePath} does not exist`);
        }
        assertValueType(this.requireResourceType(ids, request.path), request.value, request.path);
        this.values.set(request.path, request.value);
        return {};
      }
      default:
        throw new SessionError('rejected', `Unsupported operation on client daemon: ${type}`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVER DAEMON
// ═══════════════════════════════════════════════════════════════════════════

export class MemoryServerDaemon extends MemoryDaemon {
  private readonly clients = new Map<string, Map<string, ResourceValue>>();

  createSession(operationTimeoutMs?: number): ServerSession {
    return new ServerSession(this.createTransport(), { endpoint: this.endpoint, operationTimeoutMs });
  }

  registerClient(clientId: string): void {
    if (!this.clients.has(clientId)) {
      this.clients.set(clientId, new Map());
    }
  }

  deregisterClient(clientId: string): void {
    this.clients.delete(clientId);
  }

  setClientValue(clientId: string, path: string, value: ResourceValue): void {
    this.registerClient(clientId);
    this.clients.get(clientId)?.set(path, value);
  }

  getClientValue(clientId: string, path: string): ResourceValue | undefined {
    return this.clients.get(clientId)?.get(path);
  }

  protected handleOperation(type: IpcOperation, payload: unknown): unknown {
    switch (type) {
      case IPC_OPERATIONS.SERVER_READ: {
        const request = parseRequest(ServerReadRequestSchema, type, payload);
        const values = this.requireClient(request.clientId);
        const response: ServerReadResponse = { value: values.get(request.path) ?? null };
        return response;
      }
      case IPC_OPERATIONS.SERVER_WRITE: {
        const request = parseRequest(ServerWriteRequestSchema, type, payload);
        const values = this.requireClient(request.clientId);
        const ids = requireIds(request.path);
        assertValueType(this.requireResourceType(ids, request.path), request.value, request.path);
        values.set(request.path, request.value);
        return {};
      }
      case IPC_OPERATIONS.SERVER_LIST_CLIENTS: {
        const response: ListClientsResponse = { clients: Array.from(this.clients.keys()) };
        return response;
      }
      default:
        throw new SessionError('rejected', `Unsupported operation on server daemon: ${type}`);
    }
  }

  private requireClient(clientId: string): Map<string, ResourceValue> {
    const values = this.clients.get(clientId);
    if (!values) {
      throw new SessionError('rejected', `Client ${clientId} is not registered`);
    }
    return values;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function parseRequest<S extends z.ZodTypeAny>(schema: S, type: IpcOperation, payload: unknown): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new SessionError('rejected', `Malformed ${type} request: ${result.error.message}`);
  }
  return result.data;
}

function requireIds(path: string): ResourcePathIds {
  const ids = parsePath(path);
  if (!ids) {
    throw new SessionError('invalid-path', `Invalid path: ${path}`);
  }
  return ids;
}

function assertValueType(type: ResourceType, value: ResourceValue, path: string): void {
  const matches = type === 'boolean' ? typeof value === 'boolean' : Number.isInteger(value);
  if (!matches) {
    throw new SessionError('rejected', `Value ${String(value)} does not match ${type} resource ${path}`);
  }
}
