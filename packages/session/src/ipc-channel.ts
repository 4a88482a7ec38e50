/**
 * IpcChannel - Datagram request/response channel to a device-management daemon
 *
 * Each request is one datagram carrying an IpcEnvelope; the daemon answers
 * with a response envelope bearing the same id. Requests that get no answer
 * within their timeout are rejected.
 */

import { createSocket, type RemoteInfo, type Socket } from 'dgram';
import { createLogger } from '@ledbridge/types';
import type { Logger } from '@ledbridge/types';
import { IpcCodec } from '@ledbridge/protocol';
import type { IpcEnvelope, IpcOperation } from '@ledbridge/protocol';
import { SessionError, toSessionErrorCode } from './errors.js';
import type { SessionEndpoint, SessionTransport } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

interface PendingRequest {
  type: IpcOperation;
  resolve: (payload: unknown) => void;
  reject: (error: SessionError) => void;
  timer: ReturnType<typeof setTimeout>;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class IpcChannel implements SessionTransport {
  private readonly endpoint: SessionEndpoint;
  private readonly codec: IpcCodec;
  private readonly log: Logger;
  private socket: Socket | null = null;
  private nextId = 1;
  private pending = new Map<number, PendingRequest>();

  constructor(endpoint: SessionEndpoint, codec?: IpcCodec, logger?: Logger) {
    this.endpoint = endpoint;
    this.codec = codec ?? new IpcCodec();
    this.log = logger ?? createLogger('IpcChannel');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  async open(): Promise<void> {
    if (this.socket) return;

    const socket = createSocket('udp4');
    socket.on('message', (datagram: Buffer, rinfo: RemoteInfo) => {
      this.handleDatagram(datagram, rinfo);
    });
    socket.on('error', (error: Error) => {
      this.log.error(`Socket error on ${this.describeEndpoint()}:`, error.message);
      this.rejectAll(new SessionError('transport', error.message));
    });
    this.socket = socket;
  }

  close(): void {
    if (!this.socket) return;

    this.rejectAll(new SessionError('not-connected', 'Channel closed'));
    const socket = this.socket;
    this.socket = null;
    socket.removeAllListeners();
    socket.close();
  }

  isOpen(): boolean {
    return this.socket !== null;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REQUESTS
  // ─────────────────────────────────────────────────────────────────────────

  request(type: IpcOperation, payload: unknown, timeoutMs: number): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new SessionError('not-connected', `Channel to ${this.describeEndpoint()} is not open`));
    }

    const id = this.nextId++;
    const envelope: IpcEnvelope = { kind: 'request', id, type, payload };

    let datagram: Buffer;
    try {
      datagram = this.codec.encode(envelope);
    } catch (error) {
      return Promise.reject(
        new SessionError('transport', error instanceof Error ? error.message : String(error)),
      );
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new SessionError('timeout', `${type} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(id, { type, resolve, reject, timer });

      socket.send(datagram, this.endpoint.port, this.endpoint.address, (error) => {
        if (error) {
          this.settle(id)?.reject(new SessionError('transport', error.message));
        }
      });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private handleDatagram(datagram: Buffer, rinfo: RemoteInfo): void {
    if (rinfo.port !== this.endpoint.port) {
      this.log.debug(`Ignoring datagram from ${rinfo.address}:${rinfo.port}`);
      return;
    }

    let envelope: IpcEnvelope;
    try {
      envelope = this.codec.decode(datagram);
    } catch (error) {
      this.log.warn('Failed to decode datagram:', error instanceof Error ? error.message : error);
      return;
    }

    if (envelope.kind !== 'response') {
      this.log.warn(`Unexpected ${envelope.kind} envelope: ${envelope.type}`);
      return;
    }

    const request = this.settle(envelope.id);
    if (!request) {
      this.log.debug(`Late or unknown response ${envelope.id} (${envelope.type})`);
      return;
    }

    if (envelope.error) {
      request.reject(new SessionError(toSessionErrorCode(envelope.error.code), envelope.error.message));
    } else {
      request.resolve(envelope.payload);
    }
  }

  private settle(id: number): PendingRequest | undefined {
    const request = this.pending.get(id);
    if (request) {
      clearTimeout(request.timer);
      this.pending.delete(id);
    }
    return request;
  }

  private rejectAll(error: SessionError): void {
    for (const id of Array.from(this.pending.keys())) {
      this.settle(id)?.reject(error);
    }
  }

  private describeEndpoint(): string {
    return `${this.endpoint.address}:${this.endpoint.port}`;
  }
}
