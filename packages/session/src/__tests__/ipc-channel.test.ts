import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import type { Socket } from 'dgram';
import { IpcCodec } from '@ledbridge/protocol';
import type { IpcEnvelope } from '@ledbridge/protocol';
import { IpcChannel, SessionError } from '../index.js';

vi.mock('dgram', () => ({
  createSocket: vi.fn(),
}));

import { createSocket } from 'dgram';

const quietLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

const ENDPOINT = { address: '127.0.0.1', port: 54321 };

function createMockSocket() {
  const emitter = new EventEmitter();
  return Object.assign(emitter, {
    send: vi.fn(
      (_datagram: Buffer, _port: number, _address: string, callback?: (error: Error | null) => void) => {
        callback?.(null);
      },
    ),
    close: vi.fn(),
  });
}

describe('IpcChannel', () => {
  const codec = new IpcCodec();
  let socket: ReturnType<typeof createMockSocket>;
  let channel: IpcChannel;

  function sentEnvelope(index = 0): IpcEnvelope {
    return codec.decode(socket.send.mock.calls[index][0]);
  }

  function reply(envelope: IpcEnvelope, port = ENDPOINT.port): void {
    socket.emit('message', codec.encode(envelope), { address: ENDPOINT.address, port, family: 'IPv4', size: 0 });
  }

  beforeEach(async () => {
    socket = createMockSocket();
    vi.mocked(createSocket).mockReturnValue(socket as unknown as Socket);
    channel = new IpcChannel(ENDPOINT, codec, quietLogger);
    await channel.open();
  });

  afterEach(() => {
    channel.close();
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it('sends one request envelope to the daemon endpoint', async () => {
    const pending = channel.request('server:read', { clientId: 'LedDevice', path: '/3311/0/5850' }, 5000);

    expect(socket.send).toHaveBeenCalledTimes(1);
    expect(socket.send.mock.calls[0][1]).toBe(54321);
    expect(socket.send.mock.calls[0][2]).toBe('127.0.0.1');
    expect(sentEnvelope()).toEqual({
      kind: 'request',
      id: 1,
      type: 'server:read',
      payload: { clientId: 'LedDevice', path: '/3311/0/5850' },
    });

    reply({ kind: 'response', id: 1, type: 'server:read', payload: { value: true } });
    await expect(pending).resolves.toEqual({ value: true });
    expect(channel.getPendingCount()).toBe(0);
  });

  it('correlates responses by id', async () => {
    const first = channel.request('client:get', { paths: ['/3200/0/5501'] }, 5000);
    const second = channel.request('server:list-clients', {}, 5000);

    expect(sentEnvelope(1).id).toBe(2);
    reply({ kind: 'response', id: 2, type: 'server:list-clients', payload: { clients: ['LedDevice'] } });
    reply({ kind: 'response', id: 1, type: 'client:get', payload: { entries: [] } });

    await expect(second).resolves.toEqual({ clients: ['LedDevice'] });
    await expect(first).resolves.toEqual({ entries: [] });
  });

  it('rejects with the daemon error code', async () => {
    const pending = channel.request('define', { definitions: [] }, 5000);
    reply({
      kind: 'response',
      id: 1,
      type: 'define',
      error: { code: 'rejected', message: 'Object 3200 already defined' },
    });

    await expect(pending).rejects.toMatchObject({ code: 'rejected', message: 'Object 3200 already defined' });
  });

  it('maps unknown daemon error codes to rejected', async () => {
    const pending = channel.request('client:set', {}, 5000);
    reply({ kind: 'response', id: 1, type: 'client:set', error: { code: 'EBADTHING', message: 'nope' } });

    await expect(pending).rejects.toMatchObject({ code: 'rejected' });
  });

  it('times out when no response arrives', async () => {
    vi.useFakeTimers();
    const pending = channel.request('server:read', {}, 5000);
    const assertion = expect(pending).rejects.toMatchObject({
      code: 'timeout',
      message: 'server:read timed out after 5000ms',
    });

    vi.advanceTimersByTime(5000);
    await assertion;
    expect(channel.getPendingCount()).toBe(0);
  });

  it('ignores datagrams from other ports', async () => {
    vi.useFakeTimers();
    const pending = channel.request('server:read', {}, 1000);
    const assertion = expect(pending).rejects.toMatchObject({ code: 'timeout' });

    reply({ kind: 'response', id: 1, type: 'server:read', payload: { value: 1 } }, 40000);
    expect(channel.getPendingCount()).toBe(1);

    vi.advanceTimersByTime(1000);
    await assertion;
  });

  it('ignores undecodable datagrams', () => {
    socket.emit('message', Buffer.from([0, 0]), { address: ENDPOINT.address, port: ENDPOINT.port, family: 'IPv4', size: 2 });
    expect(quietLogger.warn).toHaveBeenCalledWith('Failed to decode datagram:', 'Datagram too short: 2 bytes');
  });

  it('rejects with transport when the send fails', async () => {
    socket.send.mockImplementationOnce((_datagram, _port, _address, callback) => {
      callback?.(new Error('EPERM'));
    });

    await expect(channel.request('server:read', {}, 5000)).rejects.toMatchObject({
      code: 'transport',
      message: 'EPERM',
    });
  });

  it('rejects pending requests when closed', async () => {
    const pending = channel.request('server:read', {}, 5000);
    channel.close();

    await expect(pending).rejects.toBeInstanceOf(SessionError);
    await expect(pending).rejects.toMatchObject({ code: 'not-connected' });
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(channel.isOpen()).toBe(false);
  });

  it('rejects requests before open', async () => {
    const closed = new IpcChannel(ENDPOINT, codec, quietLogger);
    await expect(closed.request('server:read', {}, 5000)).rejects.toMatchObject({ code: 'not-connected' });
  });

  it('rejects pending requests on socket error', async () => {
    const pending = channel.request('server:read', {}, 5000);
    socket.emit('error', new Error('ECONNREFUSED'));

    await expect(pending).rejects.toMatchObject({ code: 'transport', message: 'ECONNREFUSED' });
  });
});
