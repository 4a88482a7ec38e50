import { vi } from 'vitest';
import type { RegistrationCollaborator } from '@ledbridge/cloud';
import type { ObjectDefinition } from '@ledbridge/protocol';
import { MemoryClientDaemon, MemoryServerDaemon } from '@ledbridge/session';
import type { Clock } from '@ledbridge/types';
import type { HeartbeatIndicator } from '../heartbeat.js';
import { DEFAULT_RESOURCE_SCHEMA } from '../schema.js';
import { buildObjectDefinition } from '../schema-definer.js';
import type { SessionFactory } from '../sessions.js';

export const quietLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

export const START = new Date(Date.UTC(2024, 0, 1, 0, 0, 0));

export interface FakeClock extends Clock {
  /** Every requested delay, in order */
  readonly sleeps: number[];
}

/**
 * Clock whose sleeps return at once and advance `now` by the delay.
 * `onSleep` runs after each sleep is recorded, before the signal is checked.
 */
export function createFakeClock(onSleep?: (count: number, ms: number) => void | Promise<void>): FakeClock {
  const sleeps: number[] = [];
  let now = START.getTime();
  return {
    sleeps,
    now: () => new Date(now),
    sleep: async (ms, signal) => {
      signal?.throwIfAborted();
      sleeps.push(ms);
      now += ms;
      await onSleep?.(sleeps.length, ms);
      signal?.throwIfAborted();
    },
  };
}

export class RecordingHeartbeat implements HeartbeatIndicator {
  readonly states: boolean[] = [];

  async set(on: boolean): Promise<void> {
    this.states.push(on);
  }
}

export class FakeRegistrar implements RegistrationCollaborator {
  readonly notifications: string[] = [];
  registerCalls = 0;
  notifyResult = true;
  /** When set, notify() settles only once its signal aborts */
  notifyHangs = false;
  private loggedIn = false;

  /** Outcome of each register() call in turn; true once exhausted */
  constructor(private readonly registerResults: boolean[] = []) {}

  async register(): Promise<boolean> {
    this.registerCalls++;
    this.loggedIn = this.registerResults.shift() ?? true;
    return this.loggedIn;
  }

  isLoggedIn(): boolean {
    return this.loggedIn;
  }

  async notify(text: string, signal?: AbortSignal): Promise<boolean> {
    this.notifications.push(text);
    if (this.notifyHangs) {
      await new Promise<never>((_, reject) => {
        if (signal?.aborted) reject(signal.reason);
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    }
    return this.notifyResult;
  }
}

export function schemaDefinitions(): ObjectDefinition[] {
  return DEFAULT_RESOURCE_SCHEMA.map((object) => {
    const definition = buildObjectDefinition(object, quietLogger);
    if (!definition.ok) throw definition.error;
    return definition.value;
  });
}

export function createDaemons(): { client: MemoryClientDaemon; server: MemoryServerDaemon } {
  return {
    client: new MemoryClientDaemon({ address: '127.0.0.1', port: 12345 }),
    server: new MemoryServerDaemon({ address: '127.0.0.1', port: 54321 }),
  };
}

export function memorySessionFactory(client: MemoryClientDaemon, server: MemoryServerDaemon): SessionFactory {
  return {
    createLocal: () => client.createSession(),
    createRemote: () => server.createSession(),
  };
}
