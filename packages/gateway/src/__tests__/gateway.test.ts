import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MemoryClientDaemon, MemoryServerDaemon } from '@ledbridge/session';
import { ButtonGateway, EXIT_FAILURE, EXIT_STOPPED, createButtonGateway } from '../gateway.js';
import type { GatewayPhase } from '../gateway.js';
import { resolveGatewayConfig } from '../config.js';
import {
  FakeRegistrar,
  RecordingHeartbeat,
  createDaemons,
  createFakeClock,
  memorySessionFactory,
  quietLogger,
} from './fixtures.js';

const COUNTER_PATH = '/3200/0/5501';
const LED_PATH = '/3311/0/5850';

describe('ButtonGateway', () => {
  let client: MemoryClientDaemon;
  let server: MemoryServerDaemon;
  let heartbeat: RecordingHeartbeat;
  let controller: AbortController;

  beforeEach(() => {
    vi.clearAllMocks();
    ({ client, server } = createDaemons());
    client.createInstance('/20001/0');
    server.registerClient('ButtonDevice');
    server.registerClient('LedDevice');
    server.setClientValue('ButtonDevice', COUNTER_PATH, 1);
    heartbeat = new RecordingHeartbeat();
    controller = new AbortController();
  });

  /** Gateway whose clock aborts the run on the given sleep */
  function createGateway(options: {
    abortOnSleep: number;
    registrar?: FakeRegistrar;
    onSleep?: (count: number) => void;
  }) {
    const registrar = options.registrar ?? new FakeRegistrar();
    const clock = createFakeClock((count) => {
      options.onSleep?.(count);
      if (count === options.abortOnSleep) controller.abort();
    });
    const gateway = new ButtonGateway({
      sessions: memorySessionFactory(client, server),
      registrar,
      heartbeat,
      clock,
      logger: quietLogger,
    });
    const phases: GatewayPhase[] = [];
    gateway.on('phaseChanged', (phase) => phases.push(phase));
    return { gateway, registrar, clock, phases };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // HAPPY PATH
  // ─────────────────────────────────────────────────────────────────────────

  describe('startup and polling', () => {
    it('bridges the button to the LED and stops cleanly on abort', async () => {
      const { gateway, registrar, clock, phases } = createGateway({ abortOnSleep: 1 });

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);

      expect(phases).toEqual(['provisioning', 'registering', 'defining', 'awaiting-peers', 'running', 'stopped']);
      expect(clock.sleeps).toEqual([1000]);
      expect(server.getClientValue('LedDevice', LED_PATH)).toBe(true);
      expect(client.getValue(LED_PATH)).toBe(true);
      expect(registrar.notifications).toEqual(['00:00:00 01-01-2024 LED on']);
    });

    it('defines the schema on both daemons', async () => {
      const { gateway } = createGateway({ abortOnSleep: 1 });

      await gateway.run(controller.signal);

      expect(server.getDefinitions().map((d) => d.id)).toEqual([3200, 3311]);
      expect(client.getDefinitions().map((d) => d.id)).toEqual([3200, 3311]);
    });

    it('turns the heartbeat on at start and off at shutdown', async () => {
      const { gateway } = createGateway({ abortOnSleep: 1 });

      await gateway.run(controller.signal);

      expect(heartbeat.states).toEqual([true, false, false]);
    });

    it('releases both sessions on shutdown', async () => {
      const { gateway } = createGateway({ abortOnSleep: 1 });

      await gateway.run(controller.signal);

      expect(client.getOpenTransportCount()).toBe(0);
      expect(server.getOpenTransportCount()).toBe(0);
      expect(client.countRequests('session:disconnect')).toBe(1);
      expect(server.countRequests('session:disconnect')).toBe(1);
    });

    it('forwards propagation events', async () => {
      const { gateway } = createGateway({ abortOnSleep: 1 });
      const propagated = vi.fn();
      gateway.on('propagated', propagated);

      await gateway.run(controller.signal);

      expect(propagated).toHaveBeenCalledWith({
        counter: 1,
        state: true,
        remoteWritten: true,
        localSet: true,
        notified: true,
      });
    });

    it('refuses a second concurrent run', async () => {
      const { gateway } = createGateway({ abortOnSleep: 1 });

      const first = gateway.run(controller.signal);
      await expect(gateway.run(controller.signal)).rejects.toThrow('Gateway already running');
      expect(await first).toBe(EXIT_STOPPED);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // GATES
  // ─────────────────────────────────────────────────────────────────────────

  describe('gates', () => {
    it('waits for provisioning with a fresh client session each time', async () => {
      client = createDaemons().client;
      const { gateway, clock } = createGateway({
        abortOnSleep: 2,
        onSleep: (count) => {
          if (count === 1) client.createInstance('/20001/0');
        },
      });

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);
      expect(clock.sleeps).toEqual([2000, 1000]);
      expect(client.getTransportsCreated()).toBe(2);
    });

    it('waits for every peer before polling', async () => {
      server.deregisterClient('LedDevice');
      const { gateway, clock, phases } = createGateway({
        abortOnSleep: 3,
        onSleep: (count) => {
          if (count === 2) server.registerClient('LedDevice');
        },
      });

      await gateway.run(controller.signal);

      expect(clock.sleeps).toEqual([1000, 1000, 1000]);
      expect(phases).toContain('running');
      expect(quietLogger.info).toHaveBeenCalledWith('Constrained device LedDevice registered');
    });

    it('stops while still waiting for an absent peer', async () => {
      server.deregisterClient('LedDevice');
      const { gateway, phases } = createGateway({ abortOnSleep: 4 });

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);
      expect(phases).toEqual(['provisioning', 'registering', 'defining', 'awaiting-peers', 'stopped']);
      expect(server.countRequests('server:read')).toBe(0);
      expect(server.getOpenTransportCount()).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // CLOUD REGISTRATION
  // ─────────────────────────────────────────────────────────────────────────

  describe('registration', () => {
    it('retries registration and then notifies', async () => {
      const { gateway, registrar, clock } = createGateway({
        abortOnSleep: 2,
        registrar: new FakeRegistrar([false, true]),
      });

      await gateway.run(controller.signal);

      expect(registrar.registerCalls).toBe(2);
      expect(clock.sleeps).toEqual([1000, 1000]);
      expect(quietLogger.info).toHaveBeenCalledWith('Try to connect to the cloud for 4 more trials');
      expect(registrar.notifications).toEqual(['00:00:01 01-01-2024 LED on']);
    });

    it('gives up after five attempts and bridges without notifications', async () => {
      const { gateway, registrar, clock } = createGateway({
        abortOnSleep: 5,
        registrar: new FakeRegistrar([false, false, false, false, false]),
      });

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);

      expect(registrar.registerCalls).toBe(5);
      expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000, 1000]);
      expect(registrar.notifications).toEqual([]);
      expect(server.getClientValue('LedDevice', LED_PATH)).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // FAILURES
  // ─────────────────────────────────────────────────────────────────────────

  describe('failures', () => {
    it('exits with failure when the server session cannot be established', async () => {
      server.setOffline(true);
      const { gateway, registrar, phases } = createGateway({ abortOnSleep: 1 });

      expect(await gateway.run(controller.signal)).toBe(EXIT_FAILURE);

      expect(phases).toEqual(['failed']);
      expect(registrar.registerCalls).toBe(0);
      expect(heartbeat.states).toEqual([true, false]);
      expect(client.getOpenTransportCount()).toBe(0);
    });

    it('continues when the server rejects the definitions', async () => {
      server.injectFailure('define');
      const { gateway, phases } = createGateway({ abortOnSleep: 1 });

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);

      expect(phases).toContain('running');
      expect(client.getDefinitions().map((d) => d.id)).toEqual([3200, 3311]);
      expect(quietLogger.warn).toHaveBeenCalledWith('Some objects are not defined on the server; continuing');
    });

    it('recovers the server session and keeps the client session', async () => {
      server.injectFailure('server:read');
      const { gateway } = createGateway({ abortOnSleep: 2 });
      const recovered = vi.fn();
      gateway.on('recovered', recovered);

      expect(await gateway.run(controller.signal)).toBe(EXIT_STOPPED);

      expect(recovered).toHaveBeenCalledWith(1);
      expect(server.getTransportsCreated()).toBe(2);
      expect(client.getTransportsCreated()).toBe(1);
      expect(client.requests.filter((r) => r.type === 'client:get').map((r) => r.payload)).toEqual([
        { paths: ['/20001/0'] },
        { paths: ['/3311/0'] },
      ]);
    });

    it('exits with failure when recovery cannot reconnect', async () => {
      server.injectFailure('server:read');
      const { gateway, phases } = createGateway({
        abortOnSleep: 99,
        onSleep: (count) => {
          if (count === 1) server.setOffline(true);
        },
      });

      expect(await gateway.run(controller.signal)).toBe(EXIT_FAILURE);

      expect(phases.at(-1)).toBe('failed');
      expect(heartbeat.states).toEqual([true, false]);
      expect(client.getOpenTransportCount()).toBe(0);
      expect(quietLogger.error).toHaveBeenCalledWith('Button gateway failure');
    });
  });
});

describe('createButtonGateway', () => {
  it('wires a gateway from the resolved config', () => {
    const gateway = createButtonGateway(resolveGatewayConfig(), { loggerFor: () => quietLogger });

    expect(gateway).toBeInstanceOf(ButtonGateway);
    expect(gateway.getPhase()).toBe('starting');
  });
});
