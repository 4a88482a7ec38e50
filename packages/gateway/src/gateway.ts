/**
 * ButtonGateway - The bridge's driver
 *
 * heartbeat on → sessions → provisioning → cloud login → definitions →
 * peers → supervised polling. run() resolves the process exit code: 0 when
 * stopped by the abort signal, -1 when the server session is lost for good.
 */

import { CloudRegistrar } from '@ledbridge/cloud';
import type { RegistrationCollaborator } from '@ledbridge/cloud';
import type { LocalSession, RemoteSession } from '@ledbridge/session';
import { TypedEventEmitter, createLogger, err, isAbortError, ok, retry, systemClock } from '@ledbridge/types';
import type { Clock, Logger, ResourceSchema, Result } from '@ledbridge/types';
import { DEFAULT_TIMING } from './config.js';
import type { GatewayConfig, GatewayTiming } from './config.js';
import { CommandHeartbeat } from './heartbeat.js';
import type { HeartbeatIndicator } from './heartbeat.js';
import type { GatewayContext, PropagationResult } from './poll-loop.js';
import { waitForPeer } from './presence.js';
import { waitForProvisioning } from './provisioning.js';
import { DEFAULT_BINDING, DEFAULT_RESOURCE_SCHEMA } from './schema.js';
import type { BridgeBinding } from './schema.js';
import { defineSchema } from './schema-definer.js';
import { SessionSupervisor } from './session-supervisor.js';
import type { SupervisorState } from './session-supervisor.js';
import { createDaemonSessionFactory, establishSession, teardownSession } from './sessions.js';
import type { SessionFactory } from './sessions.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const EXIT_STOPPED = 0;
export const EXIT_FAILURE = -1;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type GatewayPhase =
  | 'starting'
  | 'provisioning'
  | 'registering'
  | 'defining'
  | 'awaiting-peers'
  | 'running'
  | 'stopped'
  | 'failed';

export interface ButtonGatewayEvents {
  phaseChanged: (phase: GatewayPhase) => void;
  supervisorStateChanged: (state: SupervisorState) => void;
  recovered: (recoveries: number) => void;
  propagated: (result: PropagationResult) => void;
}

export interface ButtonGatewayOptions {
  sessions: SessionFactory;
  registrar: RegistrationCollaborator;
  heartbeat: HeartbeatIndicator;
  schema?: ResourceSchema;
  binding?: BridgeBinding;
  timing?: Partial<GatewayTiming>;
  clock?: Clock;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class ButtonGateway extends TypedEventEmitter<ButtonGatewayEvents> {
  private readonly sessions: SessionFactory;
  private readonly registrar: RegistrationCollaborator;
  private readonly heartbeat: HeartbeatIndicator;
  private readonly schema: ResourceSchema;
  private readonly binding: BridgeBinding;
  private readonly timing: GatewayTiming;
  private readonly clock: Clock;
  private readonly log: Logger;
  private phase: GatewayPhase = 'starting';
  private running = false;

  constructor(options: ButtonGatewayOptions) {
    super();
    this.sessions = options.sessions;
    this.registrar = options.registrar;
    this.heartbeat = options.heartbeat;
    this.schema = options.schema ?? DEFAULT_RESOURCE_SCHEMA;
    this.binding = options.binding ?? DEFAULT_BINDING;
    this.timing = { ...DEFAULT_TIMING, ...options.timing };
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('ButtonGateway');
  }

  getPhase(): GatewayPhase {
    return this.phase;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // RUN
  // ─────────────────────────────────────────────────────────────────────────

  async run(signal?: AbortSignal): Promise<number> {
    if (this.running) {
      throw new Error('Gateway already running');
    }
    this.running = true;
    this.setPhase('starting');
    this.log.info('Button gateway starting');

    await this.heartbeat.set(true);

    let local = await this.establishLocal();
    const remote = await this.establishRemote();
    if (!remote) {
      this.log.error('Failed to establish server session');
      return this.shutdown(local, remote, 'failed');
    }

    let context: GatewayContext | undefined;
    try {
      this.setPhase('provisioning');
      local = await waitForProvisioning(local, {
        establish: () => this.establishLocal(),
        backoffMs: this.timing.provisioningBackoffMs,
        clock: this.clock,
        signal,
        logger: this.log,
      });

      context = {
        local,
        remote,
        registered: false,
        lastCounter: undefined,
      };

      this.setPhase('registering');
      context.registered = await this.registerDevice(signal);

      this.setPhase('defining');
      if (!(await defineSchema(context.remote, this.schema, { label: 'server', logger: this.log }))) {
        this.log.warn('Some objects are not defined on the server; continuing');
      }
      if (!(await defineSchema(context.local, this.schema, { label: 'client', logger: this.log }))) {
        this.log.warn('Some objects are not defined on the client; continuing');
      }

      this.setPhase('awaiting-peers');
      for (const object of this.schema) {
        await waitForPeer(context.remote, object.clientId, {
          intervalMs: this.timing.presenceIntervalMs,
          clock: this.clock,
          signal,
          logger: this.log,
        });
      }

      this.setPhase('running');
      const supervisor = new SessionSupervisor(context, {
        establishRemote: () => this.establishRemote(),
        binding: this.binding,
        heartbeat: this.heartbeat,
        registrar: this.registrar,
        pollPulseMs: this.timing.pollPulseMs,
        recoveryDelayMs: this.timing.recoveryDelayMs,
        clock: this.clock,
        logger: this.log,
      });
      supervisor.on('stateChanged', (state: SupervisorState) => this.emit('supervisorStateChanged', state));
      supervisor.on('recovered', (recoveries: number) => this.emit('recovered', recoveries));
      supervisor.on('propagated', (result: PropagationResult) => this.emit('propagated', result));

      const outcome = await supervisor.run(signal);
      return this.shutdown(context.local, context.remote, outcome);
    } catch (error) {
      const current = context?.remote ?? remote;
      if (isAbortError(error)) {
        return this.shutdown(local, current, 'stopped');
      }
      await this.shutdown(local, current, 'failed');
      throw error;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private establishLocal(): Promise<LocalSession | null> {
    return establishSession(() => this.sessions.createLocal(), 'Client', this.log);
  }

  private establishRemote(): Promise<RemoteSession | null> {
    return establishSession(() => this.sessions.createRemote(), 'Server', this.log);
  }

  private async registerDevice(signal?: AbortSignal): Promise<boolean> {
    const attempts = this.timing.registrationAttempts;
    const result = await retry(
      async (): Promise<Result<true, string>> =>
        (await this.registrar.register(signal)) ? ok(true) : err('registration failed'),
      {
        attempts,
        backoffMs: this.timing.registrationBackoffMs,
        clock: this.clock,
        signal,
        onRetry: (attempt) => this.log.info(`Try to connect to the cloud for ${attempts - attempt} more trials`),
      },
    );

    if (!result.ok) {
      this.log.warn('Cloud registration failed; owner notifications are disabled');
    }
    return result.ok;
  }

  private async shutdown(
    local: LocalSession | null,
    remote: RemoteSession | null,
    outcome: 'stopped' | 'failed',
  ): Promise<number> {
    await this.heartbeat.set(false);
    await teardownSession(remote, 'Server', this.log);
    await teardownSession(local, 'Client', this.log);

    this.running = false;
    this.setPhase(outcome);
    if (outcome === 'failed') {
      this.log.error('Button gateway failure');
      return EXIT_FAILURE;
    }
    this.log.info('Button gateway stopped');
    return EXIT_STOPPED;
  }

  private setPhase(phase: GatewayPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.emit('phaseChanged', phase);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export interface CreateButtonGatewayOptions {
  /** Logger for a named component; defaults to a console logger */
  loggerFor?: (component: string) => Logger;
  clock?: Clock;
}

/**
 * A gateway wired to the daemons, the cloud and the heartbeat command named by
 * the config.
 */
export function createButtonGateway(config: GatewayConfig, options: CreateButtonGatewayOptions = {}): ButtonGateway {
  const loggerFor = options.loggerFor ?? createLogger;
  const clock = options.clock ?? systemClock;

  return new ButtonGateway({
    sessions: createDaemonSessionFactory(config, loggerFor('IpcChannel')),
    registrar: new CloudRegistrar({
      credentialsPath: config.credentialsPath,
      messageExpirySeconds: config.messageExpirySeconds,
      requestTimeoutMs: config.cloudRequestTimeoutMs,
      credentialsReadAttempts: config.timing.credentialsReadAttempts,
      credentialsReadBackoffMs: config.timing.credentialsReadBackoffMs,
      clock,
      logger: loggerFor('CloudRegistrar'),
    }),
    heartbeat: new CommandHeartbeat(config.heartbeatCommand, loggerFor('Heartbeat')),
    timing: config.timing,
    clock,
    logger: loggerFor('ButtonGateway'),
  });
}
