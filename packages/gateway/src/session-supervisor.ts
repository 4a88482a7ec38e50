/**
 * SessionSupervisor - Keeps the poll loop running across server session failures
 *
 *   connecting ──► polling ──(read failed)──► recovering ──► connecting …
 *        │            │                           │
 *        │         (abort)                  (no new session)
 *        ▼            ▼                           ▼
 *     stopped      stopped                      failed
 *
 * Recovery replaces only the server session. The client session, the
 * definitions and the presence checks carry over.
 */

import { TypedEventEmitter, createLogger, isAbortError, systemClock } from '@ledbridge/types';
import type { Clock, Logger } from '@ledbridge/types';
import type { RegistrationCollaborator } from '@ledbridge/cloud';
import type { RemoteSession } from '@ledbridge/session';
import type { HeartbeatIndicator } from './heartbeat.js';
import { pollButtonState } from './poll-loop.js';
import type { GatewayContext, PropagationResult } from './poll-loop.js';
import type { BridgeBinding } from './schema.js';
import { teardownSession } from './sessions.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SupervisorState = 'connecting' | 'polling' | 'recovering' | 'stopped' | 'failed';

export interface SessionSupervisorEvents {
  stateChanged: (state: SupervisorState) => void;
  /** A replacement server session is in place */
  recovered: (recoveries: number) => void;
  propagated: (result: PropagationResult) => void;
}

export interface SessionSupervisorOptions {
  /** Opens a new server session; resolves null if it cannot */
  establishRemote: () => Promise<RemoteSession | null>;
  binding: BridgeBinding;
  heartbeat: HeartbeatIndicator;
  registrar: RegistrationCollaborator;
  pollPulseMs: number;
  recoveryDelayMs: number;
  clock?: Clock;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class SessionSupervisor extends TypedEventEmitter<SessionSupervisorEvents> {
  private readonly context: GatewayContext;
  private readonly options: SessionSupervisorOptions;
  private readonly clock: Clock;
  private readonly log: Logger;
  private state: SupervisorState = 'connecting';
  private recoveries = 0;

  constructor(context: GatewayContext, options: SessionSupervisorOptions) {
    super();
    this.context = context;
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('SessionSupervisor');
  }

  getState(): SupervisorState {
    return this.state;
  }

  getRecoveries(): number {
    return this.recoveries;
  }

  /**
   * Resolves 'stopped' on abort and 'failed' when the server session cannot
   * be re-established. Never resolves otherwise.
   */
  async run(signal?: AbortSignal): Promise<'stopped' | 'failed'> {
    for (;;) {
      this.setState('polling');
      const outcome = await pollButtonState(this.context, {
        binding: this.options.binding,
        heartbeat: this.options.heartbeat,
        registrar: this.options.registrar,
        pulseMs: this.options.pollPulseMs,
        clock: this.clock,
        signal,
        logger: this.log,
        onPropagated: (result) => this.emit('propagated', result),
      });

      if (outcome === 'stopped') {
        this.setState('stopped');
        return 'stopped';
      }

      this.setState('recovering');
      const recovered = await this.recover(signal);
      if (recovered !== 'connecting') {
        this.setState(recovered);
        return recovered;
      }
      this.setState('connecting');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async recover(signal?: AbortSignal): Promise<'connecting' | 'stopped' | 'failed'> {
    await teardownSession(this.context.remote, 'Server', this.log);

    try {
      await this.clock.sleep(this.options.recoveryDelayMs, signal);
    } catch (error) {
      if (isAbortError(error)) return 'stopped';
      throw error;
    }

    const remote = await this.options.establishRemote();
    if (!remote) {
      this.log.error('Failed to re-establish server session');
      return 'failed';
    }

    this.context.remote = remote;
    this.recoveries++;
    this.log.info(`Server session re-established (recovery ${this.recoveries})`);
    this.emit('recovered', this.recoveries);
    return 'connecting';
  }

  private setState(state: SupervisorState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChanged', state);
  }
}
