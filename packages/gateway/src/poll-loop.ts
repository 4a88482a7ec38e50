/**
 * Poll-and-propagate: watch the button counter on the server and mirror its
 * parity onto the LED, on the server, on the client daemon and to the owner.
 */

import { createLogger, isAbortError, systemClock, toError } from '@ledbridge/types';
import type { Clock, Logger, ResourceValue } from '@ledbridge/types';
import type { LocalSession, RemoteSession } from '@ledbridge/session';
import type { RegistrationCollaborator } from '@ledbridge/cloud';
import type { HeartbeatIndicator } from './heartbeat.js';
import { formatLedMessage, toButtonState } from './notification.js';
import type { BridgeBinding } from './schema.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * State owned by one gateway run and passed into the loop.
 */
export interface GatewayContext {
  local: LocalSession;
  remote: RemoteSession;
  /** Set once, after the cloud login */
  registered: boolean;
  /** Last raw counter seen; unset until the first read with a value */
  lastCounter: number | undefined;
}

export interface PropagationResult {
  counter: number;
  state: boolean;
  remoteWritten: boolean;
  localSet: boolean;
  /** Undefined when the device is not registered with the cloud */
  notified: boolean | undefined;
}

export type PollOutcome = 'read-failed' | 'stopped';

export interface PollLoopOptions {
  binding: BridgeBinding;
  heartbeat: HeartbeatIndicator;
  registrar: RegistrationCollaborator;
  pulseMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
  onPropagated?: (result: PropagationResult) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOOP
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Poll until a read fails or the signal aborts. Every value that differs from
 * the previous one propagates, including the first.
 */
export async function pollButtonState(context: GatewayContext, options: PollLoopOptions): Promise<PollOutcome> {
  const log = options.logger ?? createLogger('PollLoop');
  const clock = options.clock ?? systemClock;
  const { binding, heartbeat, signal } = options;

  for (;;) {
    if (signal?.aborted) return 'stopped';

    let value: ResourceValue | undefined;
    try {
      value = await context.remote.read(binding.sourceClientId, binding.sourcePath);
    } catch (error) {
      log.error(`Reading ${binding.sourcePath} from ${binding.sourceClientId} failed:`, toError(error).message);
      return 'read-failed';
    }

    if (value === undefined) {
      log.debug(`No value for ${binding.sourcePath} yet`);
    } else if (typeof value !== 'number' || !Number.isInteger(value)) {
      log.warn(`Ignoring non-integer counter value ${String(value)}`);
    } else if (value !== context.lastCounter) {
      const result = await propagate(context, value, { ...options, clock, logger: log });
      context.lastCounter = value;
      options.onPropagated?.(result);
    }

    await heartbeat.set(false);
    try {
      await clock.sleep(options.pulseMs, signal);
    } catch (error) {
      if (isAbortError(error)) return 'stopped';
      throw error;
    }
    await heartbeat.set(true);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PROPAGATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Attempt all three actions; none depends on another's outcome.
 */
export async function propagate(
  context: GatewayContext,
  counter: number,
  options: PollLoopOptions,
): Promise<PropagationResult> {
  const log = options.logger ?? createLogger('PollLoop');
  const state = toButtonState(counter);

  log.debug(`Counter ${counter} -> LED ${state ? 'on' : 'off'}`);

  const remoteWritten = await writeRemote(context.remote, options.binding, state, log);
  if (!remoteWritten) {
    log.error('Writing to LED resource on server failed');
  }

  const localSet = await setLocal(context.local, options.binding, state, log);
  if (!localSet) {
    log.error('Setting LED resource on client failed');
  }

  let notified: boolean | undefined;
  if (context.registered) {
    const at = (options.clock ?? systemClock).now();
    notified = await notifyOwner(options.registrar, state, at, options.signal, log);
    if (!notified) {
      log.error('Cloud message send failed');
    }
  }

  return { counter, state, remoteWritten, localSet, notified };
}

/**
 * Update-mode write, only when the server knows the resource.
 */
async function writeRemote(remote: RemoteSession, binding: BridgeBinding, state: boolean, log: Logger): Promise<boolean> {
  try {
    const ids = remote.pathToIds(binding.targetPath);
    const definition = await remote.getObjectDefinition(ids.objectId);
    if (!definition) {
      log.error(`Object ${ids.objectId} is not defined on server`);
      return false;
    }
    if (!definition.resources.some((resource) => resource.id === ids.resourceId)) {
      log.error(`Resource ${binding.targetPath} is not defined on server`);
      return false;
    }

    await remote.write(binding.targetClientId, binding.targetPath, state, 'update');
    log.info(`Written ${state} to server`);
    return true;
  } catch (error) {
    log.error('Server write failed:', toError(error).message);
    return false;
  }
}

/**
 * Set on the client daemon, creating the instance first when it is missing.
 */
async function setLocal(local: LocalSession, binding: BridgeBinding, state: boolean, log: Logger): Promise<boolean> {
  let instanceExists = false;
  try {
    const response = await local.get(binding.targetInstancePath);
    instanceExists = response.containsPath(binding.targetInstancePath);
  } catch (error) {
    log.debug(`Lookup of ${binding.targetInstancePath} failed:`, toError(error).message);
  }

  try {
    await local.set(binding.targetPath, state, {
      createInstance: instanceExists ? undefined : binding.targetInstancePath,
    });
    log.info(`Set ${state} on client`);
    return true;
  } catch (error) {
    log.error('Client set failed:', toError(error).message);
    return false;
  }
}

async function notifyOwner(
  registrar: RegistrationCollaborator,
  state: boolean,
  at: Date,
  signal: AbortSignal | undefined,
  log: Logger,
): Promise<boolean> {
  try {
    return await registrar.notify(formatLedMessage(state, at), signal);
  } catch (error) {
    if (isAbortError(error)) return false;
    log.error('Notify failed:', toError(error).message);
    return false;
  }
}
