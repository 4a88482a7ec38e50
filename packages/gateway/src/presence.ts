import { createLogger, err, ok, retry, toError } from '@ledbridge/types';
import type { Clock, Logger, Result } from '@ledbridge/types';
import type { RemoteSession } from '@ledbridge/session';

export interface PresenceOptions {
  intervalMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * One fresh roster enumeration. A failed enumeration counts as absent.
 */
export async function isPeerRegistered(session: RemoteSession, peerId: string, logger?: Logger): Promise<boolean> {
  const log = logger ?? createLogger('Presence');
  try {
    const clients = await session.listClients();
    if (clients.includes(peerId)) {
      log.info(`Constrained device ${peerId} registered`);
      return true;
    }
  } catch (error) {
    log.error('Failed to list registered clients:', toError(error).message);
  }
  return false;
}

/**
 * Block until the peer appears in the roster. There is no deadline; only the
 * abort signal ends the wait early.
 */
export async function waitForPeer(session: RemoteSession, peerId: string, options: PresenceOptions): Promise<void> {
  const log = options.logger ?? createLogger('Presence');
  log.info(`Waiting for constrained device '${peerId}' to be up`);

  await retry(
    async (): Promise<Result<void, string>> => ((await isPeerRegistered(session, peerId, log)) ? ok(undefined) : err(peerId)),
    {
      attempts: Infinity,
      backoffMs: options.intervalMs,
      clock: options.clock,
      signal: options.signal,
    },
  );
}
