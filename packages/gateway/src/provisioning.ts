import { createLogger, err, makeObjectInstancePath, ok, retry, toError } from '@ledbridge/types';
import type { Clock, Logger, Result } from '@ledbridge/types';
import type { LocalSession } from '@ledbridge/session';
import { PROVISIONING_INSTANCE_ID, PROVISIONING_OBJECT_ID } from './schema.js';

export const PROVISIONING_PATH = makeObjectInstancePath(PROVISIONING_OBJECT_ID, PROVISIONING_INSTANCE_ID);

export interface ProvisioningOptions {
  /** Opens a fresh client session after a failed check */
  establish: () => Promise<LocalSession | null>;
  backoffMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * True once the provisioning tool has created its marker instance on the
 * client daemon. Any lookup failure counts as not provisioned.
 */
export async function isProvisioned(session: LocalSession, logger?: Logger): Promise<boolean> {
  const log = logger ?? createLogger('Provisioning');
  try {
    const response = await session.get(PROVISIONING_PATH);
    if (response.containsPath(PROVISIONING_PATH)) {
      log.info('Gateway is provisioned');
      return true;
    }
  } catch (error) {
    log.debug('Provisioning check failed:', toError(error).message);
  }
  return false;
}

/**
 * Block until the gateway is provisioned, discarding and recreating the
 * client session between checks. Resolves the session that passed the check.
 */
export async function waitForProvisioning(
  initial: LocalSession | null,
  options: ProvisioningOptions,
): Promise<LocalSession> {
  const log = options.logger ?? createLogger('Provisioning');
  let session = initial;

  log.info('Wait until device is provisioned');

  try {
    const result = await retry(
      async (attempt): Promise<Result<LocalSession, string>> => {
        if (attempt > 1) {
          session = await options.establish();
        }
        if (session && (await isProvisioned(session, log))) {
          return ok(session);
        }
        return err(PROVISIONING_PATH);
      },
      {
        attempts: Infinity,
        backoffMs: options.backoffMs,
        clock: options.clock,
        signal: options.signal,
        onRetry: () => {
          log.info('Waiting...');
          session?.free();
          session = null;
        },
      },
    );

    if (result.ok) {
      return result.value;
    }
    throw new Error(`Provisioning marker ${result.error} never appeared`);
  } catch (error) {
    session?.free();
    throw error;
  }
}
