import { createClientSession, createServerSession } from '@ledbridge/session';
import type { LocalSession, RemoteSession, ResourceSession } from '@ledbridge/session';
import { toError } from '@ledbridge/types';
import type { Logger } from '@ledbridge/types';
import type { GatewayConfig } from './config.js';

/**
 * Creates unconnected session handles.
 * The gateway connects, frees and recreates them as it goes.
 */
export interface SessionFactory {
  createLocal(): LocalSession;
  createRemote(): RemoteSession;
}

/**
 * Sessions with the daemons named by the gateway config.
 */
export function createDaemonSessionFactory(config: GatewayConfig, logger?: Logger): SessionFactory {
  return {
    createLocal: () =>
      createClientSession({ ...config.local, operationTimeoutMs: config.operationTimeoutMs, logger }),
    createRemote: () =>
      createServerSession({ ...config.remote, operationTimeoutMs: config.operationTimeoutMs, logger }),
  };
}

/**
 * Create and connect a session. Resolves null, with the handle freed, if the
 * connection cannot be made.
 */
export async function establishSession<S extends ResourceSession>(
  create: () => S,
  label: string,
  log: Logger,
): Promise<S | null> {
  const session = create();
  try {
    await session.connect();
    log.info(`${label} session established`);
    return session;
  } catch (error) {
    log.error(`Failed to connect ${label.toLowerCase()} session:`, toError(error).message);
    session.free();
    return null;
  }
}

/**
 * Disconnect (if connected) and free. Failures are logged, never thrown.
 */
export async function teardownSession(session: ResourceSession | null, label: string, log: Logger): Promise<void> {
  if (!session) return;

  if (session.getState() === 'connected') {
    try {
      await session.disconnect();
    } catch (error) {
      log.error(`Failed to disconnect ${label.toLowerCase()} session:`, toError(error).message);
    }
  }
  session.free();
}
