/**
 * CloudRegistrar - Device login and owner notifications over the cloud REST API
 *
 * register() logs the device in with the provisioned credentials and keeps the
 * owner's user id and a session token. notify() then posts a short-lived text
 * message to that owner. Neither throws on failure; both resolve false.
 */

import { z } from 'zod';
import { createLogger, isAbortError, systemClock, toError } from '@ledbridge/types';
import type { Clock, Logger } from '@ledbridge/types';
import { DEFAULT_CREDENTIALS_PATH, loadRegistrationConfig } from './credentials.js';
import type { LoadCredentialsOptions } from './credentials.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_MESSAGE_EXPIRY_SECONDS = 20;
export const NOTIFY_MIME_TYPE = 'text/plain';
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

const BODY_SUMMARY_LENGTH = 200;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * What the gateway needs from the cloud.
 */
export interface RegistrationCollaborator {
  /** Resolves false on any failure; rejects only when aborted */
  register(signal?: AbortSignal): Promise<boolean>;
  isLoggedIn(): boolean;
  /** Send a text message to the device owner; resolves false when aborted */
  notify(text: string, signal?: AbortSignal): Promise<boolean>;
}

export interface CloudRegistrarOptions {
  credentialsPath?: string;
  messageExpirySeconds?: number;
  credentialsReadAttempts?: number;
  credentialsReadBackoffMs?: number;
  /** Upper bound on each cloud request */
  requestTimeoutMs?: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

const LoginResponseSchema = z.object({
  loggedIn: z.boolean(),
  ownerId: z.string().min(1).optional(),
  sessionToken: z.string().min(1).optional(),
});

interface CloudSession {
  url: string;
  ownerId: string;
  token: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class CloudRegistrar implements RegistrationCollaborator {
  private readonly credentialsPath: string;
  private readonly messageExpirySeconds: number;
  private readonly credentialsOptions: LoadCredentialsOptions;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private session: CloudSession | null = null;

  constructor(options: CloudRegistrarOptions = {}) {
    this.credentialsPath = options.credentialsPath ?? DEFAULT_CREDENTIALS_PATH;
    this.messageExpirySeconds = options.messageExpirySeconds ?? DEFAULT_MESSAGE_EXPIRY_SECONDS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? createLogger('CloudRegistrar');
    this.credentialsOptions = {
      attempts: options.credentialsReadAttempts,
      backoffMs: options.credentialsReadBackoffMs,
      clock: options.clock ?? systemClock,
      logger: this.log,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REGISTRATION
  // ─────────────────────────────────────────────────────────────────────────

  async register(signal?: AbortSignal): Promise<boolean> {
    const config = await loadRegistrationConfig(this.credentialsPath, { ...this.credentialsOptions, signal });
    if (!config.ok) {
      return false;
    }

    const { url, customerKey, customerSecret, rememberMeToken } = config.value;
    try {
      const response = await this.fetchImpl(`${url}/devices/login`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ customerKey, customerSecret, rememberMeToken }),
        signal: this.requestSignal(signal),
      });
      const text = await response.text();

      if (!response.ok) {
        this.log.error(`Failed to connect to server: ${describeHttpFailure(response.status, text)}`);
        return false;
      }

      const login = LoginResponseSchema.safeParse(parseJson(text));
      if (!login.success) {
        this.log.error('Failed to connect to server: unexpected login response', login.error.message);
        return false;
      }
      if (!login.data.loggedIn || !login.data.ownerId || !login.data.sessionToken) {
        this.log.error('Failed to login as device');
        return false;
      }

      this.session = { url, ownerId: login.data.ownerId, token: login.data.sessionToken };
      this.log.info('Device registration successful');
      return true;
    } catch (error) {
      if (isAbortError(error)) throw error;
      this.log.error('Failed to connect to server:', this.describeError(error));
      return false;
    }
  }

  isLoggedIn(): boolean {
    return this.session !== null;
  }

  getOwnerId(): string | undefined {
    return this.session?.ownerId;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // MESSAGING
  // ─────────────────────────────────────────────────────────────────────────

  async notify(text: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.session) {
      this.log.warn('Cannot notify: device is not logged in');
      return false;
    }
    return this.notifyUser(this.session.ownerId, NOTIFY_MIME_TYPE, text, this.messageExpirySeconds, signal);
  }

  async notifyUser(
    userId: string,
    mimeType: string,
    body: string,
    expirySeconds: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (!this.session) {
      this.log.warn('Cannot send message: device is not logged in');
      return false;
    }

    try {
      const response = await this.fetchImpl(`${this.session.url}/users/${encodeURIComponent(userId)}/messages`, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${this.session.token}`,
          'content-type': mimeType,
          'x-message-expiry': String(expirySeconds),
        },
        body,
        signal: this.requestSignal(signal),
      });

      if (!response.ok) {
        const text = await response.text();
        this.log.error(`Failed to send message to user: ${describeHttpFailure(response.status, text)}`);
        return false;
      }

      this.log.info(`Message sent to user = ${body}`);
      return true;
    } catch (error) {
      this.log.error('Failed to send message to user:', this.describeError(error));
      return false;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    return signal ? AbortSignal.any([timeout, signal]) : timeout;
  }

  private describeError(error: unknown): string {
    const cause = toError(error);
    return cause.name === 'TimeoutError' ? `request timed out after ${this.requestTimeoutMs} ms` : cause.message;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function describeHttpFailure(status: number, text: string): string {
  const summary = text.trim().slice(0, BODY_SUMMARY_LENGTH);
  return `status=${status}${summary ? ` body=${summary}` : ''}`;
}
