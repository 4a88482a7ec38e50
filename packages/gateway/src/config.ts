import { z } from 'zod';
import { DEFAULT_CREDENTIALS_PATH, DEFAULT_MESSAGE_EXPIRY_SECONDS, DEFAULT_REQUEST_TIMEOUT_MS } from '@ledbridge/cloud';
import { DEFAULT_OPERATION_TIMEOUT_MS } from '@ledbridge/session';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Every wait in the gateway is a multiple of this unit */
export const TIME_UNIT_MS = 1000;

export const DEFAULT_LOCAL_PORT = 12345;
export const DEFAULT_REMOTE_PORT = 54321;
export const DEFAULT_DAEMON_ADDRESS = '127.0.0.1';
export const DEFAULT_HEARTBEAT_COMMAND = '/usr/bin/set_led.sh';

// ═══════════════════════════════════════════════════════════════════════════
// TIMING
// ═══════════════════════════════════════════════════════════════════════════

export const GatewayTimingSchema = z.object({
  /** Wait between provisioning checks */
  provisioningBackoffMs: z.number().int().nonnegative().default(2 * TIME_UNIT_MS),
  /** Wait between roster checks for an absent peer */
  presenceIntervalMs: z.number().int().nonnegative().default(TIME_UNIT_MS),
  /** Heartbeat-off time after each poll */
  pollPulseMs: z.number().int().nonnegative().default(TIME_UNIT_MS),
  /** Wait between dropping a failed server session and opening a new one */
  recoveryDelayMs: z.number().int().nonnegative().default(TIME_UNIT_MS),
  registrationAttempts: z.number().int().positive().default(5),
  registrationBackoffMs: z.number().int().nonnegative().default(TIME_UNIT_MS),
  credentialsReadAttempts: z.number().int().positive().default(5),
  credentialsReadBackoffMs: z.number().int().nonnegative().default(TIME_UNIT_MS),
});
export type GatewayTiming = z.output<typeof GatewayTimingSchema>;

export const DEFAULT_TIMING: GatewayTiming = GatewayTimingSchema.parse({});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════

function endpointSchema(defaultPort: number) {
  return z
    .object({
      address: z.string().min(1).default(DEFAULT_DAEMON_ADDRESS),
      port: z.number().int().min(1).max(65535).default(defaultPort),
    })
    .strict()
    .default({});
}

export const GatewayConfigSchema = z
  .object({
    /** Client daemon colocated with the gateway */
    local: endpointSchema(DEFAULT_LOCAL_PORT),
    /** Server daemon the constrained devices register with */
    remote: endpointSchema(DEFAULT_REMOTE_PORT),
    operationTimeoutMs: z.number().int().positive().default(DEFAULT_OPERATION_TIMEOUT_MS),
    heartbeatCommand: z.string().min(1).default(DEFAULT_HEARTBEAT_COMMAND),
    credentialsPath: z.string().min(1).default(DEFAULT_CREDENTIALS_PATH),
    messageExpirySeconds: z.number().int().positive().default(DEFAULT_MESSAGE_EXPIRY_SECONDS),
    /** Upper bound on each cloud login or message request */
    cloudRequestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
    timing: GatewayTimingSchema.strict().default({}),
  })
  .strict();

export type GatewayConfig = z.output<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;

export function resolveGatewayConfig(input: GatewayConfigInput = {}): GatewayConfig {
  return GatewayConfigSchema.parse(input);
}
