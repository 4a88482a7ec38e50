// Config
export {
  TIME_UNIT_MS,
  DEFAULT_LOCAL_PORT,
  DEFAULT_REMOTE_PORT,
  DEFAULT_DAEMON_ADDRESS,
  DEFAULT_HEARTBEAT_COMMAND,
  DEFAULT_TIMING,
  GatewayTimingSchema,
  GatewayConfigSchema,
  resolveGatewayConfig,
} from './config.js';
export type { GatewayTiming, GatewayConfig, GatewayConfigInput } from './config.js';

// Schema
export {
  PROVISIONING_OBJECT_ID,
  PROVISIONING_INSTANCE_ID,
  BUTTON_CLIENT_ID,
  BUTTON_OBJECT_ID,
  BUTTON_RESOURCE_ID,
  LED_CLIENT_ID,
  LED_OBJECT_ID,
  LED_RESOURCE_ID,
  DEFAULT_RESOURCE_SCHEMA,
  DEFAULT_BINDING,
} from './schema.js';
export type { BridgeBinding } from './schema.js';

// Building blocks
export { CommandHeartbeat } from './heartbeat.js';
export type { HeartbeatIndicator } from './heartbeat.js';
export { createDaemonSessionFactory, establishSession, teardownSession } from './sessions.js';
export type { SessionFactory } from './sessions.js';
export { PROVISIONING_PATH, isProvisioned, waitForProvisioning } from './provisioning.js';
export type { ProvisioningOptions } from './provisioning.js';
export { buildObjectDefinition, defineSchema } from './schema-definer.js';
export type { DefineSchemaOptions } from './schema-definer.js';
export { isPeerRegistered, waitForPeer } from './presence.js';
export type { PresenceOptions } from './presence.js';
export { toButtonState, formatLedMessage } from './notification.js';
export { pollButtonState, propagate } from './poll-loop.js';
export type { GatewayContext, PropagationResult, PollOutcome, PollLoopOptions } from './poll-loop.js';
export { SessionSupervisor } from './session-supervisor.js';
export type { SupervisorState, SessionSupervisorEvents, SessionSupervisorOptions } from './session-supervisor.js';

// Driver
export { ButtonGateway, createButtonGateway, EXIT_STOPPED, EXIT_FAILURE } from './gateway.js';
export type {
  GatewayPhase,
  ButtonGatewayEvents,
  ButtonGatewayOptions,
  CreateButtonGatewayOptions,
} from './gateway.js';
