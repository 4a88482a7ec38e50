/**
 * Operation payloads exchanged with the client and server daemons.
 * Request payloads are validated by the daemon, response payloads by the bridge.
 */

import { z } from 'zod';
import { ObjectDescriptorSchema } from '@ledbridge/types';

export const IPC_OPERATIONS = {
  CONNECT: 'session:connect',
  DISCONNECT: 'session:disconnect',
  DEFINE: 'define',
  CLIENT_GET: 'client:get',
  CLIENT_SET: 'client:set',
  SERVER_READ: 'server:read',
  SERVER_WRITE: 'server:write',
  SERVER_LIST_CLIENTS: 'server:list-clients',
} as const;

export type IpcOperation = (typeof IPC_OPERATIONS)[keyof typeof IPC_OPERATIONS];

/**
 * An object definition as registered with a daemon.
 * Unlike a descriptor it carries no endpoint or instance addressing.
 */
export const ObjectDefinitionSchema = ObjectDescriptorSchema.omit({
  clientId: true,
  instanceId: true,
});
export type ObjectDefinition = z.infer<typeof ObjectDefinitionSchema>;

const ResourceValueSchema = z.union([z.number(), z.boolean()]);

// ─────────────────────────────────────────────────────────────────────────
// SESSION
// ─────────────────────────────────────────────────────────────────────────

/** Response to session:connect - definitions the daemon already knows */
export const ConnectResponseSchema = z.object({
  definitions: z.array(ObjectDefinitionSchema),
});
export type ConnectResponse = z.infer<typeof ConnectResponseSchema>;

export const DefineRequestSchema = z.object({
  definitions: z.array(ObjectDefinitionSchema).min(1),
});
export type DefineRequest = z.infer<typeof DefineRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────
// CLIENT DAEMON
// ─────────────────────────────────────────────────────────────────────────

export const ClientGetRequestSchema = z.object({
  paths: z.array(z.string()).min(1),
});
export type ClientGetRequest = z.infer<typeof ClientGetRequestSchema>;

export const ClientGetResponseSchema = z.object({
  /** Every requested path that exists; value is absent for instance paths */
  entries: z.array(
    z.object({
      path: z.string(),
      value: ResourceValueSchema.optional(),
    }),
  ),
});
export type ClientGetResponse = z.infer<typeof ClientGetResponseSchema>;

export const ClientSetRequestSchema = z.object({
  path: z.string(),
  value: ResourceValueSchema,
  createInstance: z.string().optional(),
});
export type ClientSetRequest = z.infer<typeof ClientSetRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────
// SERVER DAEMON
// ─────────────────────────────────────────────────────────────────────────

export const ServerReadRequestSchema = z.object({
  clientId: z.string(),
  path: z.string(),
});
export type ServerReadRequest = z.infer<typeof ServerReadRequestSchema>;

export const ServerReadResponseSchema = z.object({
  value: ResourceValueSchema.nullable(),
});
export type ServerReadResponse = z.infer<typeof ServerReadResponseSchema>;

export const ServerWriteRequestSchema = z.object({
  clientId: z.string(),
  path: z.string(),
  value: ResourceValueSchema,
  mode: z.enum(['update', 'replace']),
});
export type ServerWriteRequest = z.infer<typeof ServerWriteRequestSchema>;

export const ListClientsResponseSchema = z.object({
  clients: z.array(z.string()),
});
export type ListClientsResponse = z.infer<typeof ListClientsResponseSchema>;
