import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// RESOURCE MODEL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Value type of a single resource.
 * Only the two types the bridge exchanges are modelled.
 */
export type ResourceType = 'integer' | 'boolean';

export type ResourceValue = number | boolean;

/**
 * A typed value inside an object.
 */
export const ResourceDescriptorSchema = z.object({
  /** Resource identifier, unique within its object */
  id: z.number().int().nonnegative(),
  /** Human-readable name */
  name: z.string().min(1),
  type: z.enum(['integer', 'boolean']),
  mandatory: z.boolean().default(true),
  operations: z.literal('read-write').default('read-write'),
});
export type ResourceDescriptor = z.infer<typeof ResourceDescriptorSchema>;

/**
 * A group of addressable resources hosted by one peer endpoint.
 */
export const ObjectDescriptorSchema = z.object({
  /** Object identifier, unique within a session */
  id: z.number().int().nonnegative(),
  /** Human-readable name */
  name: z.string().min(1),
  /** Endpoint name of the constrained device that hosts the object */
  clientId: z.string().min(1),
  /** The single instance the bridge addresses */
  instanceId: z.number().int().nonnegative().default(0),
  minInstances: z.number().int().nonnegative().default(0),
  maxInstances: z.number().int().positive().default(1),
  resources: z.array(ResourceDescriptorSchema).min(1),
});
export type ObjectDescriptor = z.infer<typeof ObjectDescriptorSchema>;
export type ObjectDescriptorInput = z.input<typeof ObjectDescriptorSchema>;

/**
 * Ordered, immutable list of object descriptors.
 */
export type ResourceSchema = readonly Readonly<ObjectDescriptor>[];

/**
 * Validate and freeze a resource schema.
 * Throws when an object id repeats, or a resource id repeats within an object.
 */
export function createResourceSchema(objects: ObjectDescriptorInput[]): ResourceSchema {
  const parsed = z.array(ObjectDescriptorSchema).parse(objects);
  const objectIds = new Set<number>();

  for (const object of parsed) {
    if (objectIds.has(object.id)) {
      throw new Error(`Duplicate object id ${object.id} in resource schema`);
    }
    objectIds.add(object.id);

    const resourceIds = new Set<number>();
    for (const resource of object.resources) {
      if (resourceIds.has(resource.id)) {
        throw new Error(`Duplicate resource id ${resource.id} in object ${object.id}`);
      }
      resourceIds.add(resource.id);
      Object.freeze(resource);
    }
    Object.freeze(object.resources);
    Object.freeze(object);
  }

  return Object.freeze(parsed);
}

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export interface ResourcePathIds {
  objectId: number;
  instanceId?: number;
  resourceId?: number;
}

/**
 * Format: /{objectId}/{instanceId}
 */
export function makeObjectInstancePath(objectId: number, instanceId: number): string {
  return `/${objectId}/${instanceId}`;
}

/**
 * Format: /{objectId}/{instanceId}/{resourceId}
 */
export function makeResourcePath(objectId: number, instanceId: number, resourceId: number): string {
  return `/${objectId}/${instanceId}/${resourceId}`;
}

/**
 * Split a path into its identifiers.
 * Returns null if the path is not /o, /o/i or /o/i/r with decimal ids.
 */
export function parsePath(path: string): ResourcePathIds | null {
  const match = path.match(/^\/(\d+)(?:\/(\d+)(?:\/(\d+))?)?$/);
  if (!match) {
    return null;
  }
  return {
    objectId: Number(match[1]),
    instanceId: match[2] === undefined ? undefined : Number(match[2]),
    resourceId: match[3] === undefined ? undefined : Number(match[3]),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a prefix tag.
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => console.debug(`[${prefix}] ${msg}`, ...args),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}

export { systemClock, isAbortError } from './clock.js';
export type { Clock } from './clock.js';
export { retry } from './retry.js';
export type { RetryOptions } from './retry.js';
