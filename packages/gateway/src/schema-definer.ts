import { ObjectDefinitionBuilder } from '@ledbridge/session';
import type { ResourceSession } from '@ledbridge/session';
import type { ObjectDefinition } from '@ledbridge/protocol';
import { createLogger, err, ok, toError } from '@ledbridge/types';
import type { Logger, ObjectDescriptor, ResourceSchema, Result } from '@ledbridge/types';

export interface DefineSchemaOptions {
  /** Names the daemon in log lines, e.g. 'server' */
  label: string;
  logger?: Logger;
}

/**
 * Build the definition of one object, or fail on the first resource that
 * cannot be added.
 */
export function buildObjectDefinition(object: Readonly<ObjectDescriptor>, logger?: Logger): Result<ObjectDefinition> {
  const log = logger ?? createLogger('SchemaDefiner');
  const builder = new ObjectDefinitionBuilder({
    id: object.id,
    name: object.name,
    minInstances: object.minInstances,
    maxInstances: object.maxInstances,
  });

  for (const resource of object.resources) {
    const added = builder.addResource(resource);
    if (!added.ok) {
      log.error(`Could not add resource definition (${resource.name} [${resource.id}]) to object definition.`);
      return err(added.error);
    }
  }

  try {
    return ok(builder.build());
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * Define every object of the schema the session does not know yet, in one
 * batch. An object that cannot be built is skipped and the result is false;
 * the remaining objects are still defined. Nothing to define is a success.
 */
export async function defineSchema(
  session: ResourceSession,
  schema: ResourceSchema,
  options: DefineSchemaOptions,
): Promise<boolean> {
  const log = options.logger ?? createLogger('SchemaDefiner');
  const batch: ObjectDefinition[] = [];
  let success = true;

  log.info(`Defining objects on ${options.label}`);

  try {
    for (const object of schema) {
      if (await session.isObjectDefined(object.id)) {
        log.debug(`${object.name} object already defined on ${options.label}`);
        continue;
      }

      const definition = buildObjectDefinition(object, log);
      if (definition.ok) {
        batch.push(definition.value);
      } else {
        log.error(`Skipping ${object.name} [${object.id}]:`, definition.error.message);
        success = false;
      }
    }

    if (batch.length > 0) {
      await session.defineObjects(batch);
    }
  } catch (error) {
    log.error(`Failed to perform define operation on ${options.label}:`, toError(error).message);
    return false;
  }

  return success;
}
