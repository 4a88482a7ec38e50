import { ResourceDescriptorSchema, err, ok } from '@ledbridge/types';
import type { ResourceDescriptor, Result } from '@ledbridge/types';
import type { ObjectDefinition } from '@ledbridge/protocol';

export interface ObjectDefinitionHeader {
  id: number;
  name: string;
  minInstances: number;
  maxInstances: number;
}

/**
 * Assembles an object definition one resource at a time.
 */
export class ObjectDefinitionBuilder {
  private readonly header: ObjectDefinitionHeader;
  private readonly resources = new Map<number, ResourceDescriptor>();

  constructor(header: ObjectDefinitionHeader) {
    this.header = { ...header };
  }

  get objectId(): number {
    return this.header.id;
  }

  addResource(resource: ResourceDescriptor): Result<void> {
    const parsed = ResourceDescriptorSchema.safeParse(resource);
    if (!parsed.success) {
      return err(new Error(`Invalid resource ${resource.name} [${resource.id}]: ${parsed.error.message}`));
    }
    if (this.resources.has(parsed.data.id)) {
      return err(new Error(`Resource ${parsed.data.id} already added to object ${this.header.id}`));
    }
    this.resources.set(parsed.data.id, parsed.data);
    return ok(undefined);
  }

  build(): ObjectDefinition {
    if (this.resources.size === 0) {
      throw new Error(`Object ${this.header.id} has no resources`);
    }
    return {
      ...this.header,
      resources: Array.from(this.resources.values()),
    };
  }
}
