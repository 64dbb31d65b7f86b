import { Capability, CapabilityFragment, SchemaNode } from '../types';
import { WardenError, WardenErrorCode } from './errors';

/**
 * Ordered name -> capability mapping.
 *
 * Registering an already registered capability object under a new name makes
 * that name an alias; the first name an object was registered under is its
 * canonical name.
 */
export class CapabilityRegistry {
  private entries: Map<string, Capability> = new Map();
  private canonical: Map<Capability, string> = new Map();

  constructor(private readonly kind: string) {}

  register(name: string, capability: Capability): this {
    if (this.entries.has(name)) {
      throw new WardenError(
        `${this.kind} '${name}' is already registered`,
        WardenErrorCode.DuplicateRegistration
      );
    }
    this.entries.set(name, capability);
    if (!this.canonical.has(capability)) {
      this.canonical.set(capability, name);
    }
    return this;
  }

  get(name: string): Capability | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Canonical name of a registered capability
   */
  canonicalName(capability: Capability): string | undefined {
    return this.canonical.get(capability);
  }

  get size(): number {
    return this.entries.size;
  }

  *[Symbol.iterator](): IterableIterator<[string, Capability]> {
    yield* this.entries;
  }
}

export interface ResourceTypeOptions {
  /** Extra top-level policy properties allowed for this type only */
  policyProperties?: Record<string, SchemaNode>;
}

/**
 * A resource category and the filters and actions available on it
 */
export class ResourceType {
  readonly actions = new CapabilityRegistry('action');
  readonly filters = new CapabilityRegistry('filter');
  readonly policyProperties: Record<string, SchemaNode>;

  constructor(
    public readonly name: string,
    options: ResourceTypeOptions = {}
  ) {
    this.policyProperties = options.policyProperties ?? {};
  }
}

/**
 * The full set of resource types a schema is built from
 */
export class Registries {
  private resources: Map<string, ResourceType> = new Map();

  add(resource: ResourceType): this {
    if (this.resources.has(resource.name)) {
      throw new WardenError(
        `resource '${resource.name}' is already registered`,
        WardenErrorCode.DuplicateRegistration
      );
    }
    this.resources.set(resource.name, resource);
    return this;
  }

  get(name: string): ResourceType | undefined {
    return this.resources.get(name);
  }

  names(): string[] {
    return [...this.resources.keys()];
  }

  values(): ResourceType[] {
    return [...this.resources.values()];
  }
}

/**
 * Read-only view over the registries, resolving aliases by identity
 */
export class RegistryView {
  constructor(private readonly registries: Registries) {}

  listResourceTypes(): string[] {
    return this.registries.names();
  }

  resourceType(typeName: string): ResourceType {
    const resource = this.registries.get(typeName);
    if (!resource) {
      throw new WardenError(`${typeName} is not a valid resource`, WardenErrorCode.UnknownResource);
    }
    return resource;
  }

  fragmentsFor(typeName: string): { actions: CapabilityFragment[]; filters: CapabilityFragment[] } {
    const resource = this.resourceType(typeName);
    return {
      actions: toFragments(resource.actions),
      filters: toFragments(resource.filters),
    };
  }
}

function toFragments(registry: CapabilityRegistry): CapabilityFragment[] {
  const fragments: CapabilityFragment[] = [];
  for (const [name, capability] of registry) {
    const canonicalName = registry.canonicalName(capability) ?? name;
    fragments.push({
      name,
      canonicalName,
      capability,
      schema: capability.schema,
      doc: capability.doc,
      isAlias: canonicalName !== name,
    });
  }
  return fragments;
}
