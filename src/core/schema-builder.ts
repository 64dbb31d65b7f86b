import {
  CapabilityFragment,
  ResourceDefinitions,
  SchemaDocument,
  SchemaNode,
} from '../types';
import { Registries, RegistryView } from './registry';
import { escapePointerSegment } from './schema-node';
import { AGE_FILTER_SCHEMA, EVENT_FILTER_SCHEMA, VALUE_FILTER_SCHEMA } from './filter-schemas';

/**
 * Fixed identifier the schema is published under
 */
export const SCHEMA_ID = 'http://schema.warden.dev/v0/policy.json';
export const DRAFT4_META_SCHEMA = 'http://json-schema.org/draft-04/schema#';

/**
 * Policy names: a leading letter, then segments joined by single hyphens,
 * each segment carrying at least one letter
 */
export const POLICY_NAME_PATTERN =
  '^[A-Za-z][A-Za-z0-9]*(-[A-Za-z0-9]*[A-Za-z][A-Za-z0-9]*)*$';

export const POLICY_MODES = [
  'cloudtrail',
  'ec2-instance-state',
  'asg-instance-state',
  'config-rule',
  'periodic',
];

const VALUEKV_REF = '#/definitions/filters/valuekv';

/** Filters whose definitions come from the shared `definitions.filters` section */
const SHARED_FILTERS = new Map([
  ['value', '#/definitions/filters/value'],
  ['event', '#/definitions/filters/event'],
]);

const BOOLEAN_FILTERS = new Set(['and', 'or']);

/**
 * The policy envelope every resource type's policy extends
 */
function policyEnvelope(): SchemaNode {
  return {
    type: 'object',
    required: ['name', 'resource'],
    additionalProperties: false,
    properties: {
      name: { type: 'string', pattern: POLICY_NAME_PATTERN },
      region: { type: 'string' },
      resource: { type: 'string' },
      'max-resources': { type: 'integer' },
      comment: { type: 'string' },
      comments: { type: 'string' },
      description: { type: 'string' },
      tags: { type: 'array', items: { type: 'string' } },
      mode: { $ref: '#/definitions/policy-mode' },
      actions: { type: 'array' },
      filters: { type: 'array' },
      // Server-side query clause; resource types narrow it through `policyProperties`
      query: {
        type: 'array',
        items: { type: 'object', minProperties: 1, maxProperties: 1 },
      },
    },
  };
}

/**
 * The envelope a type's policy is checked against. Types with their own
 * top-level properties get a copy of the shared envelope that lists them,
 * since `additionalProperties: false` would otherwise reject them.
 */
function typeEnvelope(extra: Record<string, SchemaNode>): SchemaNode {
  if (Object.keys(extra).length === 0) {
    return { $ref: '#/definitions/policy' };
  }
  const envelope = policyEnvelope();
  return { ...envelope, properties: { ...envelope.properties, ...extra } };
}

function policyModeSchema(): SchemaNode {
  return {
    type: 'object',
    required: ['type'],
    properties: {
      type: { enum: [...POLICY_MODES] },
      events: {
        type: 'array',
        items: {
          oneOf: [
            { type: 'string' },
            {
              type: 'object',
              required: ['event', 'source', 'ids'],
              properties: {
                source: { type: 'string' },
                ids: { type: 'string' },
                event: { type: 'string' },
              },
            },
          ],
        },
      },
    },
  };
}

function resourceRef(typeName: string, ...segments: string[]): string {
  return `#/definitions/resources/${[typeName, ...segments].map(escapePointerSegment).join('/')}`;
}

/**
 * `anyOf` over the alternatives; draft-4 forbids an empty `anyOf`, and
 * `not: {}` rejects every value just the same
 */
function unionOf(alternatives: SchemaNode[]): SchemaNode {
  return alternatives.length > 0 ? { anyOf: alternatives } : { not: {} };
}

function byName(a: CapabilityFragment, b: CapabilityFragment): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Builds the composite policy schema from a set of registries.
 *
 * The result is a pure function of the registries: the builder never mutates
 * them, and rebuilding from unchanged registries yields an identical document.
 */
export class SchemaBuilder {
  private readonly view: RegistryView;

  constructor(registries: Registries) {
    this.view = new RegistryView(registries);
  }

  /**
   * Build the schema, optionally restricted to a subset of resource types
   */
  build(resourceTypes: Iterable<string> = []): SchemaDocument {
    const only = new Set(resourceTypes);
    const resources: Record<string, ResourceDefinitions> = {};
    const policyRefs: SchemaNode[] = [];

    for (const typeName of this.view.listResourceTypes()) {
      if (only.size > 0 && !only.has(typeName)) continue;
      resources[typeName] = this.buildResource(typeName);
      policyRefs.push({ $ref: resourceRef(typeName, 'policy') });
    }

    return {
      $schema: DRAFT4_META_SCHEMA,
      id: SCHEMA_ID,
      definitions: {
        resources,
        filters: {
          value: VALUE_FILTER_SCHEMA,
          event: EVENT_FILTER_SCHEMA,
          age: AGE_FILTER_SCHEMA,
          // Shortcut form of the value filter: `{key: value}`
          valuekv: { type: 'object', minProperties: 1, maxProperties: 1 },
        },
        policy: policyEnvelope(),
        'policy-mode': policyModeSchema(),
      },
      type: 'object',
      required: ['policies'],
      additionalProperties: false,
      properties: {
        vars: { type: 'object' },
        policies: {
          type: 'array',
          items: unionOf(policyRefs),
        },
      },
    };
  }

  private buildResource(typeName: string): ResourceDefinitions {
    const resource = this.view.resourceType(typeName);
    const { actions, filters } = this.view.fragmentsFor(typeName);
    const definitions: ResourceDefinitions = { actions: {}, filters: {}, policy: {} };

    const actionRefs = this.buildActions(typeName, actions, definitions);
    const filterRefs = this.buildFilters(typeName, filters, definitions);

    definitions.policy = {
      allOf: [
        typeEnvelope(resource.policyProperties),
        {
          properties: {
            resource: { enum: [typeName] },
            filters: { type: 'array', items: unionOf(filterRefs) },
            actions: { type: 'array', items: unionOf(actionRefs) },
          },
        },
      ],
    };
    return definitions;
  }

  private buildActions(
    typeName: string,
    actions: CapabilityFragment[],
    definitions: ResourceDefinitions
  ): SchemaNode[] {
    const refs: SchemaNode[] = [];
    for (const action of actions) {
      definitions.actions[action.name] = action.isAlias
        ? { $ref: resourceRef(typeName, 'actions', action.canonicalName) }
        : action.schema;
      refs.push({ $ref: resourceRef(typeName, 'actions', action.name) });
    }
    // One word action shortcuts
    if (actions.length > 0) {
      refs.push({ enum: actions.map((action) => action.name) });
    }
    return refs;
  }

  private buildFilters(
    typeName: string,
    filters: CapabilityFragment[],
    definitions: ResourceDefinitions
  ): SchemaNode[] {
    const sorted = [...filters].sort(byName);

    const nestedRefs: SchemaNode[] = sorted.map((filter) => ({
      $ref: resourceRef(typeName, 'filters', filter.name),
    }));
    nestedRefs.push({ $ref: VALUEKV_REF });

    const refs: SchemaNode[] = [];
    for (const filter of sorted) {
      definitions.filters[filter.name] = this.filterDefinition(typeName, filter, nestedRefs);
      if (filter.name === 'value' && !filter.isAlias) {
        definitions.filters.valuekv = { $ref: VALUEKV_REF };
      }
      refs.push({ $ref: resourceRef(typeName, 'filters', filter.name) });
    }
    refs.push({ $ref: VALUEKV_REF });
    // One word filter shortcuts
    if (sorted.length > 0) {
      refs.push({ enum: sorted.map((filter) => filter.name) });
    }
    return refs;
  }

  private filterDefinition(
    typeName: string,
    filter: CapabilityFragment,
    nestedRefs: SchemaNode[]
  ): SchemaNode {
    if (filter.isAlias) {
      return { $ref: resourceRef(typeName, 'filters', filter.canonicalName) };
    }
    const shared = SHARED_FILTERS.get(filter.name);
    if (shared !== undefined) {
      return { $ref: shared };
    }
    if (BOOLEAN_FILTERS.has(filter.name)) {
      // `and` and `or` share one shape; the schema checks structure, not logic
      return {
        type: 'object',
        required: [filter.name],
        additionalProperties: false,
        properties: {
          [filter.name]: { type: 'array', items: { anyOf: nestedRefs } },
        },
      };
    }
    return filter.schema;
  }
}

/**
 * Build the composite schema for the given registries
 */
export function buildSchema(
  registries: Registries,
  resourceTypes?: Iterable<string>
): SchemaDocument {
  return new SchemaBuilder(registries).build(resourceTypes);
}
