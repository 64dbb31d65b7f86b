import { Capability, SchemaNode } from '../types';
import { CapabilityRegistry } from '../core/registry';
import { OPERATORS, valueFilterSchema } from '../core/filter-schemas';

export interface TypeSchemaOptions {
  required?: string[];
  /** Alternate `type` values accepted by the same implementation */
  aliases?: string[];
}

/**
 * Schema of a filter or action configured as `{type: <name>, ...properties}`
 */
export function typeSchema(
  type: string,
  properties: Record<string, SchemaNode> = {},
  options: TypeSchemaOptions = {}
): SchemaNode {
  return {
    type: 'object',
    additionalProperties: false,
    required: ['type', ...(options.required ?? [])],
    properties: {
      type: { enum: [type, ...(options.aliases ?? [])] },
      ...properties,
    },
  };
}

export function defineCapability(schema: SchemaNode, doc = ''): Capability {
  return Object.freeze({ schema, doc });
}

/**
 * Register a capability under its name and every alias
 */
export function registerAll(
  registry: CapabilityRegistry,
  name: string,
  capability: Capability,
  aliases: readonly string[] = []
): void {
  registry.register(name, capability);
  for (const alias of aliases) {
    registry.register(alias, capability);
  }
}

const stringArray: SchemaNode = { type: 'array', items: { type: 'string' } };

// Filters available on every resource type

export const valueFilter = defineCapability(
  valueFilterSchema('value'),
  'Generic attribute filter.\n\nCompares the value found at `key` on the resource against `value` using `op`.'
);

export const eventFilter = defineCapability(
  valueFilterSchema('event'),
  'Filter against the event that triggered the policy, rather than the resource.'
);

/**
 * `{<op>: [filter, ...]}`. When the schema is built, `items` is widened to
 * every filter registered on the resource type.
 */
function booleanFilterSchema(op: string): SchemaNode {
  return {
    type: 'object',
    required: [op],
    additionalProperties: false,
    properties: {
      [op]: { type: 'array', items: { type: 'object' } },
    },
  };
}

export const orFilter = defineCapability(
  booleanFilterSchema('or'),
  'Match resources that satisfy any of the nested filters.'
);

export const andFilter = defineCapability(
  booleanFilterSchema('and'),
  'Match resources that satisfy all of the nested filters.'
);

export const markedForOpFilter = defineCapability(
  typeSchema('marked-for-op', {
    tag: { type: 'string' },
    op: { type: 'string' },
    skew: { type: 'number', minimum: 0 },
  }),
  'Filter resources whose marker tag schedules an operation that is now due.'
);

export const tagCountFilter = defineCapability(
  typeSchema('tag-count', {
    count: { type: 'integer', minimum: 0 },
    op: { enum: [...OPERATORS] },
  }),
  'Filter resources by the number of user-defined tags they carry.'
);

// Actions available on every resource type

export const notifyAction = defineCapability(
  typeSchema(
    'notify',
    {
      to: stringArray,
      subject: { type: 'string' },
      template: { type: 'string' },
      transport: { type: 'object' },
    },
    { required: ['to'] }
  ),
  'Send a notification about the matched resources.'
);

export const invokeLambdaAction = defineCapability(
  typeSchema(
    'invoke-lambda',
    {
      function: { type: 'string' },
      qualifier: { type: 'string' },
      async: { type: 'boolean' },
      batch_size: { type: 'integer', minimum: 1 },
    },
    { required: ['function'] }
  ),
  'Invoke a serverless function with the matched resources as payload.'
);

export const webhookAction = defineCapability(
  typeSchema(
    'webhook',
    {
      url: { type: 'string', format: 'uri' },
      method: { enum: ['GET', 'POST', 'PUT'] },
      batch: { type: 'boolean' },
    },
    { required: ['url'] }
  ),
  'Post the matched resources to an HTTP endpoint.'
);

export const tagAction = defineCapability(
  typeSchema(
    'tag',
    {
      key: { type: 'string' },
      value: { type: 'string' },
      tags: { type: 'object' },
    },
    { aliases: ['mark'] }
  ),
  'Apply one or more tags to the matched resources.'
);

export const markForOpAction = defineCapability(
  typeSchema(
    'mark-for-op',
    {
      tag: { type: 'string' },
      msg: { type: 'string' },
      op: { type: 'string' },
      days: { type: 'number', minimum: 0 },
    },
    { required: ['op'] }
  ),
  'Tag resources for a future operation, to be picked up by a `marked-for-op` filter.'
);

/**
 * Tag removal; resource types differ in which alternate names they accept,
 * so each gets its own implementation
 */
export function removeTagAction(aliases: string[]): Capability {
  return defineCapability(
    typeSchema('remove-tag', { tags: stringArray }, { aliases }),
    'Remove tags from the matched resources.'
  );
}
