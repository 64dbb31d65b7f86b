import { SchemaNode } from '../types';

/**
 * Comparison operators understood by value-style filters
 */
export const OPERATORS = [
  'eq',
  'equal',
  'ne',
  'not-equal',
  'gt',
  'greater-than',
  'ge',
  'gte',
  'le',
  'lte',
  'lt',
  'less-than',
  'glob',
  'regex',
  'in',
  'ni',
  'not-in',
  'contains',
  'difference',
  'intersect',
];

export const VALUE_TYPES = [
  'age',
  'integer',
  'expiration',
  'normalize',
  'size',
  'cidr',
  'cidr_size',
  'swap',
  'resource_count',
];

/**
 * Shape of a value-style filter registered under the given type name
 */
export function valueFilterSchema(type: string): SchemaNode {
  return {
    type: 'object',
    additionalProperties: false,
    required: ['type'],
    properties: {
      type: { enum: [type] },
      key: { type: 'string' },
      value_type: { enum: [...VALUE_TYPES] },
      default: { type: 'object' },
      value: {
        oneOf: [
          { type: 'array' },
          { type: 'string' },
          { type: 'boolean' },
          { type: 'number' },
          { type: 'null' },
        ],
      },
      op: { enum: [...OPERATORS] },
    },
  };
}

/** Generic attribute filter, shared by every resource type */
export const VALUE_FILTER_SCHEMA: SchemaNode = valueFilterSchema('value');

/** Value filter applied to the triggering event instead of the resource */
export const EVENT_FILTER_SCHEMA: SchemaNode = valueFilterSchema('event');

/** Base shape of date-threshold filters */
export const AGE_FILTER_SCHEMA: SchemaNode = {
  type: 'object',
  properties: {
    op: { enum: [...OPERATORS] },
    days: { type: 'number', minimum: 0 },
    hours: { type: 'number', minimum: 0 },
    minutes: { type: 'number', minimum: 0 },
  },
};

