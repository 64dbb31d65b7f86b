import { SchemaNode } from '../types';
import { ResourceType } from '../core/registry';
import {
  andFilter,
  defineCapability,
  eventFilter,
  invokeLambdaAction,
  markedForOpFilter,
  markForOpAction,
  notifyAction,
  orFilter,
  registerAll,
  removeTagAction,
  tagAction,
  tagCountFilter,
  typeSchema,
  valueFilter,
  webhookAction,
} from './common';
import { AGE_FILTER_SCHEMA } from '../core/filter-schemas';

/** Attributes the instance API can filter on server side */
const QUERY_KEYS = [
  'architecture',
  'image-id',
  'instance-id',
  'instance-state-name',
  'instance-type',
  'tag-key',
  'tag-value',
  'vpc-id',
];

const instanceAgeFilter = defineCapability(
  {
    ...AGE_FILTER_SCHEMA,
    additionalProperties: false,
    required: ['type'],
    properties: {
      ...AGE_FILTER_SCHEMA.properties,
      type: { enum: ['instance-age'] },
    },
  },
  'Filter instances by the time elapsed since launch.'
);

const stopAction = defineCapability(
  typeSchema('stop', { hibernate: { type: 'boolean' } }),
  'Stop running instances.'
);

const startAction = defineCapability(typeSchema('start'), 'Start stopped instances.');

const terminateAction = defineCapability(
  typeSchema('terminate', { force: { type: 'boolean' } }),
  'Terminate instances. With `force`, termination protection is disabled first.'
);

const removeTag = removeTagAction(['unmark', 'untag']);

export function ec2(): ResourceType {
  const resource = new ResourceType('ec2', {
    policyProperties: {
      query: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: Object.fromEntries(
            QUERY_KEYS.map((key): [string, SchemaNode] => [key, {}])
          ),
        },
      },
    },
  });

  registerAll(resource.filters, 'value', valueFilter);
  registerAll(resource.filters, 'event', eventFilter);
  registerAll(resource.filters, 'and', andFilter);
  registerAll(resource.filters, 'or', orFilter);
  registerAll(resource.filters, 'instance-age', instanceAgeFilter);
  registerAll(resource.filters, 'marked-for-op', markedForOpFilter);
  registerAll(resource.filters, 'tag-count', tagCountFilter);

  registerAll(resource.actions, 'start', startAction);
  registerAll(resource.actions, 'stop', stopAction);
  registerAll(resource.actions, 'terminate', terminateAction);
  registerAll(resource.actions, 'mark-for-op', markForOpAction);
  registerAll(resource.actions, 'tag', tagAction, ['mark']);
  registerAll(resource.actions, 'remove-tag', removeTag, ['unmark', 'untag']);
  registerAll(resource.actions, 'notify', notifyAction);
  registerAll(resource.actions, 'invoke-lambda', invokeLambdaAction);
  registerAll(resource.actions, 'webhook', webhookAction);

  return resource;
}
