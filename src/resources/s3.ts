import { ResourceType } from '../core/registry';
import {
  andFilter,
  defineCapability,
  eventFilter,
  invokeLambdaAction,
  notifyAction,
  orFilter,
  registerAll,
  removeTagAction,
  tagAction,
  typeSchema,
  valueFilter,
  webhookAction,
} from './common';

const globalGrantsFilter = defineCapability(
  typeSchema('global-grants', {
    allow_website: { type: 'boolean' },
    permissions: {
      type: 'array',
      items: { enum: ['READ', 'WRITE', 'WRITE_ACP', 'READ_ACP', 'FULL_CONTROL'] },
    },
  }),
  'Filter buckets whose ACL grants access to everyone or to any authenticated user.'
);

const missingStatementFilter = defineCapability(
  typeSchema(
    'missing-policy-statement',
    { statement_ids: { type: 'array', items: { type: 'string' } } },
    { aliases: ['missing-statement'] }
  ),
  'Filter buckets whose policy lacks any of the given statement ids.'
);

const encryptionMissingFilter = defineCapability(
  typeSchema('s3-encryption-missing'),
  'Filter buckets without a policy statement that requires encrypted uploads.'
);

const deleteAction = defineCapability(
  typeSchema('delete', { 'remove-contents': { type: 'boolean' } }),
  'Delete buckets, optionally removing their contents first.'
);

const deleteGlobalGrantsAction = defineCapability(
  typeSchema('delete-global-grants', { grantees: { type: 'array', items: { type: 'string' } } }),
  'Strip global grants from bucket ACLs.'
);

const removeTag = removeTagAction(['unmark']);

export function s3(): ResourceType {
  const resource = new ResourceType('s3');

  registerAll(resource.filters, 'value', valueFilter);
  registerAll(resource.filters, 'event', eventFilter);
  registerAll(resource.filters, 'and', andFilter);
  registerAll(resource.filters, 'or', orFilter);
  registerAll(resource.filters, 'global-grants', globalGrantsFilter);
  registerAll(resource.filters, 'missing-policy-statement', missingStatementFilter, [
    'missing-statement',
  ]);
  registerAll(resource.filters, 's3-encryption-missing', encryptionMissingFilter);

  registerAll(resource.actions, 'tag', tagAction, ['mark']);
  registerAll(resource.actions, 'remove-tag', removeTag, ['unmark']);
  registerAll(resource.actions, 'delete', deleteAction);
  registerAll(resource.actions, 'delete-global-grants', deleteGlobalGrantsAction);
  registerAll(resource.actions, 'notify', notifyAction);
  registerAll(resource.actions, 'invoke-lambda', invokeLambdaAction);
  registerAll(resource.actions, 'webhook', webhookAction);

  return resource;
}
