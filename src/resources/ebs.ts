import { ResourceType } from '../core/registry';
import { valueFilterSchema } from '../core/filter-schemas';
import {
  andFilter,
  defineCapability,
  eventFilter,
  notifyAction,
  orFilter,
  registerAll,
  removeTagAction,
  tagAction,
  typeSchema,
  valueFilter,
} from './common';

const instanceFilter = defineCapability(
  valueFilterSchema('instance'),
  'Filter volumes by attributes of the instance they are attached to.'
);

// Undocumented
const faultTolerantFilter = defineCapability(
  typeSchema('fault-tolerant', { tolerant: { type: 'boolean' } })
);

const snapshotAction = defineCapability(
  typeSchema('snapshot', { 'copy-tags': { type: 'array', items: { type: 'string' } } }),
  'Snapshot the matched volumes.'
);

const deleteAction = defineCapability(
  typeSchema('delete', { force: { type: 'boolean' } }),
  'Delete the matched volumes.'
);

const removeTag = removeTagAction(['unmark']);

export function ebs(): ResourceType {
  const resource = new ResourceType('ebs');

  registerAll(resource.filters, 'value', valueFilter);
  registerAll(resource.filters, 'event', eventFilter);
  registerAll(resource.filters, 'and', andFilter);
  registerAll(resource.filters, 'or', orFilter);
  registerAll(resource.filters, 'instance', instanceFilter);
  registerAll(resource.filters, 'fault-tolerant', faultTolerantFilter);

  registerAll(resource.actions, 'snapshot', snapshotAction);
  registerAll(resource.actions, 'delete', deleteAction);
  registerAll(resource.actions, 'tag', tagAction, ['mark']);
  registerAll(resource.actions, 'remove-tag', removeTag, ['unmark']);
  registerAll(resource.actions, 'notify', notifyAction);

  return resource;
}
