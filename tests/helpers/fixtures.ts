import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Registries, ResourceType } from '../../src/core/registry';
import { defineCapability, registerAll, typeSchema, valueFilter } from '../../src/resources/common';

/** An ec2 policy that matches the built-in catalog */
export const validPolicy = {
  name: 'stop-old-instances',
  resource: 'ec2',
  filters: [{ 'tag:owner': 'absent' }, { type: 'instance-age', days: 30 }],
  actions: ['stop', { type: 'tag', key: 'owner', value: 'team-a' }],
};

/** `untag` exists on ec2 but not on s3 */
export const s3UntagDocument = {
  policies: [
    {
      name: 'foo',
      resource: 's3',
      filters: [{ 'tag:cleanup_tagging': 'not-null' }],
      actions: [{ type: 'untag', tags: ['cleanup'] }],
    },
  ],
};

/**
 * Small registry set: one resource type with an aliased action
 */
export function sampleRegistries(): Registries {
  const queue = new ResourceType('queue');
  const purge = defineCapability(
    typeSchema('purge', {}, { aliases: ['drain'] }),
    'Purge messages.'
  );
  const depth = defineCapability(typeSchema('depth', { min: { type: 'integer' } }));

  registerAll(queue.filters, 'value', valueFilter);
  registerAll(queue.filters, 'depth', depth);
  registerAll(queue.actions, 'purge', purge, ['drain']);

  return new Registries().add(queue);
}

export interface TempDir {
  dir: string;
  write: (name: string, content: string) => string;
  cleanup: () => void;
}

/**
 * Temporary directory for files a test writes; removed by `cleanup`
 */
export function createTempDir(): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-test-'));
  return {
    dir,
    write: (name, content) => {
      const file = path.join(dir, name);
      fs.writeFileSync(file, content);
      return file;
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
