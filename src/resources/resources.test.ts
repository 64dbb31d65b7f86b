import { loadResources } from './index';
import { andFilter, orFilter, typeSchema } from './common';

describe('loadResources', () => {
  it('should register the built-in resource types', () => {
    expect(loadResources().names()).toEqual(['ec2', 'ebs', 's3']);
  });

  it('should return fresh registries on every call', () => {
    const first = loadResources();
    const second = loadResources();

    expect(first.get('ec2')).not.toBe(second.get('ec2'));
  });

  it('should register tag removal aliases per resource type', () => {
    const registries = loadResources();
    const ec2 = registries.get('ec2');
    const s3 = registries.get('s3');

    expect(ec2?.actions.get('untag')).toBe(ec2?.actions.get('remove-tag'));
    expect(s3?.actions.has('unmark')).toBe(true);
    expect(s3?.actions.has('untag')).toBe(false);
  });

  it('should share the common capabilities between resource types', () => {
    const registries = loadResources();

    expect(registries.get('ec2')?.actions.get('notify')).toBe(registries.get('s3')?.actions.get('notify'));
    expect(registries.get('ebs')?.filters.get('value')).toBe(registries.get('s3')?.filters.get('value'));
  });
});

describe('typeSchema', () => {
  it('should describe a typed capability', () => {
    expect(typeSchema('stop', { force: { type: 'boolean' } }, { required: ['force'], aliases: ['halt'] })).toEqual({
      type: 'object',
      additionalProperties: false,
      required: ['type', 'force'],
      properties: {
        type: { enum: ['stop', 'halt'] },
        force: { type: 'boolean' },
      },
    });
  });
});

describe('boolean filters', () => {
  it('should describe a list of nested filters under the operator key', () => {
    expect(orFilter.schema).toEqual({
      type: 'object',
      required: ['or'],
      additionalProperties: false,
      properties: { or: { type: 'array', items: { type: 'object' } } },
    });
    expect(andFilter.schema.required).toEqual(['and']);
  });
});
