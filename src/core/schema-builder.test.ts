import { SchemaBuilder, buildSchema, SCHEMA_ID, DRAFT4_META_SCHEMA } from './schema-builder';
import { checkSchema } from './validator';
import { Registries } from './registry';
import { WardenErrorCode, isWardenError } from './errors';
import { loadResources } from '../resources';
import { sampleRegistries } from '../../tests/helpers/fixtures';

describe('SchemaBuilder', () => {
  describe('build', () => {
    it('should produce identical documents from unchanged registries', () => {
      const registries = loadResources();
      const builder = new SchemaBuilder(registries);

      expect(JSON.stringify(builder.build())).toBe(JSON.stringify(builder.build()));
      expect(JSON.stringify(buildSchema(loadResources()))).toBe(JSON.stringify(builder.build()));
    });

    it('should describe the top-level document', () => {
      const schema = buildSchema(loadResources());

      expect(schema.$schema).toBe(DRAFT4_META_SCHEMA);
      expect(schema.id).toBe(SCHEMA_ID);
      expect(schema.required).toEqual(['policies']);
      expect(schema.additionalProperties).toBe(false);
      expect(schema.properties.policies).toEqual({
        type: 'array',
        items: {
          anyOf: [
            { $ref: '#/definitions/resources/ec2/policy' },
            { $ref: '#/definitions/resources/ebs/policy' },
            { $ref: '#/definitions/resources/s3/policy' },
          ],
        },
      });
    });

    it('should pass the draft-4 meta-schema', () => {
      expect(() => checkSchema(buildSchema(loadResources()))).not.toThrow();
      expect(() => checkSchema(buildSchema(new Registries()))).not.toThrow();
    });

    it('should reject every policy when no resource types are registered', () => {
      const schema = buildSchema(new Registries());

      expect(schema.definitions.resources).toEqual({});
      expect(schema.properties.policies.items).toEqual({ not: {} });
    });

    it('should restrict the build to the requested resource types', () => {
      const schema = new SchemaBuilder(loadResources()).build(['s3']);

      expect(Object.keys(schema.definitions.resources)).toEqual(['s3']);
      expect(schema.properties.policies.items).toEqual({
        anyOf: [{ $ref: '#/definitions/resources/s3/policy' }],
      });
    });

    it('should not mutate the registries', () => {
      const registries = sampleRegistries();
      const before = registries.get('queue')?.actions.names();

      buildSchema(registries);

      expect(registries.get('queue')?.actions.names()).toEqual(before);
    });
  });

  describe('actions', () => {
    it('should point aliases at the canonical definition', () => {
      const { actions } = buildSchema(loadResources()).definitions.resources.ec2;

      expect(actions.untag).toEqual({ $ref: '#/definitions/resources/ec2/actions/remove-tag' });
      expect(actions.unmark).toEqual({ $ref: '#/definitions/resources/ec2/actions/remove-tag' });
      expect(actions['remove-tag'].properties?.type).toEqual({
        enum: ['remove-tag', 'unmark', 'untag'],
      });
    });

    it('should keep registration order and accept one-word shortcuts', () => {
      const schema = buildSchema(sampleRegistries());
      const overlay = schema.definitions.resources.queue.policy.allOf?.[1];

      expect(overlay?.properties?.actions).toEqual({
        type: 'array',
        items: {
          anyOf: [
            { $ref: '#/definitions/resources/queue/actions/purge' },
            { $ref: '#/definitions/resources/queue/actions/drain' },
            { enum: ['purge', 'drain'] },
          ],
        },
      });
    });
  });

  describe('filters', () => {
    it('should sort filters by name and accept the key/value shortcut', () => {
      const schema = buildSchema(loadResources());
      const overlay = schema.definitions.resources.s3.policy.allOf?.[1];
      const names = [
        'and',
        'event',
        'global-grants',
        'missing-policy-statement',
        'missing-statement',
        'or',
        's3-encryption-missing',
        'value',
      ];

      expect(overlay?.properties?.filters?.items).toEqual({
        anyOf: [
          ...names.map((name) => ({ $ref: `#/definitions/resources/s3/filters/${name}` })),
          { $ref: '#/definitions/filters/valuekv' },
          { enum: names },
        ],
      });
    });

    it('should share the value and event filter definitions', () => {
      const { filters } = buildSchema(loadResources()).definitions.resources.ebs;

      expect(filters.value).toEqual({ $ref: '#/definitions/filters/value' });
      expect(filters.event).toEqual({ $ref: '#/definitions/filters/event' });
      expect(filters.valuekv).toEqual({ $ref: '#/definitions/filters/valuekv' });
    });

    it('should let boolean operators nest every filter', () => {
      const schema = buildSchema(sampleRegistries());
      const { filters } = schema.definitions.resources.queue;

      expect(Object.keys(filters)).toEqual(['depth', 'value', 'valuekv']);
      expect(filters.depth.properties?.type).toEqual({ enum: ['depth'] });

      const ebs = buildSchema(loadResources()).definitions.resources.ebs.filters;
      expect(ebs.or).toEqual({
        type: 'object',
        required: ['or'],
        additionalProperties: false,
        properties: {
          or: {
            type: 'array',
            items: {
              anyOf: [
                { $ref: '#/definitions/resources/ebs/filters/and' },
                { $ref: '#/definitions/resources/ebs/filters/event' },
                { $ref: '#/definitions/resources/ebs/filters/fault-tolerant' },
                { $ref: '#/definitions/resources/ebs/filters/instance' },
                { $ref: '#/definitions/resources/ebs/filters/or' },
                { $ref: '#/definitions/resources/ebs/filters/value' },
                { $ref: '#/definitions/filters/valuekv' },
              ],
            },
          },
        },
      });
    });
  });

  describe('policy', () => {
    it('should bind the resource name and overlay per-type properties', () => {
      const { policy } = buildSchema(loadResources()).definitions.resources.ec2;

      expect(policy.allOf?.[0]?.additionalProperties).toBe(false);
      expect(policy.allOf?.[0]?.properties?.name).toEqual(
        buildSchema(loadResources()).definitions.policy.properties?.name
      );
      expect(policy.allOf?.[0]?.properties?.query).toMatchObject({
        items: { additionalProperties: false },
      });
      expect(policy.allOf?.[1]?.properties?.resource).toEqual({ enum: ['ec2'] });
    });

    it('should reference the shared envelope for types without extra properties', () => {
      const schema = buildSchema(loadResources());

      expect(schema.definitions.resources.s3.policy.allOf?.[0]).toEqual({
        $ref: '#/definitions/policy',
      });
      expect(schema.definitions.policy.properties?.query).toEqual({
        type: 'array',
        items: { type: 'object', minProperties: 1, maxProperties: 1 },
      });
    });
  });
});

describe('checkSchema', () => {
  it('should fail on a malformed schema', () => {
    const schema = buildSchema(sampleRegistries());
    const broken = { ...schema, properties: { policies: { type: 'list' } } };

    let caught: unknown;
    try {
      checkSchema(broken);
    } catch (error) {
      caught = error;
    }

    expect(isWardenError(caught, WardenErrorCode.SchemaInvalid)).toBe(true);
  });
});
