import { summarize, vocabulary } from './vocabulary';
import { loadResources } from '../resources';
import { sampleRegistries } from '../../tests/helpers/fixtures';

describe('vocabulary', () => {
  it('should list sorted actions and filters per resource type', () => {
    const vocab = vocabulary(loadResources());

    expect(Object.keys(vocab)).toEqual(['ec2', 'ebs', 's3']);
    expect(vocab.ebs.actions).toEqual(['delete', 'mark', 'notify', 'remove-tag', 'snapshot', 'tag', 'unmark']);
    expect(vocab.ebs.filters).toEqual(['and', 'event', 'fault-tolerant', 'instance', 'or', 'value']);
  });

  it('should carry the help text of each capability', () => {
    const vocab = vocabulary(loadResources());

    expect(vocab.ec2.docs.filters['tag-count']).toBe(
      'Filter resources by the number of user-defined tags they carry.'
    );
    expect(vocab.ec2.docs.actions.untag).toBe('Remove tags from the matched resources.');
  });

  it('should map missing help text to null', () => {
    const vocab = vocabulary(loadResources());

    expect(vocab.ebs.docs.filters['fault-tolerant']).toBeNull();
    expect(vocabulary(sampleRegistries()).queue.docs.filters.depth).toBeNull();
  });
});

describe('summarize', () => {
  it('should count capabilities outside the common sets', () => {
    const summary = summarize(vocabulary(loadResources()), {
      actions: ['notify', 'invoke-lambda'],
      filters: ['value', 'and', 'or', 'event'],
    });

    expect(summary).toEqual({
      resourceCount: 3,
      uniqueActions: 23,
      commonActions: 2,
      uniqueFilters: 9,
      commonFilters: 4,
    });
  });

  it('should count everything as unique without common sets', () => {
    const summary = summarize(vocabulary(sampleRegistries()), { actions: [], filters: [] });

    expect(summary).toEqual({
      resourceCount: 1,
      uniqueActions: 2,
      commonActions: 0,
      uniqueFilters: 2,
      commonFilters: 0,
    });
  });
});
