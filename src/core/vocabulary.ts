import { ResourceVocabulary, Vocabulary, VocabularySummary } from '../types';
import { CapabilityRegistry, Registries } from './registry';

function listing(registry: CapabilityRegistry): { names: string[]; docs: Record<string, string | null> } {
  const docs: Record<string, string | null> = {};
  for (const [name, capability] of registry) {
    docs[name] = capability.doc.trim() === '' ? null : capability.doc;
  }
  return { names: registry.names().sort(), docs };
}

/**
 * Resource type -> available actions and filters, with their help text
 */
export function vocabulary(registries: Registries): Vocabulary {
  const result: Vocabulary = {};
  for (const resource of registries.values()) {
    const actions = listing(resource.actions);
    const filters = listing(resource.filters);
    const entry: ResourceVocabulary = {
      actions: actions.names,
      filters: filters.names,
      docs: { actions: actions.docs, filters: filters.docs },
    };
    result[resource.name] = entry;
  }
  return result;
}

/**
 * Count unique and shared capabilities across all resource types
 */
export function summarize(
  vocab: Vocabulary,
  common: { actions: readonly string[]; filters: readonly string[] }
): VocabularySummary {
  const commonActions = new Set(common.actions);
  const commonFilters = new Set(common.filters);
  let uniqueActions = 0;
  let uniqueFilters = 0;

  for (const entry of Object.values(vocab)) {
    uniqueActions += entry.actions.filter((name) => !commonActions.has(name)).length;
    uniqueFilters += entry.filters.filter((name) => !commonFilters.has(name)).length;
  }

  return {
    resourceCount: Object.keys(vocab).length,
    uniqueActions,
    commonActions: commonActions.size,
    uniqueFilters,
    commonFilters: commonFilters.size,
  };
}
