import * as yaml from 'yaml';
import { ExitCode, SourcedDocument, ValidationError } from '../types';
import { PolicyEngine } from '../core/engine';
import { WardenErrorCode, isWardenError } from '../core/errors';
import { Logger } from '../core/logger';
import { loadPolicyFile } from '../core/policy-loader';
import { formatError } from '../core/violations';

export interface ValidateOptions {
  /** Single config file, kept for the older `-c` style invocation */
  config?: string;
  verbose?: boolean;
}

export interface SchemaOptions {
  summary?: boolean;
  json?: boolean;
}

const CATEGORIES = ['actions', 'filters'] as const;
type Category = (typeof CATEGORIES)[number];

function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

function dump(value: unknown): string {
  return yaml.stringify(value).trimEnd();
}

/**
 * Read every file up front. Missing files throw; files that fail to parse
 * are kept with their parse message so they report in order.
 */
function readConfigs(files: readonly string[]): Array<SourcedDocument & { parseError?: string }> {
  return files.map((source) => {
    try {
      return { source, document: loadPolicyFile(source) };
    } catch (error) {
      if (isWardenError(error, WardenErrorCode.PolicyUnparseable)) {
        return { source, document: undefined, parseError: error.message };
      }
      throw error;
    }
  });
}

function describeError(engine: PolicyEngine, document: unknown, error: ValidationError): string {
  const diagnosis = engine.diagnose(document, [error]);
  if (!diagnosis) return ` ${formatError(error)}`;
  return ` ${formatError(diagnosis.error)} (policy: ${diagnosis.policy})`;
}

/**
 * `warden validate`: check policy files, sharing one policy namespace
 * across all of them
 */
export function validateCommand(
  configs: readonly string[],
  options: ValidateOptions,
  engine: PolicyEngine,
  logger: Logger
): ExitCode {
  const files = options.config ? [...configs, options.config] : [...configs];
  if (files.length < 1) {
    logger.error('warden validate: error: no config files specified');
    return ExitCode.Usage;
  }

  const loaded = readConfigs(files);
  const parsed = loaded.filter((entry) => entry.parseError === undefined);
  const results = engine.validateDocuments(parsed);
  let next = 0;

  for (const entry of loaded) {
    if (entry.parseError !== undefined) {
      logger.error(`Configuration invalid: ${entry.source}`);
      logger.error(` ${entry.parseError}`);
      return ExitCode.Invalid;
    }

    const result = results[next++];
    if (result.errors.length === 0) {
      logger.log(`Configuration valid: ${entry.source}`);
      continue;
    }

    logger.error(`Configuration invalid: ${entry.source}`);
    for (const error of result.errors) {
      logger.error(describeError(engine, entry.document, error));
    }
    return ExitCode.Invalid;
  }

  return ExitCode.Success;
}

/**
 * `warden schema`: browse resources, actions and filters.
 *
 * Selector forms: none (all resources), RESOURCE, RESOURCE.CATEGORY and
 * RESOURCE.CATEGORY.ITEM, where CATEGORY is `actions` or `filters`.
 */
export function schemaCommand(
  selector: string | undefined,
  options: SchemaOptions,
  engine: PolicyEngine,
  logger: Logger
): ExitCode {
  if (options.json) {
    logger.log(JSON.stringify(engine.getSchema(), null, 2));
    return ExitCode.Success;
  }

  const vocab = engine.vocabulary();

  if (options.summary) {
    const summary = engine.summary();
    logger.log(`resource count: ${summary.resourceCount}`);
    logger.log(`unique actions: ${summary.uniqueActions}`);
    logger.log(`common actions: ${summary.commonActions}`);
    logger.log(`unique filters: ${summary.uniqueFilters}`);
    logger.log(`common filters: ${summary.commonFilters}`);
    return ExitCode.Success;
  }

  if (!selector) {
    logger.log(dump({ resources: Object.keys(vocab).sort() }));
    return ExitCode.Success;
  }

  const components = selector.split('.').map((part) => part.toLowerCase());
  if (components.length > 3) {
    logger.error(
      `Invalid selector '${selector}'. Max of 3 components in the format RESOURCE.CATEGORY.ITEM`
    );
    return ExitCode.Usage;
  }

  const [resourceName, categoryName, itemName] = components;
  const resource = Object.prototype.hasOwnProperty.call(vocab, resourceName)
    ? vocab[resourceName]
    : undefined;
  if (!resource) {
    logger.error(`${resourceName} is not a valid resource`);
    return ExitCode.Usage;
  }

  if (components.length === 1) {
    logger.log(dump({ [resourceName]: { actions: resource.actions, filters: resource.filters } }));
    return ExitCode.Success;
  }

  if (!isCategory(categoryName)) {
    logger.error(`Valid choices are 'actions' and 'filters'. You supplied '${categoryName}'`);
    return ExitCode.Usage;
  }

  if (components.length === 2) {
    logger.log(dump({ [resourceName]: { [categoryName]: resource[categoryName] } }));
    return ExitCode.Success;
  }

  if (!resource[categoryName].includes(itemName)) {
    logger.error(`${itemName} is not in the ${categoryName} list for resource ${resourceName}`);
    return ExitCode.Usage;
  }

  const doc = resource.docs[categoryName][itemName];
  logger.log(doc ?? 'No help is available for this item.');
  return ExitCode.Success;
}
