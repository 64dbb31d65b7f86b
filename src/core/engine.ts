import {
  Diagnosis,
  DocumentResult,
  SchemaDocument,
  SourcedDocument,
  ValidationError,
  Vocabulary,
  VocabularySummary,
  WardenConfig,
} from '../types';
import { getDefaultConfig, loadConfig } from '../config';
import { loadResources } from '../resources';
import { Logger, defaultLogger } from './logger';
import { Registries } from './registry';
import { SchemaBuilder } from './schema-builder';
import { diagnose } from './specializer';
import { PolicyValidator, checkSchema } from './validator';
import { summarize, vocabulary } from './vocabulary';

/**
 * PolicyEngine - builds the schema once and validates documents against it
 *
 * The compiled validator (which owns the schema) is replaced as a whole on
 * reload: the new one is built completely before the reference is swapped,
 * so a caller never sees a half-built schema.
 */
export class PolicyEngine {
  private validator?: PolicyValidator;
  private registries: Registries;
  private readonly config: WardenConfig;
  private readonly logger: Logger;

  constructor(registries: Registries, config?: WardenConfig, logger: Logger = defaultLogger) {
    this.registries = registries;
    this.config = config ?? getDefaultConfig();
    this.logger = logger;
  }

  private build(registries: Registries): PolicyValidator {
    const started = Date.now();
    const schema = new SchemaBuilder(registries).build(this.config.resourceTypes);
    checkSchema(schema);
    const validator = new PolicyValidator(schema, this.logger);
    const count = Object.keys(schema.definitions.resources).length;
    this.logger.debug(`Built schema for ${count} resource type(s) in ${Date.now() - started}ms`);
    return validator;
  }

  private current(): PolicyValidator {
    if (!this.validator) {
      this.validator = this.build(this.registries);
    }
    return this.validator;
  }

  /**
   * Swap in a new set of registries
   */
  reload(registries: Registries): void {
    const next = this.build(registries);
    this.registries = registries;
    this.validator = next;
  }

  getSchema(): SchemaDocument {
    return this.current().schema;
  }

  getConfig(): WardenConfig {
    return this.config;
  }

  validate(document: unknown): ValidationError[] {
    return this.current().validate(document);
  }

  validateDocuments(documents: readonly SourcedDocument[]): DocumentResult[] {
    return this.current().validateDocuments(documents);
  }

  /**
   * The most specific error for a failed document
   */
  diagnose(document: unknown, errors: readonly ValidationError[]): Diagnosis | undefined {
    return diagnose(document, errors, this.current(), this.logger);
  }

  vocabulary(): Vocabulary {
    return vocabulary(this.registries);
  }

  summary(): VocabularySummary {
    return summarize(this.vocabulary(), {
      actions: this.config.summary.commonActions,
      filters: this.config.summary.commonFilters,
    });
  }
}

/**
 * Create an engine over the built-in resource catalog
 */
export function createPolicyEngine(config?: WardenConfig, logger?: Logger): PolicyEngine {
  return new PolicyEngine(loadResources(), config ?? loadConfig(undefined, logger), logger);
}
