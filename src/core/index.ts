export { PolicyEngine, createPolicyEngine } from './engine';
export { CapabilityRegistry, Registries, RegistryView, ResourceType } from './registry';
export { SchemaBuilder, buildSchema, SCHEMA_ID, POLICY_NAME_PATTERN } from './schema-builder';
export { PolicyValidator, checkSchema, validate } from './validator';
export { diagnose, specificError } from './specializer';
export { formatError } from './violations';
export { vocabulary, summarize } from './vocabulary';
export { loadPolicyFile } from './policy-loader';
export { WardenError, WardenErrorCode, isWardenError } from './errors';
export { ConsoleLogger, Logger, defaultLogger } from './logger';
