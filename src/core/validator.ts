import Ajv from 'ajv-draft-04';
import addFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import {
  DocumentResult,
  DuplicateNameViolation,
  SchemaDocument,
  SourcedDocument,
  ValidationError,
} from '../types';
import { WardenError, WardenErrorCode } from './errors';
import { Logger, defaultLogger } from './logger';
import { Registries } from './registry';
import { buildSchema } from './schema-builder';
import { isMapping } from './schema-node';
import { BranchResolver, diagnose } from './specializer';
import { nestErrors } from './violations';

function createAjv(): Ajv {
  const ajv = new Ajv({
    allErrors: true,
    verbose: true,
    // Resource definitions are keyed by type name, not by schema keyword
    strict: false,
  });
  addFormats(ajv);
  return ajv;
}

function compile(ajv: Ajv, schema: SchemaDocument): ValidateFunction {
  try {
    return ajv.compile(schema);
  } catch (error) {
    throw new WardenError(
      `Schema failed to compile: ${error instanceof Error ? error.message : String(error)}`,
      WardenErrorCode.SchemaInvalid
    );
  }
}

/**
 * Check a generated schema against the draft-4 meta-schema.
 * A failure here is a registry or builder defect, never a user error.
 */
export function checkSchema(schema: SchemaDocument): void {
  const ajv = createAjv();
  if (ajv.validateSchema(schema) !== true) {
    throw new WardenError(
      `Generated schema is invalid: ${ajv.errorsText(ajv.errors)}`,
      WardenErrorCode.SchemaInvalid
    );
  }
}

/**
 * Names of all well-formed policies in a document, in document order
 */
export function policyNames(document: unknown): string[] {
  if (!isMapping(document) || !Array.isArray(document.policies)) return [];
  const names: string[] = [];
  for (const policy of document.policies) {
    if (isMapping(policy) && typeof policy.name === 'string') {
      names.push(policy.name);
    }
  }
  return names;
}

/**
 * Names occurring more than once, in order of first appearance
 */
export function duplicateNames(names: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([name]) => name);
}

export function duplicateNameViolation(names: string[]): DuplicateNameViolation {
  return {
    kind: 'duplicate-name',
    names,
    message: `Only one policy with a given name allowed, duplicates: ${names.join(', ')}`,
  };
}

/**
 * Validates policy documents against one compiled schema.
 *
 * Instances are immutable once constructed and safe to share between
 * concurrent callers.
 */
export class PolicyValidator implements BranchResolver {
  private readonly ajv: Ajv;
  private readonly check: ValidateFunction;

  constructor(
    public readonly schema: SchemaDocument,
    private readonly logger: Logger = defaultLogger
  ) {
    this.ajv = createAjv();
    this.check = compile(this.ajv, schema);
  }

  /**
   * Structural errors if any; otherwise at most one duplicate-name error
   */
  validate(document: unknown): ValidationError[] {
    if (this.check(document) !== true) {
      return nestErrors(this.check.errors ?? []);
    }
    const dupes = duplicateNames(policyNames(document));
    return dupes.length > 0 ? [duplicateNameViolation(dupes)] : [];
  }

  /**
   * Validate several documents that share one policy namespace.
   * A name already used by an earlier document is reported on the later one.
   */
  validateDocuments(documents: readonly SourcedDocument[]): DocumentResult[] {
    const used = new Set<string>();
    return documents.map(({ source, document }) => {
      const errors = this.validate(document);
      const names = new Set(policyNames(document));
      const dupes = [...names].filter((name) => used.has(name));
      if (dupes.length > 0) {
        errors.push(duplicateNameViolation(dupes));
      }
      names.forEach((name) => used.add(name));

      const result: DocumentResult = { source, errors };
      if (errors.length > 0) {
        result.diagnosis = diagnose(document, errors, this, this.logger);
      }
      return result;
    });
  }

  validateRef(ref: string, instance: unknown): ErrorObject[] | undefined {
    const check = this.ajv.getSchema(`${this.schema.id}${ref}`);
    if (!check) return undefined;
    if (check(instance) === true) return [];
    return check.errors ?? [];
  }
}

/**
 * Validate a document against `schema`, or against a freshly built and
 * self-checked schema for `registries` when none is given
 */
export function validate(
  registries: Registries,
  document: unknown,
  schema?: SchemaDocument
): ValidationError[] {
  let effective = schema;
  if (effective === undefined) {
    effective = buildSchema(registries);
    checkSchema(effective);
  }
  return new PolicyValidator(effective).validate(document);
}
