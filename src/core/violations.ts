import type { ErrorObject } from 'ajv';
import { SchemaViolation, ValidationError } from '../types';
import { splitPointer } from './schema-node';

const UNION_KEYWORDS = new Set(['anyOf', 'oneOf']);

export function isUnionKeyword(keyword: string): boolean {
  return UNION_KEYWORDS.has(keyword);
}

/**
 * Convert one Ajv error, re-rooting its instance path under `prefix`
 */
export function toViolation(raw: ErrorObject, prefix = ''): SchemaViolation {
  const instancePath = prefix + raw.instancePath;
  return {
    kind: 'schema',
    keyword: raw.keyword,
    message: raw.message ?? `failed ${raw.keyword}`,
    instancePath,
    path: splitPointer(instancePath),
    schemaPath: raw.schemaPath,
    params: { ...raw.params },
    instance: raw.data,
    schema: raw.schema,
    context: [],
  };
}

function isWithin(path: string, base: string): boolean {
  return path === base || path.startsWith(`${base}/`);
}

/**
 * Rebuild the error tree from Ajv's flat error list.
 *
 * Ajv emits the errors of every failed union branch immediately before the
 * union's own error. A union error therefore claims the run of preceding,
 * unclaimed errors that sit at or below its instance path. Whatever is left
 * unclaimed is a root error. Union keywords are assumed to stand alone in
 * their schema object, as they do in the generated policy schema.
 */
export function nestErrors(errors: readonly ErrorObject[], prefix = ''): SchemaViolation[] {
  const roots: SchemaViolation[] = [];
  for (const raw of errors) {
    const violation = toViolation(raw, prefix);
    if (isUnionKeyword(violation.keyword)) {
      let start = roots.length;
      while (start > 0 && isWithin(roots[start - 1].instancePath, violation.instancePath)) {
        start--;
      }
      violation.context = roots.splice(start);
    }
    roots.push(violation);
  }
  return roots;
}

/**
 * Human label for a document location, e.g. `policies/0/actions/1`
 */
export function locationOf(violation: SchemaViolation): string {
  return violation.path.length > 0 ? violation.path.join('/') : '(root)';
}

export function formatError(error: ValidationError): string {
  if (error.kind === 'duplicate-name') {
    return error.message;
  }
  const detail = error.params.additionalProperty;
  const suffix = typeof detail === 'string' ? ` '${detail}'` : '';
  return `${locationOf(error)}: ${error.message}${suffix}`;
}
