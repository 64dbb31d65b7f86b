import type { ErrorObject } from 'ajv';
import { Diagnosis, SchemaViolation, ValidationError } from '../types';
import { Logger, defaultLogger } from './logger';
import { RefTarget, asAlternatives, isMapping, refTarget } from './schema-node';
import { isUnionKeyword, nestErrors } from './violations';

/**
 * Re-validates a value against one branch of the schema
 */
export interface BranchResolver {
  /**
   * Validate `instance` against the schema at a local `$ref`.
   * Returns undefined when the reference cannot be resolved.
   */
  validateRef(ref: string, instance: unknown): ErrorObject[] | undefined;
}

/**
 * Pick the union alternative the instance was meant to match, using the
 * same discriminators a reader would: `resource` on policies, `type` on
 * filters and actions.
 */
function selectBranch(instance: Record<string, unknown>, alternatives: unknown): string | undefined {
  const nodes = asAlternatives(alternatives);
  if (!nodes) return undefined;

  const refs: RefTarget[] = [];
  for (const node of nodes) {
    const target = refTarget(node);
    if (target) refs.push(target);
  }

  const resource = instance.resource;
  if (typeof resource === 'string') {
    // #/definitions/resources/<resource>/policy
    const match = refs.find((r) => r.segments[r.segments.length - 2] === resource);
    if (match) return match.ref;
  }

  const type = instance.type;
  if (typeof type === 'string') {
    // #/definitions/resources/<resource>/{actions,filters}/<type>
    const match = refs.find((r) => r.segments[r.segments.length - 1] === type);
    if (match) return match.ref;
  }

  return undefined;
}

/**
 * Narrow a failed `anyOf`/`oneOf` to the first error of its intended branch.
 * Returns undefined when the union cannot be narrowed.
 */
export function narrowUnion(
  error: SchemaViolation,
  resolver: BranchResolver,
  logger: Logger = defaultLogger
): SchemaViolation | undefined {
  if (!isUnionKeyword(error.keyword) || !isMapping(error.instance)) return undefined;

  const ref = selectBranch(error.instance, error.schema);
  if (ref === undefined) return undefined;

  let raw: ErrorObject[] | undefined;
  try {
    raw = resolver.validateRef(ref, error.instance);
  } catch (e) {
    logger.debug(`Could not re-validate against ${ref}: ${e}`);
    return undefined;
  }
  if (!raw || raw.length === 0) return undefined;

  const [first] = nestErrors(raw, error.instancePath);
  return first;
}

/**
 * Find the error a human should fix first.
 *
 * Generic union failures only say "matched none of N alternatives"; this walks
 * down through the discriminated branches to the specific cause. Anything
 * that cannot be narrowed is returned unchanged.
 */
export function specificError(
  error: SchemaViolation,
  resolver: BranchResolver,
  logger: Logger = defaultLogger
): SchemaViolation {
  const narrowed = narrowUnion(error, resolver, logger);
  return narrowed === undefined ? error : specificError(narrowed, resolver, logger);
}

/**
 * Name of the policy a document path points into, or `unknown`
 */
export function policyNameAt(document: unknown, path: readonly string[]): string {
  if (!isMapping(document) || path[0] !== 'policies' || path.length < 2) return 'unknown';
  const policies = document.policies;
  if (!Array.isArray(policies)) return 'unknown';
  const policy: unknown = policies[Number(path[1])];
  if (isMapping(policy) && typeof policy.name === 'string') return policy.name;
  return 'unknown';
}

/**
 * Reduce a failed validation to its best single error
 */
export function diagnose(
  document: unknown,
  errors: readonly ValidationError[],
  resolver: BranchResolver,
  logger: Logger = defaultLogger
): Diagnosis | undefined {
  const [first] = errors;
  if (first === undefined) return undefined;
  if (first.kind === 'duplicate-name') {
    return { error: first, policy: first.names.join(', ') };
  }
  const error = specificError(first, resolver, logger);
  return { error, policy: policyNameAt(document, error.path) };
}
