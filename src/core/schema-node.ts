import { SchemaNode } from '../types';

export interface RefTarget {
  ref: string;
  segments: string[];
}

/**
 * The target of a `$ref` node, split into pointer segments
 */
export function refTarget(node: SchemaNode): RefTarget | undefined {
  if (node.$ref === undefined) return undefined;
  return { ref: node.$ref, segments: refSegments(node.$ref) };
}

/**
 * Split a local `$ref` (`#/definitions/a/b`) into decoded pointer segments
 */
export function refSegments(ref: string): string[] {
  const hash = ref.indexOf('#');
  const pointer = hash >= 0 ? ref.slice(hash + 1) : ref;
  return splitPointer(pointer);
}

/**
 * Decode a JSON pointer (`/a/b~1c`) into its segments
 */
export function splitPointer(pointer: string): string[] {
  if (pointer === '' || pointer === '/') return [];
  return pointer
    .replace(/^\//, '')
    .split('/')
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

export function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSchemaNode(value: unknown): value is SchemaNode {
  return isMapping(value);
}

/**
 * Read a union keyword's alternatives back out of an error payload
 */
export function asAlternatives(value: unknown): SchemaNode[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const alternatives: SchemaNode[] = [];
  for (const item of value) {
    if (!isSchemaNode(item)) return undefined;
    alternatives.push(item);
  }
  return alternatives;
}
