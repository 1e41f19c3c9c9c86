/**
 * Field-by-field parsing for configuration objects.
 *
 * Each field is parsed on its own so that one bad value does not hide the others,
 * and so cross-field checks can tell which of their inputs failed.
 */

import { z } from 'zod';
import type { ZodTypeAny } from 'zod';

import type { FieldError } from './errors.js';

export type FieldShape = Record<string, ZodTypeAny>;

export type ParsedFields<S extends FieldShape> = { [K in keyof S]?: z.output<S[K]> };

export interface FieldParseResult<S extends FieldShape> {
  values: ParsedFields<S>;
  failed: Set<keyof S>;
  errors: FieldError[];
}

export type Validated<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] };

export const nonEmptyString = z.string().trim().min(1, 'must not be empty');

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Quote a mapping key the way tree paths display it: definitions['Bluray-480p'] */
export function keyPath(tree: string, key: string): string {
  return `${tree}[${JSON.stringify(key).replace(/^"|"$/g, "'")}]`;
}

export function issuePath(tree: string, path: Array<string | number>): string {
  return path.reduce<string>(
    (acc, part) => (typeof part === 'number' ? `${acc}[${part}]` : `${acc}.${part}`),
    tree
  );
}

export function parseFields<S extends FieldShape>(shape: S, raw: unknown, tree: string): FieldParseResult<S> {
  const values: ParsedFields<S> = {};
  const failed = new Set<keyof S>();
  const errors: FieldError[] = [];

  // An empty YAML block parses as if every field was omitted
  let input: Record<string, unknown> = {};
  if (isRecord(raw)) {
    input = raw;
  } else if (raw !== undefined && raw !== null) {
    errors.push({ path: tree, message: `expected a mapping, got ${describe(raw)}` });
    for (const key in shape) failed.add(key);
    return { values, failed, errors };
  }

  for (const key of Object.keys(input)) {
    if (!(key in shape)) {
      errors.push({ path: `${tree}.${key}`, message: 'unknown field' });
    }
  }

  for (const key in shape) {
    const result = shape[key].safeParse(input[key]);
    if (result.success) {
      values[key] = result.data;
      continue;
    }
    failed.add(key);
    for (const issue of result.error.issues) {
      errors.push({ path: issuePath(`${tree}.${key}`, issue.path), message: issue.message });
    }
  }

  return { values, failed, errors };
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'a list';
  return typeof value;
}
