/**
 * Attribute-level comparison between a local object and its remote-decoded counterpart.
 * Decides whether an update is needed and logs each difference as `tree.key: old -> new`.
 */

import { isDeepStrictEqual } from 'node:util';

import type { Logger } from './logger.js';

export interface AttrField<L, R> {
  attr: keyof L & string;
  key: string;                       // name in the configuration document
  remote: keyof R & string;          // name in the API resource
  equals?: (local: L, remote: L) => boolean;
}

export interface AttrChange<R> {
  key: string;
  remote: keyof R & string;
  from: unknown;
  to: unknown;
}

export function diffAttrs<L, R>(
  tree: string,
  local: L,
  remote: L,
  fields: ReadonlyArray<AttrField<L, R>>,
  logger: Logger
): AttrChange<R>[] {
  const changes: AttrChange<R>[] = [];
  for (const field of fields) {
    const from = remote[field.attr];
    const to = local[field.attr];
    const same = field.equals ? field.equals(local, remote) : isDeepStrictEqual(to, from);
    if (same) {
      logger.debug(`${tree}.${field.key}: ${formatValue(to)} (up to date)`);
      continue;
    }
    logger.info(`${tree}.${field.key}: ${formatValue(from)} -> ${formatValue(to)}`);
    changes.push({ key: field.key, remote: field.remote, from, to });
  }
  return changes;
}

export function logCreatedAttrs<L, R>(
  tree: string,
  local: L,
  fields: ReadonlyArray<AttrField<L, R>>,
  logger: Logger
) {
  for (const field of fields) {
    logger.info(`${tree}.${field.key}: ${formatValue(local[field.attr])}`);
  }
}

/** Copy the changed attributes out of a fully encoded resource. */
export function pickChanged<R>(encoded: R, changes: ReadonlyArray<AttrChange<R>>): Partial<R> {
  const out: Partial<R> = {};
  for (const change of changes) {
    out[change.remote] = encoded[change.remote];
  }
  return out;
}

export function formatValue(value: unknown): string {
  if (value === undefined) return 'null';
  return JSON.stringify(value, (_key, v: unknown) => (v instanceof Set ? [...v] : v));
}
