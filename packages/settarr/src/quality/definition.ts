/**
 * Quality definitions: per-quality size bounds in megabytes per minute.
 */

import { z } from 'zod';

import type { FieldError } from '../errors.js';
import type { AttrField } from '../remoteAttrs.js';
import type { SonarrQualityDefinition } from '../sonarr/types.js';
import { parseFields } from '../validation.js';
import type { Validated } from '../validation.js';

export const QUALITYDEFINITION_PREFERRED_MAX = 1000;
export const QUALITYDEFINITION_MAX = 1000;

export interface QualityDefinition {
  title?: string;        // unset means the quality's own name
  min: number;
  preferred?: number;    // unset means unbounded
  max?: number;          // unset means unbounded
}

export type EncodedQualityDefinition = Pick<SonarrQualityDefinition, 'title' | 'minSize' | 'preferredSize' | 'maxSize'>;

const definitionFields = {
  title: z.string().nullish(),
  min: z.number().min(0).max(QUALITYDEFINITION_MAX - 1),
  preferred: z.number().min(0).max(QUALITYDEFINITION_PREFERRED_MAX).nullish(),
  max: z.number().min(1).max(QUALITYDEFINITION_MAX).nullish(),
};

/**
 * Values at or above the upper bound mean "no limit".
 */
function normalizeBound(value: number | null | undefined, upper: number): number | undefined {
  if (value === null || value === undefined || value >= upper) return undefined;
  return value;
}

export function parseQualityDefinition(raw: unknown, tree: string): Validated<QualityDefinition> {
  const { values, failed, errors } = parseFields(definitionFields, raw, tree);

  const preferred = normalizeBound(values.preferred, QUALITYDEFINITION_PREFERRED_MAX);
  if (preferred !== undefined && values.min !== undefined && preferred - values.min < 1) {
    errors.push(boundError(tree, 'preferred', preferred, 'min', values.min));
    failed.add('preferred');
  }

  const max = normalizeBound(values.max, QUALITYDEFINITION_MAX);
  if (max !== undefined && !failed.has('preferred')) {
    const ceiling = preferred ?? QUALITYDEFINITION_PREFERRED_MAX;
    if (max - ceiling < 1) {
      errors.push(boundError(tree, 'max', max, 'preferred', ceiling));
    }
  }

  if (errors.length > 0 || values.min === undefined) return { ok: false, errors };
  return {
    ok: true,
    value: { title: values.title || undefined, min: values.min, preferred, max },
  };
}

function boundError(tree: string, field: string, value: number, other: string, otherValue: number): FieldError {
  return {
    path: `${tree}.${field}`,
    message: `'${field}' (${value}) is not at least 1 greater than '${other}' (${otherValue})`,
  };
}

export function decodeQualityDefinition(json: SonarrQualityDefinition): QualityDefinition {
  return {
    title: json.title && json.title !== json.quality.name ? json.title : undefined,
    min: json.minSize,
    preferred: normalizeBound(json.preferredSize, QUALITYDEFINITION_PREFERRED_MAX),
    max: normalizeBound(json.maxSize, QUALITYDEFINITION_MAX),
  };
}

export function encodeQualityDefinition(qualityName: string, definition: QualityDefinition): EncodedQualityDefinition {
  return {
    title: definition.title || qualityName,
    minSize: definition.min,
    preferredSize: definition.preferred ?? QUALITYDEFINITION_PREFERRED_MAX,
    maxSize: definition.max ?? null,
  };
}

export const QUALITY_DEFINITION_ATTRS: ReadonlyArray<AttrField<QualityDefinition, EncodedQualityDefinition>> = [
  { attr: 'title', key: 'title', remote: 'title' },
  { attr: 'min', key: 'min', remote: 'minSize' },
  { attr: 'preferred', key: 'preferred', remote: 'preferredSize' },
  { attr: 'max', key: 'max', remote: 'maxSize' },
];
