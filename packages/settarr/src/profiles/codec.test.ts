import { describe, expect, it } from 'vitest';

import { InconsistentRemoteStateError, RemoteLookupError } from '../errors.js';
import type { SonarrCustomFormat, SonarrQualityItem, SonarrQualityProfile } from '../sonarr/types.js';
import { defaultQualities } from '../testing/fakeSonarr.js';
import {
  QUALITY_PROFILE_ATTRS,
  assignGroupIds,
  decodeCustomFormats,
  decodeQualities,
  decodeQualityProfile,
  decodeUpgradeUntil,
  encodeCustomFormats,
  encodeQualities,
  encodeQualityProfile,
  encodeUpgradeUntil,
  normalizeCustomFormats,
} from './codec.js';
import type { ProfileEncodeContext } from './codec.js';
import type { QualityEntry, QualityProfile } from './schema.js';

const customFormats = new Map<string, SonarrCustomFormat>([
  ['x265', { id: 1, name: 'x265' }],
  ['HDR', { id: 2, name: 'HDR' }],
  ['LQ', { id: 3, name: 'LQ' }],
]);

const hdQualities: QualityEntry[] = [
  { kind: 'group', name: 'HD', members: new Set(['WEBDL-1080p', 'Bluray-1080p']) },
  { kind: 'quality', name: 'DVD' },
];

function encodeContext(qualities: QualityEntry[]): ProfileEncodeContext {
  return {
    // heaviest first, as fetched
    qualityDefinitions: new Map(defaultQualities().reverse().map((q) => [q.name, q])),
    customFormats,
    groupIds: assignGroupIds(qualities),
  };
}

function describeItem(item: SonarrQualityItem): string {
  const name = item.name ?? item.quality?.name ?? '?';
  return item.allowed ? name : `(${name})`;
}

function profile(overrides: Partial<QualityProfile> = {}): QualityProfile {
  return {
    upgradesAllowed: true,
    upgradeUntil: 'HD',
    qualities: hdQualities,
    minimumCustomFormatScore: 0,
    upgradeUntilCustomFormatScore: 0,
    minimumCustomFormatScoreIncrement: 1,
    customFormats: [],
    ...overrides,
  };
}

describe('assignGroupIds', () => {
  it('numbers groups in order of appearance', () => {
    const ids = assignGroupIds([
      { kind: 'group', name: 'HD', members: new Set(['WEBDL-1080p']) },
      { kind: 'quality', name: 'DVD' },
      { kind: 'group', name: 'SD', members: new Set(['SDTV']) },
    ]);
    expect(Object.fromEntries(ids)).toEqual({ HD: 1001, SD: 1002 });
  });
});

describe('encodeQualities', () => {
  it('lists every known quality once, lowest priority first', () => {
    const items = encodeQualities(hdQualities, encodeContext(hdQualities));
    expect(items.map(describeItem)).toEqual([
      '(SDTV)',
      '(HDTV-720p)',
      '(HDTV-1080p)',
      '(WEBDL-720p)',
      'DVD',
      'HD',
    ]);
  });

  it('encodes groups with their assigned id and members', () => {
    const items = encodeQualities(hdQualities, encodeContext(hdQualities));
    expect(items[items.length - 1]).toEqual({
      id: 1001,
      name: 'HD',
      allowed: true,
      items: [
        { quality: { id: 3, name: 'WEBDL-1080p' }, items: [], allowed: true },
        { quality: { id: 7, name: 'Bluray-1080p' }, items: [], allowed: true },
      ],
    });
  });

  it('fails on a quality the instance does not have', () => {
    const qualities: QualityEntry[] = [{ kind: 'quality', name: 'Bluray-2160p' }];
    expect(() => encodeQualities(qualities, encodeContext(qualities))).toThrow(RemoteLookupError);
  });
});

describe('decodeQualities', () => {
  it('keeps enabled entries, highest priority first', () => {
    const items = encodeQualities(hdQualities, encodeContext(hdQualities));
    expect(decodeQualities(items)).toEqual(hdQualities);
  });

  it('fails on a group without a name', () => {
    const items: SonarrQualityItem[] = [
      { id: 1001, allowed: true, items: [{ quality: { id: 2, name: 'DVD' }, items: [], allowed: true }] },
    ];
    expect(() => decodeQualities(items)).toThrow(InconsistentRemoteStateError);
  });
});

describe('upgrade until', () => {
  const items = encodeQualities(hdQualities, encodeContext(hdQualities));

  it('encodes a group by its id and a quality by its quality id', () => {
    const ctx = encodeContext(hdQualities);
    expect(encodeUpgradeUntil(profile({ upgradeUntil: 'HD' }), ctx)).toBe(1001);
    expect(encodeUpgradeUntil(profile({ upgradeUntil: 'DVD' }), ctx)).toBe(2);
  });

  it('defaults to the highest priority entry', () => {
    const local = profile({ upgradesAllowed: false, upgradeUntil: undefined });
    expect(encodeUpgradeUntil(local, encodeContext(hdQualities))).toBe(1001);
  });

  it('decodes group and quality ids', () => {
    expect(decodeUpgradeUntil(items, 1001)).toBe('HD');
    expect(decodeUpgradeUntil(items, 2)).toBe('DVD');
  });

  it('fails on a cutoff missing from the items', () => {
    expect(() => decodeUpgradeUntil(items, 99)).toThrow(
      "Inconsistent Sonarr instance state: 'cutoff' quality ID 99 not found in 'items'"
    );
  });
});

describe('custom formats', () => {
  it('sends unset scores as 0 and zeroes formats not listed', () => {
    expect(encodeCustomFormats([{ name: 'HDR', score: 50 }, { name: 'LQ' }], customFormats)).toEqual([
      { format: 2, name: 'HDR', score: 50 },
      { format: 3, name: 'LQ', score: 0 },
      { format: 1, name: 'x265', score: 0 },
    ]);
  });

  it('fails on a custom format the instance does not have', () => {
    expect(() => encodeCustomFormats([{ name: 'DV', score: 5 }], customFormats)).toThrow(
      "Unknown custom format 'DV': not found on the Sonarr instance"
    );
  });

  it('decodes non-zero scores, highest first', () => {
    expect(
      decodeCustomFormats([
        { format: 1, name: 'x265', score: 0 },
        { format: 2, name: 'HDR', score: 50 },
        { format: 3, name: 'LQ', score: -100 },
        { format: 4, name: 'AV1', score: 50 },
      ])
    ).toEqual([
      { name: 'AV1', score: 50 },
      { name: 'HDR', score: 50 },
      { name: 'LQ', score: -100 },
    ]);
  });

  it('normalizes local scores to the decoded form', () => {
    expect(normalizeCustomFormats([{ name: 'LQ', score: -100 }, { name: 'HDR' }, { name: 'AV1', score: 50 }])).toEqual([
      { name: 'AV1', score: 50 },
      { name: 'LQ', score: -100 },
    ]);
  });

  it('compares scores regardless of order', () => {
    const customFormatsAttr = QUALITY_PROFILE_ATTRS.find((attr) => attr.key === 'custom_formats');
    const local = profile({ customFormats: [{ name: 'LQ', score: -100 }, { name: 'HDR', score: 50 }, { name: 'x265' }] });
    const remote = profile({ customFormats: [{ name: 'HDR', score: 50 }, { name: 'LQ', score: -100 }] });
    expect(customFormatsAttr?.equals?.(local, remote)).toBe(true);
  });
});

describe('quality profiles', () => {
  it('encodes every profile attribute', () => {
    const encoded = encodeQualityProfile(
      profile({
        minimumCustomFormatScore: 10,
        upgradeUntilCustomFormatScore: 100,
        minimumCustomFormatScoreIncrement: 5,
        customFormats: [{ name: 'HDR', score: 50 }],
      }),
      encodeContext(hdQualities)
    );
    expect(encoded).toMatchObject({
      upgradeAllowed: true,
      cutoff: 1001,
      minFormatScore: 10,
      cutoffFormatScore: 100,
      minUpgradeFormatScore: 5,
    });
    expect(encoded.formatItems.map((item) => [item.name, item.score])).toEqual([
      ['HDR', 50],
      ['x265', 0],
      ['LQ', 0],
    ]);
    expect(encoded.items).toHaveLength(6);
  });

  it('decodes what it encodes', () => {
    const local = profile({ customFormats: [{ name: 'HDR', score: 50 }] });
    const json: SonarrQualityProfile = { id: 4, name: 'HD', ...encodeQualityProfile(local, encodeContext(hdQualities)) };
    expect(decodeQualityProfile(json)).toEqual(local);
  });

  it('ignores the cutoff when upgrades are not allowed', () => {
    const local = profile({ upgradesAllowed: false, upgradeUntil: undefined });
    const json: SonarrQualityProfile = { id: 4, name: 'HD', ...encodeQualityProfile(local, encodeContext(hdQualities)) };
    expect(decodeQualityProfile(json).upgradeUntil).toBeUndefined();
  });
});
