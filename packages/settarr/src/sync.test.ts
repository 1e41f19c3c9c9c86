import { describe, expect, it } from 'vitest';

import { ConfigValidationError } from './errors.js';
import { applySettings, fetchRemoteSettings, parseSonarrSettings, settingsToDocument } from './sync.js';
import { testContext } from './testing/context.js';
import { FakeSonarr } from './testing/fakeSonarr.js';

const document = {
  quality: {
    definitions: {
      DVD: { min: 2, preferred: 50, max: 60 },
      'Bluray-1080p': { min: 10, preferred: null, max: null },
    },
  },
  profiles: {
    quality_profiles: {
      delete_unmanaged: true,
      definitions: {
        HD: {
          upgrades_allowed: true,
          upgrade_until: 'HD',
          qualities: [{ name: 'HD', members: ['WEBDL-1080p', 'Bluray-1080p'] }, 'WEBDL-720p'],
          upgrade_until_custom_format_score: 100,
          custom_formats: [{ name: 'HDR', score: 50 }, { name: 'x265' }],
        },
        SD: { qualities: ['DVD', 'SDTV'] },
      },
    },
  },
};

function newSonarr(): FakeSonarr {
  return new FakeSonarr({
    customFormats: [
      { id: 1, name: 'x265' },
      { id: 2, name: 'HDR' },
    ],
  });
}

describe('parseSonarrSettings', () => {
  it('parses a full document', () => {
    const settings = parseSonarrSettings(document);
    expect([...settings.quality.definitions.keys()]).toEqual(['DVD', 'Bluray-1080p']);
    expect([...settings.qualityProfiles.definitions.keys()]).toEqual(['HD', 'SD']);
    expect(settings.qualityProfiles.deleteUnmanaged).toBe(true);
  });

  it('reports errors from every section together', () => {
    let error: unknown;
    try {
      parseSonarrSettings({
        quality: { trash_id: 'zz' },
        profiles: { quality_profiles: { definitions: { HD: { qualities: [] } } } },
        extra: true,
      });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError && error.errors.map((e) => e.path)).toEqual([
      'sonarr.settings.extra',
      'sonarr.settings.quality.trash_id',
      "sonarr.settings.profiles.quality_profiles.definitions['HD'].qualities",
    ]);
  });

  it('accepts an empty settings block', () => {
    const settings = parseSonarrSettings(undefined);
    expect(settings.quality.definitions.size).toBe(0);
    expect(settings.qualityProfiles.definitions.size).toBe(0);
  });
});

describe('applySettings', () => {
  it('applies definitions, profiles and deletions in order', async () => {
    const sonarr = newSonarr();
    await sonarr.createQualityProfile({
      name: 'Any',
      upgradeAllowed: false,
      cutoff: 1,
      items: [{ quality: { id: 1, name: 'SDTV' }, items: [], allowed: true }],
      minFormatScore: 0,
      cutoffFormatScore: 0,
      minUpgradeFormatScore: 1,
      formatItems: [],
    });
    sonarr.resetCalls();
    const { ctx } = testContext(sonarr, 'warn');

    const result = await applySettings(ctx, parseSonarrSettings(document));

    expect(result).toEqual({
      changed: true,
      qualityDefinitions: true,
      qualityProfiles: true,
      deletedQualityProfiles: true,
    });
    expect(sonarr.mutations.map((call) => `${call.method} ${call.path}`)).toEqual([
      'PUT /api/v3/qualitydefinition/2',
      'PUT /api/v3/qualitydefinition/7',
      'POST /api/v3/qualityprofile',
      'POST /api/v3/qualityprofile',
      'DELETE /api/v3/qualityprofile/1',
    ]);
    expect(sonarr.definition('Bluray-1080p')).toMatchObject({ minSize: 10, preferredSize: 1000, maxSize: null });
    expect(sonarr.profiles.map((p) => p.name)).toEqual(['HD', 'SD']);
  });

  it('makes no changes on a second run', async () => {
    const sonarr = newSonarr();
    const settings = parseSonarrSettings(document);
    await applySettings(testContext(sonarr).ctx, settings);
    sonarr.resetCalls();

    const result = await applySettings(testContext(sonarr).ctx, settings);

    expect(result.changed).toBe(false);
    expect(sonarr.mutations).toEqual([]);
  });

  it('accepts its own dump as configuration without changes', async () => {
    const sonarr = newSonarr();
    await applySettings(testContext(sonarr).ctx, parseSonarrSettings(document));
    const dumped = settingsToDocument(await fetchRemoteSettings(sonarr));
    sonarr.resetCalls();

    const result = await applySettings(testContext(sonarr).ctx, parseSonarrSettings(dumped));

    expect(result.changed).toBe(false);
    expect(sonarr.mutations).toEqual([]);
  });
});
