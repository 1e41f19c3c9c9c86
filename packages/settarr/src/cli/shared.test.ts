import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigValidationError } from '../errors.js';
import { loadSettings } from './shared.js';

let baseDir: string;

function write(relative: string, content: string): string {
  const filePath = path.join(baseDir, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settarr-cli-'));
  vi.stubEnv('SETTARR_SECRETS', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(baseDir, { recursive: true, force: true });
});

describe('loadSettings', () => {
  it('renders TRaSH-Guides presets under local definitions', () => {
    write(
      'trash/docs/json/sonarr/quality-size/series.json',
      JSON.stringify({ trash_id: 'aaaa1111', qualities: [{ quality: 'SDTV', min: 2, preferred: 95, max: 100 }] })
    );
    const configPath = write(
      'settarr.yaml',
      [
        'sonarr:',
        '  settings:',
        '    quality:',
        '      trash_id: AAAA1111',
        '      definitions:',
        '        DVD: { min: 5 }',
        'trash:',
        `  dir: ${path.join(baseDir, 'trash')}`,
        '',
      ].join('\n')
    );

    const { settings } = loadSettings(baseDir, configPath);

    expect(Object.fromEntries(settings.quality.definitions)).toEqual({
      DVD: { min: 5 },
      SDTV: { min: 2, preferred: 95, max: 100 },
    });
  });

  it('reports field errors with their full path', () => {
    const configPath = write(
      'settarr.yaml',
      'sonarr:\n  settings:\n    quality:\n      definitions:\n        DVD: { min: -1 }\n'
    );

    let error: unknown;
    try {
      loadSettings(baseDir, configPath);
    } catch (err) {
      error = err;
    }
    expect(error instanceof ConfigValidationError && error.errors.map((e) => e.path)).toEqual([
      "sonarr.settings.quality.definitions['DVD'].min",
    ]);
  });
});
