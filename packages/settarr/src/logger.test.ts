import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Logger, RunLogger } from './logger.js';

describe('Logger', () => {
  it('drops messages below its level', () => {
    const lines: string[] = [];
    const logger = new Logger('info', (level, message) => {
      lines.push(`${level}: ${message}`);
    });

    logger.debug('compared');
    logger.info('changed');
    logger.error('failed');

    expect(lines).toEqual(['info: changed', 'error: failed']);
    expect(logger.isEnabled('debug')).toBe(false);
  });
});

describe('RunLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settarr-run-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes recorded changes and the run status', () => {
    const run = new RunLogger(dir);
    run.record({ tree: 'a.b', action: 'update', from: 1, to: 2 });

    const logPath = run.writeLog();
    const statusPath = run.writeStatus({
      runAt: '2024-01-01T00:00:00.000Z',
      instance: 'http://sonarr:8989',
      changed: true,
      changes: 1,
      logPath,
    });

    expect(path.dirname(logPath)).toBe(path.join(dir, 'logs'));
    expect(JSON.parse(fs.readFileSync(logPath, 'utf-8'))).toEqual([
      { tree: 'a.b', action: 'update', from: 1, to: 2 },
    ]);
    expect(statusPath).toBe(path.join(dir, 'status', 'last-run.json'));
    expect(JSON.parse(fs.readFileSync(statusPath, 'utf-8'))).toMatchObject({ changed: true, changes: 1, logPath });
    expect(fs.readdirSync(path.join(dir, 'logs'))).toHaveLength(1);
  });
});
