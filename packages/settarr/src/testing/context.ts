import { Logger } from '../logger.js';
import type { LogLevel } from '../logger.js';
import type { RunLogEntry, SyncContext } from '../types.js';
import type { FakeSonarr } from './fakeSonarr.js';

export interface TestContext {
  ctx: SyncContext;
  /** Log lines as `level: message`. */
  lines: string[];
  changes: RunLogEntry[];
}

export function testContext(sonarr: FakeSonarr, level: LogLevel = 'debug'): TestContext {
  const lines: string[] = [];
  const changes: RunLogEntry[] = [];
  const logger = new Logger(level, (lvl, message) => {
    lines.push(`${lvl}: ${message}`);
  });
  const ctx: SyncContext = {
    sonarr,
    customFormats: sonarr,
    logger,
    run: { record: (entry) => changes.push(entry) },
  };
  return { ctx, lines, changes };
}
