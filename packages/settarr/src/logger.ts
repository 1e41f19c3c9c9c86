import fs from 'node:fs';
import path from 'node:path';

import { cyan, dim, red, yellow } from 'colorette';

import type { RunLogEntry, RunSummary } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = (level: LogLevel, message: string) => void;

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: dim('debug'),
  info: cyan('info '),
  warn: yellow('warn '),
  error: red('error'),
};

export const consoleSink: LogSink = (level, message) => {
  const line = `${dim(new Date().toISOString())} ${LEVEL_TAGS[level]} ${message}`;
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
};

export class Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info', private readonly sink: LogSink = consoleSink) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(message: string) {
    this.log('debug', message);
  }

  info(message: string) {
    this.log('info', message);
  }

  warn(message: string) {
    this.log('warn', message);
  }

  error(message: string) {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string) {
    if (this.isEnabled(level)) this.sink(level, message);
  }
}

export interface ChangeRecorder {
  record(entry: RunLogEntry): void;
}

/**
 * Collects the changes applied during a run and writes them to
 * <dir>/logs/<timestamp>.json, with a summary in <dir>/status/last-run.json.
 */
export class RunLogger implements ChangeRecorder {
  private readonly logDir: string;
  private readonly statusDir: string;
  private readonly entries: RunLogEntry[] = [];
  private logPath?: string;

  constructor(baseDir: string) {
    this.logDir = path.join(baseDir, 'logs');
    this.statusDir = path.join(baseDir, 'status');
  }

  private ensureDirs() {
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.mkdirSync(this.statusDir, { recursive: true });
  }

  record(entry: RunLogEntry) {
    this.entries.push(entry);
  }

  get changes(): readonly RunLogEntry[] {
    return this.entries;
  }

  writeLog(): string {
    this.ensureDirs();
    if (!this.logPath) {
      const ts = new Date().toISOString().replace(/[:.]/g, '-');
      this.logPath = path.join(this.logDir, `${ts}.json`);
    }
    const tmpPath = `${this.logPath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(this.entries, null, 2));
    fs.renameSync(tmpPath, this.logPath);
    return this.logPath;
  }

  writeStatus(summary: RunSummary): string {
    this.ensureDirs();
    const filePath = path.join(this.statusDir, 'last-run.json');
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(summary, null, 2));
    fs.renameSync(tmpPath, filePath);
    return filePath;
  }
}
