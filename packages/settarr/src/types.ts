import type { ChangeRecorder, Logger, LogLevel } from './logger.js';
import type { CustomFormatApi, SonarrApi } from './sonarr/types.js';

export interface SettarrConfig {
  configPath: string;
  sonarr: SonarrConfig;
  trash: TrashConfig;
  log: LogConfig;
}

export interface SonarrConfig {
  url?: string;
  apiKey?: string;
  timeoutMs: number;
  settings: unknown;      // parsed by parseSonarrSettings
}

export interface TrashConfig {
  dir?: string;           // TRaSH-Guides checkout; required when quality.trash_id is set
}

export interface LogConfig {
  level: LogLevel;
  dir: string;
}

/** Everything one reconciliation pass needs to talk to an instance and report on it. */
export interface SyncContext {
  sonarr: SonarrApi;
  customFormats: CustomFormatApi;
  logger: Logger;
  run: ChangeRecorder;
}

export type ChangeAction = 'create' | 'update' | 'delete';

export interface RunLogEntry {
  tree: string;
  action: ChangeAction;
  from?: unknown;
  to?: unknown;
}

export interface SyncResult {
  changed: boolean;
  qualityDefinitions: boolean;
  qualityProfiles: boolean;
  deletedQualityProfiles: boolean;
}

export interface RunSummary {
  runAt: string;
  instance: string;
  changed: boolean;
  changes: number;
  logPath: string;
  error?: string;
}
