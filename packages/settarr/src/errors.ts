/**
 * Error types raised while loading, rendering and applying settings.
 */

export interface FieldError {
  path: string;     // configuration tree path, e.g. sonarr.settings.quality.definitions['DVD'].max
  message: string;
}

export class ConfigValidationError extends Error {
  readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    const count = errors.length === 1 ? '1 error' : `${errors.length} errors`;
    super(`Invalid configuration (${count}):\n${errors.map((e) => `  ${e.path}: ${e.message}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class TrashIdNotFoundError extends Error {
  readonly trashId: string;

  constructor(trashId: string, message?: string) {
    super(message ?? `Unable to find TRaSH-Guides metadata with trash ID '${trashId}'`);
    this.name = 'TrashIdNotFoundError';
    this.trashId = trashId;
  }
}

/**
 * The instance returned data that contradicts itself. Not a local configuration problem.
 */
export class InconsistentRemoteStateError extends Error {
  readonly payload: unknown;

  constructor(message: string, payload: unknown) {
    super(`Inconsistent Sonarr instance state: ${message}: ${JSON.stringify(payload)}`);
    this.name = 'InconsistentRemoteStateError';
    this.payload = payload;
  }
}

export type RemoteLookupKind = 'quality' | 'custom format' | 'quality profile';

export class RemoteLookupError extends Error {
  readonly kind: RemoteLookupKind;
  readonly key: string;

  constructor(kind: RemoteLookupKind, key: string) {
    super(`Unknown ${kind} '${key}': not found on the Sonarr instance`);
    this.name = 'RemoteLookupError';
    this.kind = kind;
    this.key = key;
  }
}

export class SonarrRequestError extends Error {
  readonly method: string;
  readonly url: string;
  readonly status?: number;
  readonly body?: string;

  constructor(method: string, url: string, reason: string, status?: number, body?: string) {
    super(`Sonarr request ${method} ${url} failed: ${reason}`);
    this.name = 'SonarrRequestError';
    this.method = method;
    this.url = url;
    this.status = status;
    this.body = body;
  }
}
