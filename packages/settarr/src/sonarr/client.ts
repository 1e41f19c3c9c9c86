/**
 * Sonarr v3 API client
 * Auth via X-Api-Key. Falls back to SONARR_URL / SONARR_API_KEY env vars.
 */

import { SonarrRequestError } from '../errors.js';
import type {
  CustomFormatApi,
  NewSonarrQualityProfile,
  SonarrApi,
  SonarrCustomFormat,
  SonarrInstanceConfig,
  SonarrQualityDefinition,
  SonarrQualityProfile,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

export class SonarrClient implements SonarrApi, CustomFormatApi {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(config: Partial<SonarrInstanceConfig> = {}) {
    this.baseUrl = normalizeUrl(config.url || process.env.SONARR_URL || '');
    this.apiKey = config.apiKey || process.env.SONARR_API_KEY || '';
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (!this.baseUrl) throw new Error('Sonarr URL not set. Set sonarr.url or SONARR_URL.');
    if (!this.apiKey) throw new Error('Sonarr API key not set. Set sonarr.apiKey or SONARR_API_KEY.');
  }

  // ──────────────────────────────────────────────────────────────────
  // Quality profiles
  // ──────────────────────────────────────────────────────────────────

  async getQualityProfiles(): Promise<SonarrQualityProfile[]> {
    return this.request<SonarrQualityProfile[]>('GET', '/api/v3/qualityprofile');
  }

  async createQualityProfile(profile: NewSonarrQualityProfile): Promise<SonarrQualityProfile> {
    return this.request<SonarrQualityProfile>('POST', '/api/v3/qualityprofile', profile);
  }

  async updateQualityProfile(profile: SonarrQualityProfile): Promise<SonarrQualityProfile> {
    return this.request<SonarrQualityProfile>('PUT', `/api/v3/qualityprofile/${profile.id}`, profile);
  }

  async deleteQualityProfile(id: number): Promise<void> {
    await this.request<unknown>('DELETE', `/api/v3/qualityprofile/${id}`);
  }

  // ──────────────────────────────────────────────────────────────────
  // Quality definitions
  // ──────────────────────────────────────────────────────────────────

  async getQualityDefinitions(): Promise<SonarrQualityDefinition[]> {
    return this.request<SonarrQualityDefinition[]>('GET', '/api/v3/qualitydefinition');
  }

  async updateQualityDefinition(definition: SonarrQualityDefinition): Promise<SonarrQualityDefinition> {
    return this.request<SonarrQualityDefinition>('PUT', `/api/v3/qualitydefinition/${definition.id}`, definition);
  }

  // ──────────────────────────────────────────────────────────────────
  // Custom formats
  // ──────────────────────────────────────────────────────────────────

  async listCustomFormats(): Promise<SonarrCustomFormat[]> {
    return this.request<SonarrCustomFormat[]>('GET', '/api/v3/customformat');
  }

  // ──────────────────────────────────────────────────────────────────
  // HTTP transport
  // ──────────────────────────────────────────────────────────────────

  private async request<T>(method: Method, apiPath: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${apiPath}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: {
          'X-Api-Key': this.apiKey,
          'Accept': 'application/json',
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new SonarrRequestError(method, url, reason);
    } finally {
      clearTimeout(timer);
    }

    const text = await res.text();
    if (!res.ok) {
      throw new SonarrRequestError(method, url, `HTTP ${res.status} ${res.statusText}`, res.status, text);
    }
    return (text ? JSON.parse(text) : undefined) as T;
  }
}

function normalizeUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}
