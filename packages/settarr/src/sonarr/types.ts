/**
 * Sonarr v3 API resources, as far as quality settings are concerned.
 */

export interface SonarrQuality {
  id: number;
  name: string;
  source?: string;
  resolution?: number;
}

export interface SonarrQualityDefinition {
  id: number;
  quality: SonarrQuality;
  title: string;
  weight: number;
  minSize: number;
  preferredSize?: number | null;
  maxSize?: number | null;
}

/**
 * One entry of a quality profile's `items` tree.
 * Groups carry `id` and `name` plus nested member items; single qualities carry `quality`.
 */
export interface SonarrQualityItem {
  id?: number;
  name?: string;
  quality?: SonarrQuality;
  items: SonarrQualityItem[];
  allowed: boolean;
}

export interface SonarrFormatItem {
  format: number;
  name: string;
  score: number;
}

export interface SonarrQualityProfileAttrs {
  upgradeAllowed: boolean;
  cutoff: number;
  items: SonarrQualityItem[];
  minFormatScore: number;
  cutoffFormatScore: number;
  minUpgradeFormatScore: number;
  formatItems: SonarrFormatItem[];
}

export interface SonarrQualityProfile extends SonarrQualityProfileAttrs {
  id: number;
  name: string;
}

export type NewSonarrQualityProfile = Omit<SonarrQualityProfile, 'id'>;

export interface SonarrCustomFormat {
  id: number;
  name: string;
  includeCustomFormatWhenRenaming?: boolean;
}

export interface SonarrInstanceConfig {
  url: string;
  apiKey: string;
  timeoutMs?: number;
}

/** The quality settings endpoints the reconcilers call. */
export interface SonarrApi {
  getQualityProfiles(): Promise<SonarrQualityProfile[]>;
  createQualityProfile(profile: NewSonarrQualityProfile): Promise<SonarrQualityProfile>;
  updateQualityProfile(profile: SonarrQualityProfile): Promise<SonarrQualityProfile>;
  deleteQualityProfile(id: number): Promise<void>;
  getQualityDefinitions(): Promise<SonarrQualityDefinition[]>;
  updateQualityDefinition(definition: SonarrQualityDefinition): Promise<SonarrQualityDefinition>;
}

/** Read-only access to the custom format catalog. */
export interface CustomFormatApi {
  listCustomFormats(): Promise<SonarrCustomFormat[]>;
}
