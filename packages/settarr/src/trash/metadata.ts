/**
 * Read-only access to a TRaSH-Guides checkout.
 * Quality size presets live in docs/json/<app>/quality-size/*.json.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

const qualitySizeEntrySchema = z.object({
  quality: z.string().min(1),
  min: z.number(),
  preferred: z.number().nullable(),
  max: z.number().nullable(),
});

// Only the header is read while indexing; the rest of a file is checked when it is used.
const qualitySizeHeaderSchema = z.object({
  trash_id: z.string().min(1),
  type: z.string().optional().catch(undefined),
});

const qualitySizeFileSchema = qualitySizeHeaderSchema.extend({
  qualities: z.array(qualitySizeEntrySchema),
});

export type QualitySizeEntry = z.infer<typeof qualitySizeEntrySchema>;
export type QualitySizeFile = z.infer<typeof qualitySizeFileSchema>;

export interface QualitySizePreset {
  trashId: string;
  type?: string;
  filePath: string;
}

export interface QualitySizeSource {
  findQualitySize(trashId: string): QualitySizeFile | undefined;
}

export class TrashMetadata implements QualitySizeSource {
  readonly rootDir: string;
  private readonly app: string;
  private presets?: QualitySizePreset[];

  constructor(rootDir: string, app = 'sonarr') {
    this.rootDir = rootDir.replace(/^~/, os.homedir());
    this.app = app;
  }

  get qualitySizeDir(): string {
    return path.join(this.rootDir, 'docs', 'json', this.app, 'quality-size');
  }

  /**
   * Every readable quality size preset, indexed once per instance.
   * Files that are not JSON or carry no trash_id are skipped.
   */
  listQualitySizes(): QualitySizePreset[] {
    if (this.presets) return this.presets;

    const dir = this.qualitySizeDir;
    if (!fs.existsSync(dir)) {
      throw new Error(`TRaSH-Guides quality size directory not found: ${dir}`);
    }

    const presets: QualitySizePreset[] = [];
    for (const name of fs.readdirSync(dir).filter((entry) => entry.endsWith('.json')).sort()) {
      const filePath = path.join(dir, name);
      const header = qualitySizeHeaderSchema.safeParse(readJsonFile(filePath));
      if (!header.success) continue;
      presets.push({ trashId: header.data.trash_id.toLowerCase(), type: header.data.type, filePath });
    }
    this.presets = presets;
    return presets;
  }

  findQualitySize(trashId: string): QualitySizeFile | undefined {
    const wanted = trashId.toLowerCase();
    const preset = this.listQualitySizes().find((entry) => entry.trashId === wanted);
    return preset ? readQualitySizeFile(preset.filePath) : undefined;
  }
}

function readJsonFile(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    return undefined;
  }
}

function readQualitySizeFile(filePath: string): QualitySizeFile {
  const parsed = qualitySizeFileSchema.safeParse(readJsonFile(filePath));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Malformed TRaSH-Guides file ${filePath}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  return parsed.data;
}
