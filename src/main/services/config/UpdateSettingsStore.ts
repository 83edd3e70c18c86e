import fs from 'node:fs';
import path from 'node:path';
import type { UpdateSettings, UpdateSettingsPatch } from '@shared/contracts';
import { DEFAULT_BUNDLE_TIMEOUT_MS } from '@shared/defaults';

interface PersistedUpdateSettingsFile {
  settings: UpdateSettings;
}

const MIN_TIMEOUT_MS = 1_000;
const MAX_TIMEOUT_MS = 10 * 60 * 1_000;

/**
 * User-level update preferences, persisted under `<baseDir>/updates`.
 * `allowSnapshots: null` defers to the bundled source configuration.
 */
export class UpdateSettingsStore {
  private readonly filePath: string;
  private cache: UpdateSettings;

  constructor(baseDir: string) {
    const updateDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    this.filePath = path.join(updateDir, 'settings.json');
    this.cache = this.load();
  }

  get(): UpdateSettings {
    return { ...this.cache };
  }

  set(patch: UpdateSettingsPatch): UpdateSettings {
    const next: UpdateSettings = {
      allowSnapshots:
        patch.allowSnapshots === undefined ? this.cache.allowSnapshots : normalizeAllowSnapshots(patch.allowSnapshots),
      downloadTimeoutMs:
        patch.downloadTimeoutMs === undefined
          ? this.cache.downloadTimeoutMs
          : normalizeTimeout(patch.downloadTimeoutMs, this.cache.downloadTimeoutMs),
      updatedAt: new Date().toISOString()
    };

    this.cache = next;
    this.persist(next);
    return this.get();
  }

  resolveAllowSnapshots(registryDefault: boolean): boolean {
    return this.cache.allowSnapshots ?? registryDefault;
  }

  private load(): UpdateSettings {
    if (!fs.existsSync(this.filePath)) {
      const initial = createDefaultSettings();
      this.persist(initial);
      return initial;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = JSON.parse(raw) as Partial<PersistedUpdateSettingsFile>;
      const normalized = normalizeSettings(parsed.settings);
      this.persist(normalized);
      return normalized;
    } catch {
      const fallback = createDefaultSettings();
      this.persist(fallback);
      return fallback;
    }
  }

  private persist(settings: UpdateSettings): void {
    const file: PersistedUpdateSettingsFile = { settings };
    fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2), 'utf-8');
  }
}

function createDefaultSettings(): UpdateSettings {
  return {
    allowSnapshots: null,
    downloadTimeoutMs: DEFAULT_BUNDLE_TIMEOUT_MS,
    updatedAt: new Date().toISOString()
  };
}

function normalizeSettings(input: unknown): UpdateSettings {
  if (!input || typeof input !== 'object') {
    return createDefaultSettings();
  }

  const value = input as Partial<Record<keyof UpdateSettings, unknown>>;
  const fallback = createDefaultSettings();

  return {
    allowSnapshots: normalizeAllowSnapshots(value.allowSnapshots),
    downloadTimeoutMs: normalizeTimeout(value.downloadTimeoutMs, fallback.downloadTimeoutMs),
    updatedAt: isIso(value.updatedAt) ? value.updatedAt : fallback.updatedAt
  };
}

function normalizeAllowSnapshots(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

function normalizeTimeout(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }

  return Math.min(MAX_TIMEOUT_MS, Math.max(MIN_TIMEOUT_MS, Math.trunc(value)));
}

function isIso(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(Date.parse(value));
}
