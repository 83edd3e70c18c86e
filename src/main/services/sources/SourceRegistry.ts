import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { SourceDefinition, SourcesDocument } from '@shared/contracts';
import type { LoggerLike } from '@main/services/logging/Logger';

/**
 * Resolves `relativePath` against `base` the way a browser resolves a
 * relative reference, treating `base` as a directory even without a trailing
 * slash. A blank path returns the base itself. Returns null when the inputs
 * cannot form a URL.
 */
export function resolveLocation(base: URL | string | null | undefined, relativePath?: string | null): URL | null {
  const baseUrl = toUrl(base);
  if (!baseUrl) {
    return null;
  }

  if (typeof relativePath !== 'string' || !relativePath.trim()) {
    return baseUrl;
  }

  try {
    return new URL(relativePath.replace(/\\/g, '/'), withTrailingSlash(baseUrl.href));
  } catch {
    return null;
  }
}

/**
 * Inverse of {@link resolveLocation}, by text prefix only: returns the part of
 * `fullLocation` after `base/`, or null when it does not start with it.
 */
export function unresolveLocation(
  base: URL | string | null | undefined,
  fullLocation: URL | string | null | undefined
): string | null {
  const baseUrl = toUrl(base);
  const fullUrl = toUrl(fullLocation);
  if (!baseUrl || !fullUrl) {
    return null;
  }

  const prefix = withTrailingSlash(baseUrl.href);
  if (!fullUrl.href.startsWith(prefix)) {
    return null;
  }

  return fullUrl.href.slice(prefix.length);
}

export class UpdateSource {
  readonly name: string;
  readonly baseHref: string;
  readonly versionManifest: string;
  readonly publicKey: string | null;

  constructor(definition: { name: string; baseUrl: URL | string; versionManifest: string; publicKey?: string | null }) {
    this.name = definition.name;
    this.baseHref = new URL(definition.baseUrl).href;
    this.versionManifest = definition.versionManifest;
    this.publicKey = definition.publicKey?.trim() ? definition.publicKey : null;
    Object.freeze(this);
  }

  get baseUrl(): URL {
    return new URL(this.baseHref);
  }

  get isLocalSource(): boolean {
    return this.baseHref.startsWith('file:');
  }

  get hasPublicKey(): boolean {
    return this.publicKey !== null;
  }

  get versionManifestUrl(): URL | null {
    return resolveLocation(this.baseHref, this.versionManifest);
  }

  get publicKeyUrl(): URL | null {
    return this.publicKey === null ? null : resolveLocation(this.baseHref, this.publicKey);
  }

  resolve(relativePath: string | null | undefined): URL | null {
    return resolveLocation(this.baseHref, relativePath);
  }

  unresolve(fullLocation: URL | string): string | null {
    return unresolveLocation(this.baseHref, fullLocation);
  }

  toDefinition(): SourceDefinition {
    return {
      name: this.name,
      baseUrl: this.baseHref,
      versionManifest: this.versionManifest,
      publicKey: this.publicKey
    };
  }

  toString(): string {
    return this.name;
  }
}

const USER_HOME_PATTERN = /\$\{user\.home\}/g;

const sourceSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().min(1),
  versionManifest: z.string().min(1),
  publicKey: z.string().nullish().transform((value) => value ?? null)
});

const sourcesSchema = z.object({
  applicationName: z.string().min(1),
  allowSnapshots: z
    .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
    .optional()
    .transform((value) => value ?? false),
  updateSources: z.array(sourceSchema).default([])
});

export interface SourceRegistryLoadOptions {
  homeDir?: string;
  logger?: LoggerLike;
}

export type SourceRegistryLoadResult = { ok: true; registry: SourceRegistry } | { ok: false; error: string };

export class SourceRegistry {
  readonly applicationName: string;
  readonly allowSnapshots: boolean;
  private readonly sources: readonly UpdateSource[];

  constructor(applicationName: string, sources: UpdateSource[], allowSnapshots = false) {
    this.applicationName = applicationName;
    this.allowSnapshots = allowSnapshots;
    this.sources = Object.freeze([...sources]);
  }

  static fromJson(json: string, options?: SourceRegistryLoadOptions): SourceRegistryLoadResult {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
    }

    const parsed = sourcesSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      };
    }

    return buildRegistry(parsed.data, options);
  }

  static fromFile(filePath: string, options?: SourceRegistryLoadOptions): SourceRegistryLoadResult {
    let json: string;
    try {
      json = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      return {
        ok: false,
        error: `unable to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      };
    }

    return SourceRegistry.fromJson(json, options);
  }

  getSources(): UpdateSource[] {
    return [...this.sources];
  }

  findSource(name: string): UpdateSource | null {
    const key = name.trim().toLowerCase();
    return this.sources.find((source) => source.name.toLowerCase() === key) ?? null;
  }

  toDocument(): SourcesDocument {
    return {
      applicationName: this.applicationName,
      allowSnapshots: this.allowSnapshots,
      updateSources: this.sources.map((source) => source.toDefinition())
    };
  }
}

function buildRegistry(document: SourcesDocument, options: SourceRegistryLoadOptions | undefined): SourceRegistryLoadResult {
  const homeDir = options?.homeDir ?? os.homedir();
  const sources: UpdateSource[] = [];

  for (const [index, definition] of document.updateSources.entries()) {
    const baseUrl = definition.baseUrl.replace(USER_HOME_PATTERN, homeDir);
    let source: UpdateSource;
    try {
      source = new UpdateSource({ ...definition, baseUrl });
    } catch {
      return { ok: false, error: `updateSources.${index}.baseUrl: invalid URL "${baseUrl}"` };
    }

    if (source.isLocalSource && !isReadableDirectory(source.baseUrl)) {
      options?.logger?.debug('update.sources.local_pruned', {
        source: source.name,
        baseUrl: source.baseHref
      });
      continue;
    }

    sources.push(source);
  }

  return {
    ok: true,
    registry: new SourceRegistry(document.applicationName, sources, document.allowSnapshots)
  };
}

function isReadableDirectory(url: URL): boolean {
  try {
    const dir = fileURLToPath(url);
    if (!fs.statSync(dir).isDirectory()) {
      return false;
    }
    fs.accessSync(dir, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function toUrl(value: URL | string | null | undefined): URL | null {
  if (value instanceof URL) {
    return new URL(value.href);
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function withTrailingSlash(href: string): string {
  return href.endsWith('/') ? href : `${href}/`;
}
