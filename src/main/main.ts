import path from 'node:path';
import type { BundleDownloadResult, ExtensionVersion, ManifestQueryOptions, RestartRequested } from '@shared/contracts';
import { NodeSignatureVerifier, type SignatureVerifier } from '@main/services/crypto/SignatureVerifier';
import { UpdateSettingsStore } from '@main/services/config/UpdateSettingsStore';
import type { DownloadManager } from '@main/services/download/DownloadManager';
import { HttpDownloadManager } from '@main/services/download/HttpDownloadManager';
import { ImageHeaderDecoder, type ImageDecoder } from '@main/services/images/ImageDecoder';
import { Logger, type LogLevel } from '@main/services/logging/Logger';
import { SourceRegistry, type UpdateSource } from '@main/services/sources/SourceRegistry';
import { BundleDownloadWorker, type BundleDownloadOptions } from '@main/services/update/BundleDownloadWorker';
import { UpdateCoordinator } from '@main/services/update/UpdateCoordinator';

export interface BootstrapOptions {
  baseDir: string;
  sourcesFile: string;
  homeDir?: string;
  downloadManager?: DownloadManager;
  signatureVerifier?: SignatureVerifier;
  imageDecoder?: ImageDecoder;
  onRestartRequested?: (request: RestartRequested) => void;
  env?: NodeJS.ProcessEnv;
}

export interface ExtensionUpdateRuntime {
  logger: Logger;
  settings: UpdateSettingsStore;
  registry: SourceRegistry;
  coordinator: UpdateCoordinator;
  worker: BundleDownloadWorker;
  queryOptions(): ManifestQueryOptions;
  downloadExtension(
    source: UpdateSource,
    extensionVersion: ExtensionVersion,
    options?: Omit<BundleDownloadOptions, 'timeoutMs'>
  ): Promise<BundleDownloadResult>;
}

export type BootstrapResult = { ok: true; runtime: ExtensionUpdateRuntime } | { ok: false; error: string };

/**
 * Wires the update subsystem for one host application. Reads the bundled
 * source configuration once; user settings come from `<baseDir>/updates`.
 *
 * Environment:
 * - `EXT_UPDATES_DEBUG_LOG_PATH` mirrors the log to another file.
 * - `EXT_UPDATES_LOG_LEVEL` sets the minimum level (`debug` by default).
 * - `EXT_UPDATES_TIMEOUT_MS` overrides the persisted bundle timeout for this run.
 */
export function bootstrapExtensionUpdates(options: BootstrapOptions): BootstrapResult {
  const env = options.env ?? process.env;
  const logger = new Logger(options.baseDir, {
    minLevel: readLogLevel(env.EXT_UPDATES_LOG_LEVEL),
    mirrorFilePath: env.EXT_UPDATES_DEBUG_LOG_PATH?.trim() || null
  });

  const loaded = SourceRegistry.fromFile(options.sourcesFile, { homeDir: options.homeDir, logger });
  if (!loaded.ok) {
    logger.error('app.bootstrap.sources_invalid', { sourcesFile: options.sourcesFile, reason: loaded.error });
    return { ok: false, error: loaded.error };
  }

  const registry = loaded.registry;
  const settings = new UpdateSettingsStore(options.baseDir);
  const imageDecoder = options.imageDecoder ?? new ImageHeaderDecoder();
  const downloadManager =
    options.downloadManager ??
    new HttpDownloadManager({
      downloadDir: path.join(options.baseDir, 'updates', 'downloads'),
      userAgent: `${registry.applicationName}-updates`,
      logger
    });

  const coordinator = new UpdateCoordinator({
    registry,
    downloadManager,
    logger,
    signatureVerifier: options.signatureVerifier ?? new NodeSignatureVerifier(),
    imageDecoder,
    onRestartRequested: options.onRestartRequested
  });
  const worker = new BundleDownloadWorker({
    downloadManager,
    logger,
    imageDecoder,
    defaultTimeoutMs: settings.get().downloadTimeoutMs
  });
  const timeoutOverride = readPositiveIntEnv(env.EXT_UPDATES_TIMEOUT_MS);

  logger.info('app.bootstrap', {
    applicationName: registry.applicationName,
    sources: registry.getSources().map((source) => source.name),
    allowSnapshots: settings.resolveAllowSnapshots(registry.allowSnapshots),
    timeoutOverride: timeoutOverride ?? null
  });

  return {
    ok: true,
    runtime: {
      logger,
      settings,
      registry,
      coordinator,
      worker,
      queryOptions: () => ({ allowSnapshots: settings.resolveAllowSnapshots(registry.allowSnapshots) }),
      downloadExtension: (source, extensionVersion, downloadOptions) =>
        worker.run(source, extensionVersion, {
          ...downloadOptions,
          timeoutMs: timeoutOverride ?? settings.get().downloadTimeoutMs
        })
    }
  };
}

function readLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value === 'info' || value === 'warn' || value === 'error' ? value : 'debug';
}

function readPositiveIntEnv(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.trunc(value);
}
