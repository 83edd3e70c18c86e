import type {
  BundleAssetKind,
  BundleAssetSet,
  BundleDownloadResult,
  DownloadedBundle,
  ExtensionVersion
} from '@shared/contracts';
import { DEFAULT_BUNDLE_TIMEOUT_MS } from '@shared/defaults';
import type { DownloadHandle, DownloadManager } from '@main/services/download/DownloadManager';
import { EMPTY_FILE_MESSAGE, isUsableFile } from '@main/services/download/localFiles';
import { ImageHeaderDecoder, type ImageDecoder } from '@main/services/images/ImageDecoder';
import type { LoggerLike } from '@main/services/logging/Logger';
import type { UpdateSource } from '@main/services/sources/SourceRegistry';

export interface BundleDownloadOptions {
  assets?: BundleAssetSet;
  timeoutMs?: number;
  onProgress?: (completed: number, total: number, message: string) => void;
}

interface BundleDownloadWorkerOptions {
  downloadManager: DownloadManager;
  logger: LoggerLike;
  imageDecoder?: ImageDecoder;
  defaultTimeoutMs?: number;
}

interface PendingAsset {
  kind: BundleAssetKind;
  url: URL;
  slot: number;
  handle: DownloadHandle | null;
  done: boolean;
}

type AssetOutcome = { ok: true; filePath: string } | { ok: false; message: string };

const PROGRESS_MESSAGES: Record<BundleAssetKind, string> = {
  archive: 'Downloaded extension archive',
  signature: 'Downloaded signature file',
  screenshot: 'Downloaded screenshot'
};

/**
 * Downloads every asset of one extension version concurrently and waits for
 * all of them, up to a timeout. Failed assets become error entries; a timeout
 * cancels what is still outstanding, records one error per outstanding asset
 * and ignores anything that arrives afterwards.
 */
export class BundleDownloadWorker {
  private readonly downloadManager: DownloadManager;
  private readonly logger: LoggerLike;
  private readonly imageDecoder: ImageDecoder;
  private readonly defaultTimeoutMs: number;

  constructor(options: BundleDownloadWorkerOptions) {
    this.downloadManager = options.downloadManager;
    this.logger = options.logger;
    this.imageDecoder = options.imageDecoder ?? new ImageHeaderDecoder();
    this.defaultTimeoutMs = normalizeTimeout(options.defaultTimeoutMs, DEFAULT_BUNDLE_TIMEOUT_MS);
  }

  async run(
    source: UpdateSource,
    extensionVersion: ExtensionVersion,
    options?: BundleDownloadOptions
  ): Promise<BundleDownloadResult> {
    const assetSet = options?.assets ?? 'everything';
    const timeoutMs = normalizeTimeout(options?.timeoutMs, this.defaultTimeoutMs);
    const errors: string[] = [];
    const pending: PendingAsset[] = [];

    for (const planned of planAssets(extensionVersion, assetSet)) {
      const url = source.resolve(planned.path);
      if (!url) {
        errors.push(`Unable to resolve ${planned.kind} path "${planned.path}" against ${source.baseHref}`);
        continue;
      }
      pending.push({ kind: planned.kind, url, slot: planned.slot, handle: null, done: false });
    }

    const extensionName = extensionVersion.extInfo?.name ?? extensionVersion.downloadPath;
    if (pending.length === 0) {
      return { bundle: emptyBundle(), errors, timedOut: false };
    }

    const total = pending.length;
    let remaining = total;
    let closed = false;
    const archive: { file: string | null } = { file: null };
    const signature: { file: string | null } = { file: null };
    const screenshots = new Map<number, string>();

    let signalComplete: () => void = () => undefined;
    const completion = new Promise<'complete'>((resolve) => {
      signalComplete = () => resolve('complete');
    });

    // Single entry point for every outcome, whatever the asset kind.
    const record = (asset: PendingAsset, outcome: AssetOutcome): void => {
      if (closed || asset.done) {
        return;
      }

      asset.done = true;
      if (outcome.ok) {
        if (asset.kind === 'archive') {
          archive.file = outcome.filePath;
        } else if (asset.kind === 'signature') {
          signature.file = outcome.filePath;
        } else {
          screenshots.set(asset.slot, outcome.filePath);
        }
      } else {
        errors.push(outcome.message);
      }

      remaining -= 1;
      if (remaining === 0) {
        signalComplete();
      }
      const message = outcome.ok ? PROGRESS_MESSAGES[asset.kind] : outcome.message;
      this.reportProgress(options?.onProgress, total - remaining, total, message);
    };

    this.logger.info('update.bundle.start', {
      extension: extensionName,
      source: source.name,
      assets: assetSet,
      requests: total,
      timeoutMs
    });

    for (const asset of pending) {
      try {
        asset.handle = this.downloadManager.download(asset.url, {
          downloadComplete: (_url, filePath) => {
            void this.inspect(asset.kind, filePath).then(
              (outcome) => record(asset, outcome),
              (error: unknown) =>
                record(asset, { ok: false, message: error instanceof Error ? error.message : String(error) })
            );
          },
          downloadFailed: (_url, message) => {
            record(asset, { ok: false, message });
          }
        });
      } catch (error) {
        record(asset, { ok: false, message: error instanceof Error ? error.message : String(error) });
      }
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([completion, timeout]);
    clearTimeout(timer);

    const timedOut = outcome === 'timeout';
    if (timedOut) {
      const outstanding = pending.filter((asset) => !asset.done);
      for (const asset of outstanding) {
        asset.handle?.cancel();
        errors.push(`Timed out waiting for ${asset.url.href}`);
      }
      this.logger.warn('update.bundle.timeout', {
        extension: extensionName,
        timeoutMs,
        outstanding: outstanding.map((asset) => asset.url.href)
      });
    }
    closed = true;

    const bundle: DownloadedBundle = {
      archiveFile: archive.file,
      signatureFile: signature.file,
      screenshots: Array.from(screenshots.entries())
        .sort(([a], [b]) => a - b)
        .map(([, filePath]) => filePath)
    };

    this.logger.info('update.bundle.finish', {
      extension: extensionName,
      errors: errors.length,
      timedOut
    });

    return { bundle, errors: [...errors], timedOut };
  }

  // Empty or missing files count as failures; screenshots must also decode.
  private async inspect(kind: BundleAssetKind, filePath: string): Promise<AssetOutcome> {
    if (!(await isUsableFile(filePath))) {
      return { ok: false, message: EMPTY_FILE_MESSAGE };
    }
    if (kind !== 'screenshot') {
      return { ok: true, filePath };
    }

    try {
      await this.imageDecoder.decode(filePath);
      return { ok: true, filePath };
    } catch (error) {
      return {
        ok: false,
        message: `Failed to parse downloaded screenshot: ${error instanceof Error ? error.message : String(error)}`
      };
    }
  }

  private reportProgress(
    onProgress: BundleDownloadOptions['onProgress'],
    completed: number,
    total: number,
    message: string
  ): void {
    if (!onProgress) {
      return;
    }

    try {
      onProgress(completed, total, message);
    } catch (error) {
      this.logger.warn('update.bundle.progress_error', {
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

function planAssets(
  extensionVersion: ExtensionVersion,
  assetSet: BundleAssetSet
): Array<{ kind: BundleAssetKind; path: string; slot: number }> {
  const includeArchive = assetSet !== 'screenshots';
  const includeSignature = assetSet === 'archive-and-signature' || assetSet === 'everything';
  const includeScreenshots = assetSet === 'screenshots' || assetSet === 'everything';
  const planned: Array<{ kind: BundleAssetKind; path: string; slot: number }> = [];

  if (includeArchive) {
    planned.push({ kind: 'archive', path: extensionVersion.downloadPath, slot: 0 });
  }
  if (includeSignature && extensionVersion.signaturePath) {
    planned.push({ kind: 'signature', path: extensionVersion.signaturePath, slot: 0 });
  }
  if (includeScreenshots) {
    extensionVersion.screenshots.forEach((screenshot, index) => {
      planned.push({ kind: 'screenshot', path: screenshot, slot: index });
    });
  }

  return planned;
}

function emptyBundle(): DownloadedBundle {
  return { archiveFile: null, signatureFile: null, screenshots: [] };
}

function normalizeTimeout(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.trunc(value);
}
