import type { KeyObject } from 'node:crypto';
import type { DecodedImage, ExtensionVersion, RestartRequested } from '@shared/contracts';
import type { DownloadListener, DownloadManager } from '@main/services/download/DownloadManager';
import { EMPTY_FILE_MESSAGE, isUsableFile, readPayload } from '@main/services/download/localFiles';
import { NodeSignatureVerifier, type SignatureVerifier } from '@main/services/crypto/SignatureVerifier';
import { ImageHeaderDecoder, type ImageDecoder } from '@main/services/images/ImageDecoder';
import type { LoggerLike } from '@main/services/logging/Logger';
import { ManifestValidator } from '@main/services/manifest/ManifestValidator';
import type { VersionManifest } from '@main/services/manifest/VersionManifest';
import type { SourceRegistry, UpdateSource } from '@main/services/sources/SourceRegistry';

/** Exit status an external launcher treats as "relaunch the application". */
export const APPLICATION_RESTART_EXIT_CODE = 100;

export interface ManifestRetrievedEvent {
  source: UpdateSource;
  url: URL;
  manifest: VersionManifest;
}

export interface PublicKeyRetrievedEvent {
  source: UpdateSource;
  url: URL | null;
  publicKey: KeyObject | null;
}

export interface FileRetrievedEvent {
  url: URL;
  filePath: string;
}

export interface ScreenshotRetrievedEvent {
  url: URL;
  image: DecodedImage;
}

export interface RetrievalFailedEvent {
  url: URL | null;
  reason: string;
}

/**
 * Callbacks arrive on whatever turn of the event loop the download finished
 * on; UI consumers must marshal to their own update cycle.
 */
export interface UpdateObserver {
  manifestRetrieved?(event: ManifestRetrievedEvent): void;
  publicKeyRetrieved?(event: PublicKeyRetrievedEvent): void;
  assetRetrieved?(event: FileRetrievedEvent): void;
  signatureRetrieved?(event: FileRetrievedEvent): void;
  screenshotRetrieved?(event: ScreenshotRetrievedEvent): void;
  retrievalFailed?(event: RetrievalFailedEvent): void;
}

export type ShutdownHook = () => void;

interface UpdateCoordinatorOptions {
  registry: SourceRegistry;
  downloadManager: DownloadManager;
  logger: LoggerLike;
  signatureVerifier?: SignatureVerifier;
  imageDecoder?: ImageDecoder;
  manifestValidator?: ManifestValidator;
  onRestartRequested?: (request: RestartRequested) => void;
}

export class UpdateCoordinator {
  private readonly registry: SourceRegistry;
  private readonly downloadManager: DownloadManager;
  private readonly logger: LoggerLike;
  private readonly signatureVerifier: SignatureVerifier;
  private readonly imageDecoder: ImageDecoder;
  private readonly manifestValidator: ManifestValidator;
  private readonly onRestartRequested: ((request: RestartRequested) => void) | null;
  private readonly observers: UpdateObserver[] = [];
  private readonly shutdownHooks: ShutdownHook[] = [];

  constructor(options: UpdateCoordinatorOptions) {
    this.registry = options.registry;
    this.downloadManager = options.downloadManager;
    this.logger = options.logger;
    this.signatureVerifier = options.signatureVerifier ?? new NodeSignatureVerifier();
    this.imageDecoder = options.imageDecoder ?? new ImageHeaderDecoder();
    this.manifestValidator = options.manifestValidator ?? new ManifestValidator();
    this.onRestartRequested = options.onRestartRequested ?? null;
  }

  get applicationName(): string {
    return this.registry.applicationName;
  }

  getSources(): UpdateSource[] {
    return this.registry.getSources();
  }

  subscribe(observer: UpdateObserver): void {
    if (!this.observers.includes(observer)) {
      this.observers.push(observer);
    }
  }

  unsubscribe(observer: UpdateObserver): void {
    const index = this.observers.indexOf(observer);
    if (index >= 0) {
      this.observers.splice(index, 1);
    }
  }

  retrieveManifest(source: UpdateSource): void {
    const url = source.versionManifestUrl;
    if (!url) {
      this.fail(null, `Unable to retrieve version manifest: invalid location for source ${source.name}.`);
      return;
    }

    this.logger.info('update.manifest.request', { source: source.name, url: url.href });
    this.request(url, 'Unable to retrieve version manifest: ', (filePath) => this.handleManifest(source, url, filePath));
  }

  retrievePublicKey(source: UpdateSource): void {
    if (!source.hasPublicKey) {
      const event: PublicKeyRetrievedEvent = { source, url: null, publicKey: null };
      this.broadcast('publicKeyRetrieved', (observer) => observer.publicKeyRetrieved?.(event));
      return;
    }

    const url = source.publicKeyUrl;
    if (!url) {
      this.fail(null, `Unable to retrieve public key: invalid location for source ${source.name}.`);
      return;
    }

    this.logger.info('update.public_key.request', { source: source.name, url: url.href });
    this.request(url, 'Unable to retrieve public key: ', (filePath) => this.handlePublicKey(source, url, filePath));
  }

  retrieveAsset(location: URL | string): void {
    this.retrieveFile(location, 'Unable to retrieve extension archive: ', 'assetRetrieved');
  }

  retrieveExtensionArchive(source: UpdateSource, extensionVersion: ExtensionVersion): void {
    const url = source.resolve(extensionVersion.downloadPath);
    if (!url) {
      this.fail(null, `Unable to retrieve extension archive: cannot resolve ${extensionVersion.downloadPath}.`);
      return;
    }

    this.retrieveAsset(url);
  }

  retrieveSignature(location: URL | string): void {
    this.retrieveFile(location, 'Unable to retrieve signature: ', 'signatureRetrieved');
  }

  retrieveScreenshot(location: URL | string): void {
    const url = toUrl(location);
    if (!url) {
      this.fail(null, `Unable to retrieve screenshot: invalid location ${String(location)}.`);
      return;
    }

    this.request(url, 'Unable to retrieve screenshot: ', (filePath) => this.handleScreenshot(url, filePath));
  }

  registerShutdownHook(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  unregisterShutdownHook(hook: ShutdownHook): void {
    const index = this.shutdownHooks.indexOf(hook);
    if (index >= 0) {
      this.shutdownHooks.splice(index, 1);
    }
  }

  /**
   * Runs the shutdown hooks in registration order and hands a restart request
   * to the host. Terminating the process (with `exitCode`) is the host's job.
   */
  requestRestart(): RestartRequested {
    for (const hook of [...this.shutdownHooks]) {
      try {
        hook();
      } catch (error) {
        this.logger.error('update.restart.hook_error', {
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    const request: RestartRequested = {
      kind: 'restart-requested',
      exitCode: APPLICATION_RESTART_EXIT_CODE,
      requestedAt: new Date().toISOString()
    };
    this.logger.info('update.restart.requested', { exitCode: request.exitCode, hooks: this.shutdownHooks.length });

    if (this.onRestartRequested) {
      try {
        this.onRestartRequested(request);
      } catch (error) {
        this.logger.error('update.restart.host_error', {
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return request;
  }

  private retrieveFile(location: URL | string, failurePrefix: string, event: 'assetRetrieved' | 'signatureRetrieved'): void {
    const url = toUrl(location);
    if (!url) {
      this.fail(null, `${failurePrefix}invalid location ${String(location)}.`);
      return;
    }

    this.request(url, failurePrefix, async (filePath) => {
      if (!(await isUsableFile(filePath))) {
        this.fail(url, `${failurePrefix}${EMPTY_FILE_MESSAGE}`);
        return;
      }

      const retrieved: FileRetrievedEvent = { url, filePath };
      this.broadcast(event, (observer) => observer[event]?.(retrieved));
    });
  }

  private request(url: URL, failurePrefix: string, onFile: (filePath: string) => Promise<void>): void {
    const listener: DownloadListener = {
      downloadComplete: (_url, filePath) => {
        void onFile(filePath).catch((error: unknown) => {
          this.fail(url, `${failurePrefix}${error instanceof Error ? error.message : String(error)}`);
        });
      },
      downloadFailed: (_url, message) => {
        this.fail(url, `${failurePrefix}${message}`);
      }
    };

    try {
      this.downloadManager.download(url, listener);
    } catch (error) {
      this.fail(url, `${failurePrefix}${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async handleManifest(source: UpdateSource, url: URL, filePath: string): Promise<void> {
    const payload = await readPayload(filePath);
    if (!payload) {
      this.fail(url, `Unable to retrieve version manifest: ${EMPTY_FILE_MESSAGE}`);
      return;
    }

    const parsed = this.manifestValidator.parse(payload.toString('utf-8'));
    if (!parsed.ok) {
      this.fail(url, `Problem parsing manifest: ${parsed.error}`);
      return;
    }

    this.logger.info('update.manifest.retrieved', {
      source: source.name,
      url: url.href,
      applicationVersions: parsed.manifest.applicationVersions.length
    });
    const event: ManifestRetrievedEvent = { source, url, manifest: parsed.manifest };
    this.broadcast('manifestRetrieved', (observer) => observer.manifestRetrieved?.(event));
  }

  private async handlePublicKey(source: UpdateSource, url: URL, filePath: string): Promise<void> {
    const payload = await readPayload(filePath);
    if (!payload) {
      this.fail(url, `Unable to retrieve public key: ${EMPTY_FILE_MESSAGE}`);
      return;
    }

    let publicKey: KeyObject;
    try {
      publicKey = this.signatureVerifier.loadPublicKey(payload);
    } catch (error) {
      this.fail(url, `Problem parsing public key: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    const event: PublicKeyRetrievedEvent = { source, url, publicKey };
    this.broadcast('publicKeyRetrieved', (observer) => observer.publicKeyRetrieved?.(event));
  }

  private async handleScreenshot(url: URL, filePath: string): Promise<void> {
    if (!(await isUsableFile(filePath))) {
      this.fail(url, `Unable to retrieve screenshot: ${EMPTY_FILE_MESSAGE}`);
      return;
    }

    let image: DecodedImage;
    try {
      image = await this.imageDecoder.decode(filePath);
    } catch (error) {
      this.fail(url, `Problem loading screenshot: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    const event: ScreenshotRetrievedEvent = { url, image };
    this.broadcast('screenshotRetrieved', (observer) => observer.screenshotRetrieved?.(event));
  }

  private fail(url: URL | null, reason: string): void {
    this.logger.warn('update.retrieval.failed', { url: url?.href ?? null, reason });
    const event: RetrievalFailedEvent = { url, reason };
    this.broadcast('retrievalFailed', (observer) => observer.retrievalFailed?.(event));
  }

  private broadcast(event: keyof UpdateObserver, deliver: (observer: UpdateObserver) => void): void {
    for (const observer of [...this.observers]) {
      try {
        deliver(observer);
      } catch (error) {
        this.logger.error('update.observer.error', {
          event,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }
}

function toUrl(location: URL | string): URL | null {
  if (location instanceof URL) {
    return new URL(location.href);
  }

  try {
    return new URL(location);
  } catch {
    return null;
  }
}
