export type * from '@shared/contracts';
export { bootstrapExtensionUpdates } from '@main/main';
export type { BootstrapOptions, BootstrapResult, ExtensionUpdateRuntime } from '@main/main';
export { verifyBundle } from '@main/services/crypto/BundleVerifier';
export type { BundleVerification } from '@main/services/crypto/BundleVerifier';
export { NodeSignatureVerifier } from '@main/services/crypto/SignatureVerifier';
export type { SignatureVerifier } from '@main/services/crypto/SignatureVerifier';
export { UpdateSettingsStore } from '@main/services/config/UpdateSettingsStore';
export type { DownloadHandle, DownloadListener, DownloadManager } from '@main/services/download/DownloadManager';
export { HttpDownloadManager } from '@main/services/download/HttpDownloadManager';
export { ImageHeaderDecoder } from '@main/services/images/ImageDecoder';
export type { ImageDecoder } from '@main/services/images/ImageDecoder';
export { Logger } from '@main/services/logging/Logger';
export type { LoggerLike, LogLevel } from '@main/services/logging/Logger';
export { ManifestValidator, parseManifest } from '@main/services/manifest/ManifestValidator';
export type { ManifestParseResult } from '@main/services/manifest/ManifestValidator';
export { VersionManifest, serializeManifest } from '@main/services/manifest/VersionManifest';
export type { ManifestDocument } from '@main/services/manifest/VersionManifest';
export { SourceRegistry, UpdateSource, resolveLocation, unresolveLocation } from '@main/services/sources/SourceRegistry';
export type { SourceRegistryLoadOptions, SourceRegistryLoadResult } from '@main/services/sources/SourceRegistry';
export { BundleDownloadWorker } from '@main/services/update/BundleDownloadWorker';
export { DEFAULT_BUNDLE_TIMEOUT_MS } from '@shared/defaults';
export type { BundleDownloadOptions } from '@main/services/update/BundleDownloadWorker';
export { APPLICATION_RESTART_EXIT_CODE, UpdateCoordinator } from '@main/services/update/UpdateCoordinator';
export type {
  FileRetrievedEvent,
  ManifestRetrievedEvent,
  PublicKeyRetrievedEvent,
  RetrievalFailedEvent,
  ScreenshotRetrievedEvent,
  ShutdownHook,
  UpdateObserver
} from '@main/services/update/UpdateCoordinator';
export {
  compareVersions,
  isAtLeast,
  isAtMost,
  isExactly,
  isNewerThan,
  isOlderThan,
  isSnapshotVersion,
  majorVersionOf,
  normalizeVersion,
  toVersionTag,
  versionComparator
} from '@main/services/versions/VersionOrdering';
