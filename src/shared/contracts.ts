export interface VersionTag {
  raw: string;
  key: string;
}

export interface ExtensionInfo {
  name: string | null;
  version: string | null;
  author: string | null;
  authorUrl: string | null;
  extensionUrl: string | null;
  targetAppName: string | null;
  targetAppVersion: string | null;
  shortDescription: string | null;
  longDescription: string | null;
  releaseNotes: string | null;
  customFields: Readonly<Record<string, string>>;
}

export interface ExtensionVersion {
  readonly extInfo: ExtensionInfo | null;
  readonly downloadPath: string;
  readonly signaturePath: string | null;
  readonly screenshots: readonly string[];
}

export interface ExtensionEntry {
  readonly name: string;
  readonly versions: readonly ExtensionVersion[];
}

export interface AppVersion {
  readonly version: string;
  readonly extensions: readonly ExtensionEntry[];
}

export interface ManifestQueryOptions {
  allowSnapshots?: boolean;
}

export interface SourceDefinition {
  name: string;
  baseUrl: string;
  versionManifest: string;
  publicKey: string | null;
}

export interface SourcesDocument {
  applicationName: string;
  allowSnapshots: boolean;
  updateSources: SourceDefinition[];
}

export type BundleAssetSet = 'archive' | 'archive-and-signature' | 'screenshots' | 'everything';

export type BundleAssetKind = 'archive' | 'signature' | 'screenshot';

export interface DownloadedBundle {
  archiveFile: string | null;
  signatureFile: string | null;
  screenshots: string[];
}

export interface BundleDownloadResult {
  bundle: DownloadedBundle;
  errors: string[];
  timedOut: boolean;
}

export type ImageFormat = 'png' | 'jpeg' | 'gif';

export interface DecodedImage {
  filePath: string;
  format: ImageFormat;
  width: number;
  height: number;
}

export interface RestartRequested {
  kind: 'restart-requested';
  exitCode: number;
  requestedAt: string;
}

export interface UpdateSettings {
  allowSnapshots: boolean | null;
  downloadTimeoutMs: number;
  updatedAt: string;
}

export interface UpdateSettingsPatch {
  allowSnapshots?: boolean | null;
  downloadTimeoutMs?: number;
}
