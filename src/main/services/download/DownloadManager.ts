export interface DownloadListener {
  downloadComplete(url: URL, filePath: string): void;
  downloadFailed(url: URL, message: string): void;
}

export interface DownloadHandle {
  readonly url: URL;
  cancel(): void;
}

/**
 * Single-file asynchronous fetch. Every call to `download` must end in exactly
 * one listener callback, delivered after `download` has returned or during it.
 */
export interface DownloadManager {
  download(url: URL, listener: DownloadListener): DownloadHandle;
}
