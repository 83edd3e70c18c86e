import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LoggerLike } from '@main/services/logging/Logger';
import type { DownloadHandle, DownloadListener, DownloadManager } from '@main/services/download/DownloadManager';

interface HttpDownloadManagerOptions {
  downloadDir: string;
  userAgent?: string;
  logger?: LoggerLike;
}

/**
 * Default {@link DownloadManager}: `http(s)` through the global `fetch` into
 * `downloadDir`, `file:` URLs handed back as their local path.
 */
export class HttpDownloadManager implements DownloadManager {
  private readonly downloadDir: string;
  private readonly userAgent: string;
  private readonly logger: LoggerLike | null;

  constructor(options: HttpDownloadManagerOptions) {
    this.downloadDir = options.downloadDir;
    this.userAgent = options.userAgent ?? 'ExtensionUpdates/1.0';
    this.logger = options.logger ?? null;
  }

  download(url: URL, listener: DownloadListener): DownloadHandle {
    const target = new URL(url.href);
    const controller = new AbortController();
    let settled = false;

    const settle = (outcome: { ok: true; filePath: string } | { ok: false; message: string }): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (outcome.ok) {
        this.logger?.debug('download.complete', { url: target.href, filePath: outcome.filePath });
        listener.downloadComplete(target, outcome.filePath);
      } else {
        this.logger?.warn('download.failed', { url: target.href, reason: outcome.message });
        listener.downloadFailed(target, outcome.message);
      }
    };

    void this.transfer(target, controller.signal)
      .then(settle)
      .catch((error: unknown) => {
        this.logger?.error('download.listener.error', {
          url: target.href,
          reason: error instanceof Error ? error.message : String(error)
        });
      });

    return {
      url: target,
      cancel: () => {
        if (!settled) {
          controller.abort();
        }
      }
    };
  }

  private async transfer(
    url: URL,
    signal: AbortSignal
  ): Promise<{ ok: true; filePath: string } | { ok: false; message: string }> {
    try {
      if (url.protocol === 'file:') {
        return readLocalFile(url);
      }

      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return { ok: false, message: `Unsupported protocol ${url.protocol} for ${url.href}` };
      }

      const response = await fetch(url.href, {
        headers: {
          Accept: '*/*',
          'User-Agent': this.userAgent
        },
        signal
      });

      if (!response.ok) {
        return { ok: false, message: `HTTP ${response.status} for ${url.href}` };
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      if (signal.aborted) {
        return { ok: false, message: `Download cancelled: ${url.href}` };
      }

      const targetDir = path.join(this.downloadDir, crypto.randomUUID());
      fs.mkdirSync(targetDir, { recursive: true });
      const filePath = path.join(targetDir, safeFileNameFromUrl(url));
      fs.writeFileSync(filePath, bytes);
      return { ok: true, filePath };
    } catch (error) {
      if (signal.aborted) {
        return { ok: false, message: `Download cancelled: ${url.href}` };
      }

      return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
}

function readLocalFile(url: URL): { ok: true; filePath: string } | { ok: false; message: string } {
  const filePath = fileURLToPath(url);
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    return { ok: false, message: `File not found: ${filePath}` };
  }

  return { ok: true, filePath };
}

function safeFileNameFromUrl(url: URL): string {
  const name = path.posix.basename(url.pathname);
  const safe = name.trim().replace(/[^a-zA-Z0-9._-]+/g, '_');
  return safe || 'download.bin';
}
