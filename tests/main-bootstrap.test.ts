import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DownloadHandle, DownloadListener, DownloadManager } from '@main/services/download/DownloadManager';
import { bootstrapExtensionUpdates } from '@main/main';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

class LocalCopyDownloadManager implements DownloadManager {
  readonly requests: string[] = [];
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  download(url: URL, listener: DownloadListener): DownloadHandle {
    this.requests.push(url.href);
    const filePath = path.join(this.dir, path.posix.basename(url.pathname));
    void Promise.resolve().then(() => {
      fs.writeFileSync(filePath, `bytes of ${url.href}`);
      listener.downloadComplete(url, filePath);
    });
    return { url, cancel: vi.fn() };
  }
}

function createWorkspace(sources: unknown) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ext-updates-bootstrap-'));
  tempDirs.push(dir);
  const sourcesFile = path.join(dir, 'update_sources.json');
  fs.writeFileSync(sourcesFile, JSON.stringify(sources), 'utf-8');
  const downloadDir = path.join(dir, 'downloaded');
  fs.mkdirSync(downloadDir);
  return { dir, sourcesFile, downloadManager: new LocalCopyDownloadManager(downloadDir) };
}

function readLog(baseDir: string): Array<{ message: string; meta?: unknown }> {
  const filePath = path.join(baseDir, 'logs', 'extension-updates.log');
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return fs
    .readFileSync(filePath, 'utf-8')
    .split('\n')
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line));
}

const SOURCES = {
  applicationName: 'SampleApp',
  allowSnapshots: false,
  updateSources: [
    { name: 'Official', baseUrl: 'https://updates.example.invalid/app', versionManifest: 'version_manifest.json' }
  ]
};

describe('bootstrapExtensionUpdates', () => {
  it('wires the registry, settings and coordinator', () => {
    const { dir, sourcesFile, downloadManager } = createWorkspace(SOURCES);

    const result = bootstrapExtensionUpdates({ baseDir: dir, sourcesFile, downloadManager, env: {} });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const { runtime } = result;
    expect(runtime.coordinator.applicationName).toBe('SampleApp');
    expect(runtime.registry.getSources().map((source) => source.name)).toEqual(['Official']);
    expect(runtime.queryOptions()).toEqual({ allowSnapshots: false });

    runtime.settings.set({ allowSnapshots: true });
    expect(runtime.queryOptions()).toEqual({ allowSnapshots: true });

    const bootEntry = readLog(dir).find((entry) => entry.message === 'app.bootstrap');
    expect(bootEntry?.meta).toEqual({
      applicationName: 'SampleApp',
      sources: ['Official'],
      allowSnapshots: false,
      timeoutOverride: null
    });
  });

  it('downloads a bundle with the timeout taken from the environment', async () => {
    const { dir, sourcesFile, downloadManager } = createWorkspace(SOURCES);
    const result = bootstrapExtensionUpdates({
      baseDir: dir,
      sourcesFile,
      downloadManager,
      env: { EXT_UPDATES_TIMEOUT_MS: '2500' }
    });
    if (!result.ok) {
      throw new Error(result.error);
    }
    const source = result.runtime.registry.getSources()[0];

    const downloaded = await result.runtime.downloadExtension(source, {
      extInfo: null,
      downloadPath: 'extensions/foo-1.0.0.jar',
      signaturePath: 'extensions/foo-1.0.0.jar.sig',
      screenshots: []
    });

    expect(downloaded.errors).toEqual([]);
    expect(downloaded.bundle.archiveFile).not.toBeNull();
    expect(downloaded.bundle.signatureFile).not.toBeNull();
    expect(downloadManager.requests).toEqual([
      'https://updates.example.invalid/app/extensions/foo-1.0.0.jar',
      'https://updates.example.invalid/app/extensions/foo-1.0.0.jar.sig'
    ]);
    const startEntry = readLog(dir).find((entry) => entry.message === 'update.bundle.start');
    expect(startEntry?.meta).toMatchObject({ timeoutMs: 2500, requests: 2 });
  });

  it('passes restart requests to the host', () => {
    const { dir, sourcesFile, downloadManager } = createWorkspace(SOURCES);
    const onRestartRequested = vi.fn();
    const result = bootstrapExtensionUpdates({ baseDir: dir, sourcesFile, downloadManager, onRestartRequested, env: {} });
    if (!result.ok) {
      throw new Error(result.error);
    }

    const request = result.runtime.coordinator.requestRestart();

    expect(onRestartRequested).toHaveBeenCalledWith(request);
    expect(request.exitCode).toBe(100);
  });

  it('honours the log level from the environment', () => {
    const { dir, sourcesFile, downloadManager } = createWorkspace(SOURCES);

    const result = bootstrapExtensionUpdates({
      baseDir: dir,
      sourcesFile,
      downloadManager,
      env: { EXT_UPDATES_LOG_LEVEL: 'warn' }
    });

    expect(result.ok).toBe(true);
    expect(readLog(dir)).toEqual([]);
  });

  it('fails and logs when the source configuration is invalid', () => {
    const { dir, sourcesFile, downloadManager } = createWorkspace({ updateSources: [] });

    const result = bootstrapExtensionUpdates({ baseDir: dir, sourcesFile, downloadManager, env: {} });

    expect(result).toEqual({ ok: false, error: 'applicationName: Required' });
    expect(readLog(dir).map((entry) => entry.message)).toEqual(['app.bootstrap.sources_invalid']);
  });
});
