import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpDownloadManager } from '@main/services/download/HttpDownloadManager';

const tempDirs: string[] = [];

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

type Outcome = { kind: 'complete'; url: string; filePath: string } | { kind: 'failed'; url: string; message: string };

function start(manager: HttpDownloadManager, href: string) {
  let resolveOutcome: (outcome: Outcome) => void = () => undefined;
  const outcome = new Promise<Outcome>((resolve) => {
    resolveOutcome = resolve;
  });
  const handle = manager.download(new URL(href), {
    downloadComplete: (url, filePath) => resolveOutcome({ kind: 'complete', url: url.href, filePath }),
    downloadFailed: (url, message) => resolveOutcome({ kind: 'failed', url: url.href, message })
  });

  return { handle, outcome };
}

function createManager() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ext-updates-http-'));
  tempDirs.push(dir);
  const manager = new HttpDownloadManager({
    downloadDir: path.join(dir, 'downloads'),
    userAgent: 'SampleApp-updates'
  });
  return { dir, manager };
}

describe('HttpDownloadManager', () => {
  it('writes the response body into the download directory', async () => {
    const { dir, manager } = createManager();
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('archive bytes', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const { outcome } = start(manager, 'https://updates.example.invalid/app/extensions/foo@1.0.jar');
    const result = await outcome;

    expect(result.kind).toBe('complete');
    if (result.kind !== 'complete') {
      return;
    }
    expect(path.basename(result.filePath)).toBe('foo_1.0.jar');
    expect(result.filePath.startsWith(path.join(dir, 'downloads'))).toBe(true);
    expect(fs.readFileSync(result.filePath, 'utf-8')).toBe('archive bytes');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://updates.example.invalid/app/extensions/foo@1.0.jar',
      expect.objectContaining({ headers: { Accept: '*/*', 'User-Agent': 'SampleApp-updates' } })
    );
  });

  it('fails on a non-success status', async () => {
    const { manager } = createManager();
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('missing', { status: 404 }))
    );

    const result = await start(manager, 'https://updates.example.invalid/app/foo.jar').outcome;

    expect(result).toEqual({
      kind: 'failed',
      url: 'https://updates.example.invalid/app/foo.jar',
      message: 'HTTP 404 for https://updates.example.invalid/app/foo.jar'
    });
  });

  it('reports cancellation', async () => {
    const { manager } = createManager();
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    const { handle, outcome } = start(manager, 'https://updates.example.invalid/app/foo.jar');
    handle.cancel();

    expect(await outcome).toEqual({
      kind: 'failed',
      url: 'https://updates.example.invalid/app/foo.jar',
      message: 'Download cancelled: https://updates.example.invalid/app/foo.jar'
    });
  });

  it('hands back local files without copying them', async () => {
    const { dir, manager } = createManager();
    const filePath = path.join(dir, 'manifest.json');
    fs.writeFileSync(filePath, '{}', 'utf-8');

    const result = await start(manager, pathToFileURL(filePath).href).outcome;

    expect(result).toEqual({ kind: 'complete', url: pathToFileURL(filePath).href, filePath });
  });

  it('fails on a missing local file', async () => {
    const { dir, manager } = createManager();
    const filePath = path.join(dir, 'missing.json');

    const result = await start(manager, pathToFileURL(filePath).href).outcome;

    expect(result).toEqual({ kind: 'failed', url: pathToFileURL(filePath).href, message: `File not found: ${filePath}` });
  });

  it('rejects unsupported protocols', async () => {
    const { manager } = createManager();

    const result = await start(manager, 'ftp://updates.example.invalid/foo.jar').outcome;

    expect(result).toEqual({
      kind: 'failed',
      url: 'ftp://updates.example.invalid/foo.jar',
      message: 'Unsupported protocol ftp: for ftp://updates.example.invalid/foo.jar'
    });
  });
});
