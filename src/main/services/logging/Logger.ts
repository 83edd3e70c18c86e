import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

interface LoggerOptions {
  fileName?: string;
  minLevel?: LogLevel;
  mirrorFilePath?: string | null;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const DEFAULT_FILE_NAME = 'extension-updates.log';
const ROTATE_AT_BYTES = 2 * 1024 * 1024;

/**
 * One JSON object per line (`ts`, `level`, `message`, `meta`) under
 * `<baseDir>/logs`. The file rolls over to `<name>.1` once it reaches 2 MiB.
 */
export class Logger {
  readonly path: string;
  private readonly mirrorPath: string | null;
  private readonly minRank: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const fileName = options?.fileName?.trim() ? path.basename(options.fileName.trim()) : DEFAULT_FILE_NAME;
    this.path = path.join(baseDir, 'logs', fileName);
    this.minRank = LEVEL_RANK[options?.minLevel ?? 'debug'];
    this.mirrorPath = options?.mirrorFilePath?.trim() || null;

    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    if (this.mirrorPath) {
      fs.mkdirSync(path.dirname(this.mirrorPath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const line = `${JSON.stringify({ ts: new Date().toISOString(), level, message, meta })}\n`;
    this.rollOver();
    fs.appendFileSync(this.path, line);

    if (this.mirrorPath) {
      try {
        fs.appendFileSync(this.mirrorPath, line);
      } catch {
        // mirror write failures are ignored
      }
    }
  }

  private rollOver(): void {
    let size: number;
    try {
      size = fs.statSync(this.path).size;
    } catch {
      return;
    }

    if (size >= ROTATE_AT_BYTES) {
      fs.renameSync(this.path, `${this.path}.1`);
    }
  }
}
