/**
 * Rolling Logger
 *
 * JSON-lines logger that mirrors every entry to the console and, when a log
 * directory is configured, to a file with automatic rotation:
 * - At 2MB, current log moves to .backup.log
 * - If backup exists when rotating, delete it first
 *
 * Nothing is written to disk unless a log directory is given.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

// Maximum log file size before rotation (2MB)
const MAX_LOG_SIZE = 2 * 1024 * 1024;

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerConfig {
  name: string;             // Log file base name (e.g., 'm4b-maker' -> m4b-maker.log)
  logDir?: string | null;   // File output only when set
  maxSize?: number;         // Max size in bytes (default: 2MB)
  consoleOutput?: boolean;  // Also log to console (default: true outside production)
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

/**
 * Minimal surface the pipeline depends on, so tests can pass a silent logger.
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  return data;
}

export class RollingLogger implements Logger {
  private logPath: string | null;
  private backupPath: string | null;
  private maxSize: number;
  private consoleOutput: boolean;
  private writeStream: fs.WriteStream | null = null;
  private currentSize: number = 0;
  private initialized: boolean = false;

  // Serializes writes so rotation never interleaves with an append
  private pending: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig) {
    this.logPath = config.logDir ? path.join(config.logDir, `${config.name}.log`) : null;
    this.backupPath = config.logDir ? path.join(config.logDir, `${config.name}.backup.log`) : null;
    this.maxSize = config.maxSize || MAX_LOG_SIZE;
    this.consoleOutput = config.consoleOutput ?? (process.env.NODE_ENV !== 'production');
  }

  /**
   * Create the log directory and open the file stream (no-op without a log dir)
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    if (!this.logPath) return;

    await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });

    try {
      const stats = await fs.promises.stat(this.logPath);
      this.currentSize = stats.size;

      if (this.currentSize >= this.maxSize) {
        await this.rotate();
      }
    } catch {
      // File doesn't exist yet
      this.currentSize = 0;
    }

    this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });

    this.info('Logger initialized', {
      logPath: this.logPath,
      platform: os.platform(),
      maxSize: this.maxSize,
    });
  }

  private async rotate(): Promise<void> {
    if (!this.logPath || !this.backupPath) return;

    if (this.writeStream) {
      const stream = this.writeStream;
      this.writeStream = null;
      await new Promise<void>((resolve) => stream.end(() => resolve()));
    }

    try {
      await fs.promises.unlink(this.backupPath);
    } catch {
      // No backup yet
    }

    try {
      await fs.promises.rename(this.logPath, this.backupPath);
    } catch {
      // Current doesn't exist
    }

    this.currentSize = 0;
    this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  private async write(entry: LogEntry): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }

    if (this.logPath) {
      const line = JSON.stringify(entry) + '\n';
      const lineSize = Buffer.byteLength(line, 'utf8');

      if (this.currentSize + lineSize >= this.maxSize) {
        await this.rotate();
      }

      if (this.writeStream) {
        this.writeStream.write(line);
        this.currentSize += lineSize;
      }
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (data !== undefined) {
      entry.data = serializeData(data);
    }

    // Console output is synchronous so ordering matches call order
    if (this.consoleOutput) {
      const prefix = `[${entry.timestamp}] [${level}]`;
      const consoleMsg = entry.data !== undefined ? `${prefix} ${message} ${JSON.stringify(entry.data)}` : `${prefix} ${message}`;

      switch (level) {
        case 'ERROR':
          console.error(consoleMsg);
          break;
        case 'WARN':
          console.warn(consoleMsg);
          break;
        case 'DEBUG':
          console.debug(consoleMsg);
          break;
        default:
          console.log(consoleMsg);
      }
    }

    this.pending = this.pending.then(() => this.write(entry)).catch(console.error);
  }

  debug(message: string, data?: unknown): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('ERROR', message, data);
  }

  getLogPath(): string | null {
    return this.logPath;
  }

  /**
   * Wait for queued writes, then flush and close the file
   */
  async close(): Promise<void> {
    await this.pending;
    const stream = this.writeStream;
    this.writeStream = null;
    this.initialized = false;
    if (stream) {
      await new Promise<void>((resolve) => stream.end(() => resolve()));
    }
  }
}

// Process-wide logger used by the pipeline unless one is injected
let mainLogger: RollingLogger | null = null;

export function configureLogger(config: Omit<LoggerConfig, 'name'>): RollingLogger {
  mainLogger = new RollingLogger({ name: 'm4b-maker', ...config });
  return mainLogger;
}

export function getLogger(): RollingLogger {
  if (!mainLogger) {
    mainLogger = new RollingLogger({ name: 'm4b-maker', logDir: process.env.M4B_MAKER_LOG_DIR || null });
  }
  return mainLogger;
}

export async function closeLogger(): Promise<void> {
  await mainLogger?.close();
}

/**
 * Discards everything. For tests and embedding callers that log elsewhere.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
