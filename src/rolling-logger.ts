/**
 * Rolling Logger
 *
 * Platform-aware JSON-lines file logger with automatic rotation:
 * - Mac: ~/Library/Logs/KindleNotesSync/
 * - Windows: %APPDATA%/KindleNotesSync/logs/
 * - Linux: ~/.local/share/KindleNotesSync/logs/
 *
 * Rotation policy:
 * - At 2MB, current log moves to .backup
 * - If backup exists when rotating, delete it first
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

// Maximum log file size before rotation (2MB)
const MAX_LOG_SIZE = 2 * 1024 * 1024;

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * What pipeline stages log through. RollingLogger is the real one;
 * tests pass a silent or recording logger.
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

interface LoggerConfig {
  name: string;            // Log file base name (e.g., 'kindle-notes' -> kindle-notes.log)
  logDir?: string;         // Overrides the platform directory
  maxSize?: number;        // Max size in bytes (default: 2MB)
  consoleOutput?: boolean; // Also log to console (default: true outside production)
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

/**
 * Get platform-specific log directory
 */
export function getDefaultLogDirectory(): string {
  const platform = os.platform();

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Logs', 'KindleNotesSync');
  } else if (platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'KindleNotesSync', 'logs');
  } else {
    return path.join(os.homedir(), '.local', 'share', 'KindleNotesSync', 'logs');
  }
}

export class RollingLogger implements Logger {
  private logDir: string;
  private logPath: string;
  private backupPath: string;
  private maxSize: number;
  private consoleOutput: boolean;
  private writeStream: fs.WriteStream | null = null;
  private currentSize: number = 0;
  private initialized: boolean = false;
  // Writes are chained so entries land in call order
  private pending: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig) {
    this.logDir = config.logDir || getDefaultLogDirectory();
    this.logPath = path.join(this.logDir, `${config.name}.log`);
    this.backupPath = path.join(this.logDir, `${config.name}.backup.log`);
    this.maxSize = config.maxSize || MAX_LOG_SIZE;
    this.consoleOutput = config.consoleOutput ?? (process.env.NODE_ENV !== 'production');
  }

  /**
   * Initialize the logger - create directory and open file stream
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    await fs.promises.mkdir(this.logDir, { recursive: true });

    try {
      const stats = await fs.promises.stat(this.logPath);
      this.currentSize = stats.size;

      if (this.currentSize >= this.maxSize) {
        await this.rotate();
      }
    } catch {
      // No log file yet
      this.currentSize = 0;
    }

    this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });
    this.initialized = true;
  }

  private async rotate(): Promise<void> {
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }

    await fs.promises.rm(this.backupPath, { force: true });

    try {
      await fs.promises.rename(this.logPath, this.backupPath);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }

    this.currentSize = 0;
    this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  private async write(level: LogLevel, message: string, data?: unknown): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }

    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, message };
    if (data !== undefined) {
      entry.data = data;
    }

    const line = JSON.stringify(entry, errorReplacer) + '\n';
    const lineSize = Buffer.byteLength(line, 'utf8');

    if (this.currentSize + lineSize >= this.maxSize) {
      await this.rotate();
    }

    if (this.writeStream) {
      this.writeStream.write(line);
      this.currentSize += lineSize;
    }

    if (this.consoleOutput) {
      const prefix = `[${timestamp}] [${level}]`;
      const consoleMsg = data !== undefined
        ? `${prefix} ${message} ${JSON.stringify(data, errorReplacer)}`
        : `${prefix} ${message}`;

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
  }

  private enqueue(level: LogLevel, message: string, data?: unknown): void {
    this.pending = this.pending
      .then(() => this.write(level, message, data))
      .catch((err: unknown) => {
        console.error('[Logger] Failed to write log entry:', err);
      });
  }

  debug(message: string, data?: unknown): void {
    this.enqueue('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.enqueue('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.enqueue('WARN', message, data);
  }

  error(message: string, data?: unknown): void {
    this.enqueue('ERROR', message, data);
  }

  /**
   * Flush pending entries and close the file
   */
  async close(): Promise<void> {
    await this.pending;
    const stream = this.writeStream;
    if (!stream) return;

    await new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
    this.writeStream = null;
    this.initialized = false;
  }
}

/**
 * Logger that drops everything. Used by tests and library callers
 * that did not ask for logging.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

let mainLogger: RollingLogger | null = null;

/**
 * Get the application logger
 */
export function getMainLogger(logDir?: string, consoleOutput?: boolean): RollingLogger {
  if (!mainLogger) {
    mainLogger = new RollingLogger({ name: 'kindle-notes-sync', logDir, consoleOutput });
  }
  return mainLogger;
}

export async function closeLoggers(): Promise<void> {
  await mainLogger?.close();
  mainLogger = null;
}
