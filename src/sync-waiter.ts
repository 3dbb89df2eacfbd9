/**
 * Sync Waiter
 *
 * Polls the cloud-sync folder for an export that arrived after a given
 * time. The wait is bounded: expiry raises SYNC_TIMEOUT, which callers
 * treat as a per-book failure.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { PipelineError } from './errors';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import type { Book, ExportArtifact } from './types';

export const EXPORT_EXTENSIONS = new Set(['.html', '.htm', '.md', '.txt']);

// Partially synced files (OneDrive, Dropbox, browsers, editors)
const PARTIAL_PATTERNS = [/\.tmp$/i, /\.partial$/i, /\.crdownload$/i, /\.part$/i, /^~\$/];

export interface SyncWaiterOptions {
  pollIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface AwaitOptions {
  /** Paths already claimed this run */
  exclude?: ReadonlySet<string>;
  /** Book the export was triggered for (best-effort correlation) */
  book?: Book;
}

interface Candidate {
  path: string;
  fileName: string;
  modifiedAt: number;
}

export function isExportFile(fileName: string): boolean {
  if (fileName.startsWith('.')) return false;
  if (PARTIAL_PATTERNS.some(pattern => pattern.test(fileName))) return false;
  return EXPORT_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Loose title comparison: Kindle names exports after the book, but trims
 * and rewrites punctuation on the way.
 */
export function titleMatchesFile(title: string, fileName: string): boolean {
  const simplify = (value: string) => value.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '');
  const stem = simplify(path.parse(fileName).name.replace(/\s*-\s*notebook$/i, ''));
  const wanted = simplify(title);
  if (!stem || !wanted) return false;
  return stem.includes(wanted) || wanted.includes(stem);
}

export class SyncWaiter {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: SyncWaiterOptions) {
    if (options.pollIntervalMs <= 0) {
      throw new RangeError(`pollIntervalMs must be positive, got ${options.pollIntervalMs}`);
    }
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Wait for a file newer than `sinceTimestamp`. Within one poll cycle the
   * newest candidate wins, since sync clients do not deliver in order.
   */
  async awaitArtifact(
    watchFolder: string,
    sinceTimestamp: number,
    timeoutMs: number,
    options: AwaitOptions = {}
  ): Promise<ExportArtifact> {
    const deadline = this.clock.now() + timeoutMs;

    for (;;) {
      const candidates = await this.scan(watchFolder, sinceTimestamp, options.exclude);

      if (candidates.length > 0) {
        const newest = candidates.reduce((a, b) => (b.modifiedAt > a.modifiedAt ? b : a));
        const artifact: ExportArtifact = {
          ...newest,
          discoveredAt: this.clock.now(),
          book: options.book,
        };

        if (options.book && !titleMatchesFile(options.book.title, newest.fileName)) {
          this.logger.warn('Export file name does not match book title', {
            title: options.book.title,
            fileName: newest.fileName,
          });
        }
        if (candidates.length > 1) {
          this.logger.debug('Several new exports in one poll, took the newest', {
            chosen: newest.fileName,
            others: candidates.filter(c => c !== newest).map(c => c.fileName),
          });
        }

        this.logger.info('Export arrived', { fileName: artifact.fileName });
        return artifact;
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw new PipelineError(
          'SYNC_TIMEOUT',
          'sync',
          `No new export in ${watchFolder} within ${timeoutMs} ms`,
          options.book?.title
        );
      }
      await this.clock.sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private async scan(
    watchFolder: string,
    sinceTimestamp: number,
    exclude: ReadonlySet<string> = new Set()
  ): Promise<Candidate[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(watchFolder);
    } catch (err) {
      // The sync client may not have created the folder yet
      this.logger.warn('Watch folder not readable', { watchFolder, error: err });
      return [];
    }

    const candidates: Candidate[] = [];
    for (const fileName of entries) {
      if (!isExportFile(fileName)) continue;
      const filePath = path.join(watchFolder, fileName);
      if (exclude.has(filePath)) continue;

      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile() && stats.mtimeMs > sinceTimestamp) {
          candidates.push({ path: filePath, fileName, modifiedAt: stats.mtimeMs });
        }
      } catch {
        // Removed between readdir and stat
        continue;
      }
    }
    return candidates;
  }
}
