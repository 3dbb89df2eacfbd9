/**
 * Folder Ingest
 *
 * Offline conversion: run the ingestor over exports that are already on
 * disk, one file or a whole directory tree. No device involved.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { PipelineError, errorMessage } from './errors';
import type { ExportIngestor } from './export-ingestor';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import { isExportFile } from './sync-waiter';
import type { PipelineErrorCode, PipelineStage } from './types';

export type FileOutcome =
  | {
      status: 'success';
      path: string;
      notePath: string;
      backupPath: string | null;
      highlightCount: number;
    }
  | {
      status: 'failed';
      path: string;
      stage: PipelineStage;
      code: PipelineErrorCode;
      message: string;
    };

export interface FolderIngestOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Export files under `inputPath`, sorted so repeated runs visit them in
 * the same order. A file path is returned as-is if it looks like an export.
 */
export async function findExportFiles(inputPath: string): Promise<string[]> {
  const stats = await fs.stat(inputPath);
  if (stats.isFile()) {
    return isExportFile(path.basename(inputPath)) ? [inputPath] : [];
  }

  const found: string[] = [];
  const entries = await fs.readdir(inputPath, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(inputPath, entry.name);
    if (entry.isDirectory()) {
      if (entry.name.startsWith('.')) continue;
      found.push(...(await findExportFiles(entryPath)));
    } else if (entry.isFile() && isExportFile(entry.name)) {
      found.push(entryPath);
    }
  }
  return found.sort();
}

async function statExport(filePath: string): Promise<Stats> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    throw new PipelineError('READ_FAILED', 'convert', `Could not read ${path.basename(filePath)}: ${errorMessage(err)}`);
  }
}

export async function ingestFolder(
  inputPath: string,
  ingestor: ExportIngestor,
  options: FolderIngestOptions = {}
): Promise<FileOutcome[]> {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;

  const files = await findExportFiles(inputPath);
  logger.info('Converting existing exports', { inputPath, files: files.length });

  const outcomes: FileOutcome[] = [];
  for (const filePath of files) {
    try {
      const stats = await statExport(filePath);
      const result = await ingestor.ingest({
        path: filePath,
        fileName: path.basename(filePath),
        discoveredAt: clock.now(),
        modifiedAt: stats.mtimeMs,
      });
      outcomes.push({
        status: 'success',
        path: filePath,
        notePath: result.notePath,
        backupPath: result.backupPath,
        highlightCount: result.document.highlights.length,
      });
    } catch (err) {
      if (err instanceof PipelineError) {
        logger.warn('File failed', { path: filePath, code: err.code, message: err.message });
        outcomes.push({ status: 'failed', path: filePath, stage: err.stage, code: err.code, message: err.message });
      } else {
        logger.error('File failed with unexpected error', { path: filePath, error: err });
        outcomes.push({
          status: 'failed',
          path: filePath,
          stage: 'convert',
          code: 'WRITE_FAILED',
          message: errorMessage(err),
        });
      }
    }
  }
  return outcomes;
}

export function formatFolderSummary(outcomes: readonly FileOutcome[]): string {
  const converted = outcomes.filter(outcome => outcome.status === 'success').length;
  const lines = [`${converted} converted, ${outcomes.length - converted} failed`];
  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      lines.push(`  [ok]      ${outcome.path} (${outcome.highlightCount} highlights) -> ${outcome.notePath}`);
    } else {
      lines.push(`  [failed]  ${outcome.path} (${outcome.code}): ${outcome.message}`);
    }
  }
  return lines.join('\n');
}
