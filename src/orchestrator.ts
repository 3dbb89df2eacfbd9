/**
 * Orchestrator
 *
 * One run: session → collection → for each book, export → await the synced
 * file → convert and archive → record the outcome. A book's failure never
 * stops the run; only session-fatal errors do. Abort requests are honored
 * between books, never in the middle of a UI sequence.
 */

import type { AutomationContext } from './automation-context';
import { BookExportController } from './book-export-controller';
import type { Clock } from './clock';
import { CollectionNavigator } from './collection-navigator';
import type { ExportConfig } from './config';
import { withDeviceSession } from './device-session';
import { PipelineError, SessionFatalError, errorMessage } from './errors';
import { ExportIngestor } from './export-ingestor';
import type { IngestResult } from './export-ingestor';
import { RetryPolicy } from './retry-policy';
import type { Logger } from './rolling-logger';
import { SyncWaiter } from './sync-waiter';
import type { UiDriver } from './ui-driver';
import type { UiLabelTable } from './ui-labels';
import type {
  Book,
  BookOutcome,
  ExportArtifact,
  PipelineErrorCode,
  PipelineStage,
  RunCounts,
  RunResult,
} from './types';

export interface RunDependencies {
  driver: UiDriver;
  clock: Clock;
  logger: Logger;
  labels: UiLabelTable;
}

export type RunConfig = Omit<ExportConfig, 'labels' | 'adbPath' | 'logDir'>;

export interface RunOptions {
  signal?: AbortSignal;
  launchWaitMs?: number;
}

export function countOutcomes(outcomes: readonly BookOutcome[]): RunCounts {
  const counts: RunCounts = { success: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * Turn a stage failure into a recorded outcome. Session-fatal errors are
 * rethrown so the run stops.
 */
function failedOutcome(
  book: Book,
  err: unknown,
  stage: PipelineStage,
  code: PipelineErrorCode,
  logger: Logger
): BookOutcome {
  if (err instanceof PipelineError) {
    if (err.sessionFatal) throw err;
    logger.warn('Book failed', { title: book.title, stage: err.stage, code: err.code, message: err.message });
    return { status: 'failed', book, stage: err.stage, code: err.code, message: err.message };
  }
  const message = errorMessage(err);
  logger.error('Book failed with unexpected error', { title: book.title, stage, error: err });
  return { status: 'failed', book, stage, code, message };
}

export async function runExport(
  config: RunConfig,
  deps: RunDependencies,
  options: RunOptions = {}
): Promise<RunResult> {
  const { driver, clock, logger, labels } = deps;
  const startedAt = new Date(clock.now()).toISOString();
  const outcomes: BookOutcome[] = [];

  logger.info('Starting export run', {
    collection: config.collectionName,
    watchFolder: config.watchFolder,
    outputFolder: config.outputFolder,
  });

  try {
    await withDeviceSession(
      driver,
      { deviceSerial: config.deviceSerial, appPackage: config.kindlePackage, logger },
      async (handle) => {
        const ctx: AutomationContext = {
          handle,
          labels,
          retry: new RetryPolicy({ maxAttempts: config.retryAttempts, backoffMs: config.retryBackoffMs }, clock),
          clock,
          logger,
          uiTimeoutMs: config.uiTimeoutMs,
          maxScrolls: config.maxScrolls,
        };

        const navigator = new CollectionNavigator(ctx, {
          appPackage: config.kindlePackage,
          minTitleLength: config.minTitleLength,
          launchWaitMs: options.launchWaitMs,
        });
        const books = await navigator.open(config.collectionName);

        const controller = new BookExportController(ctx, {
          collectionName: config.collectionName,
          exportDelayMs: config.exportDelayMs,
        });
        const waiter = new SyncWaiter({ pollIntervalMs: config.syncPollIntervalMs, clock, logger });
        const ingestor = new ExportIngestor({
          outputFolder: config.outputFolder,
          backupFolder: config.backupFolder,
          defaultTags: config.defaultTags,
          logger,
        });

        // Files handed to the ingestor this run; never attributed twice
        const claimed = new Set<string>();

        for (const book of books) {
          if (options.signal?.aborted) {
            outcomes.push({ status: 'skipped', book, reason: 'run aborted' });
            continue;
          }
          logger.info(`Processing book ${book.ordinal + 1}/${books.length}`, { title: book.title });
          outcomes.push(await processBook(book));
        }

        async function processBook(book: Book): Promise<BookOutcome> {
          const since = clock.now();

          try {
            const exported = await controller.exportNotes(book);
            if (exported.status === 'declined') {
              return { status: 'skipped', book, reason: exported.reason };
            }
          } catch (err) {
            return failedOutcome(book, err, 'share', 'EXPORT_ACTION_FAILED', logger);
          }

          let artifact: ExportArtifact;
          try {
            artifact = await waiter.awaitArtifact(config.watchFolder, since, config.syncTimeoutMs, {
              exclude: claimed,
              book,
            });
            claimed.add(artifact.path);
          } catch (err) {
            return failedOutcome(book, err, 'sync', 'SYNC_TIMEOUT', logger);
          }

          let ingestResult: IngestResult;
          try {
            ingestResult = await ingestor.ingest(artifact);
          } catch (err) {
            return failedOutcome(book, err, 'convert', 'WRITE_FAILED', logger);
          }

          return {
            status: 'success',
            book,
            notePath: ingestResult.notePath,
            backupPath: ingestResult.backupPath,
            highlightCount: ingestResult.document.highlights.length,
          };
        }

      }
    );
  } catch (err) {
    if (err instanceof PipelineError && err.sessionFatal) {
      logger.error('Run aborted by session failure', { code: err.code, stage: err.stage, message: err.message });
      throw new SessionFatalError(err, outcomes);
    }
    throw err;
  }

  const result: RunResult = {
    collection: config.collectionName,
    startedAt,
    finishedAt: new Date(clock.now()).toISOString(),
    outcomes,
    counts: countOutcomes(outcomes),
  };

  logger.info('Export run finished', { ...result.counts, collection: result.collection });
  return result;
}

/**
 * Human-readable run report. Failures name the stage they happened at so
 * the failed subset can be re-run.
 */
export function formatRunSummary(result: RunResult): string {
  const { success, skipped, failed } = result.counts;
  const lines = [
    `Collection '${result.collection}': ${success} exported, ${skipped} skipped, ${failed} failed`,
  ];

  for (const outcome of result.outcomes) {
    switch (outcome.status) {
      case 'success':
        lines.push(`  [ok]      ${outcome.book.title} (${outcome.highlightCount} highlights) -> ${outcome.notePath}`);
        break;
      case 'skipped':
        lines.push(`  [skipped] ${outcome.book.title}: ${outcome.reason}`);
        break;
      case 'failed':
        lines.push(`  [failed]  ${outcome.book.title} at ${outcome.stage} (${outcome.code}): ${outcome.message}`);
        break;
    }
  }

  return lines.join('\n');
}
