/**
 * Book Export Controller
 *
 * Per book: open it → open its notebook → share the notebook to the cloud
 * target. A failure at any step ends this book's export only. The
 * controller triggers the app's own share flow and never writes files.
 */

import type { AutomationContext } from './automation-context';
import { classifyDriverFailure, findAction, scrollToFind } from './automation-context';
import { PipelineError, errorMessage } from './errors';
import type { Book, PipelineStage } from './types';
import type { UiElement } from './ui-driver';

export type ExportResult =
  | { status: 'accepted'; book: Book }
  | { status: 'declined'; book: Book; reason: string };

export interface ControllerOptions {
  collectionName: string;
  exportDelayMs: number;
  /** Short wait for screens that may or may not show up */
  optionalStepTimeoutMs?: number;
  maxBackPresses?: number;
}

export class BookExportController {
  constructor(
    private readonly ctx: AutomationContext,
    private readonly options: ControllerOptions
  ) {}

  /**
   * Export one book's notes. Resolves `accepted` once the share action went
   * through, `declined` when the book has nothing to export. Throws a
   * PipelineError for per-book failures (and for DEVICE_LOST).
   * The inter-book delay runs after every attempt.
   */
  async exportNotes(book: Book): Promise<ExportResult> {
    const { logger } = this.ctx;
    logger.info('Exporting notes', { title: book.title, ordinal: book.ordinal });

    let stage: PipelineStage = 'open-book';
    try {
      await this.openBook(book);

      stage = 'open-notes';
      const hasNotes = await this.openNotebook(book);
      if (!hasNotes) {
        logger.info('No notes to export', { title: book.title });
        return { status: 'declined', book, reason: 'notebook is empty' };
      }

      stage = 'share';
      await this.shareToCloud(book);

      logger.info('Export accepted', { title: book.title });
      return { status: 'accepted', book };
    } catch (err) {
      const code = stage === 'share' ? 'EXPORT_ACTION_FAILED' : 'UI_ELEMENT_NOT_FOUND';
      throw await classifyDriverFailure(
        this.ctx,
        err,
        new PipelineError(code, stage, `${stage} failed: ${errorMessage(err)}`, book.title)
      );
    } finally {
      await this.returnToCollection(book);
      await this.ctx.clock.sleep(this.options.exportDelayMs);
    }
  }

  private async openBook(book: Book): Promise<void> {
    const { driver } = this.ctx.handle;

    const tile = await scrollToFind(this.ctx, book.title);
    if (!tile) {
      throw new PipelineError('UI_ELEMENT_NOT_FOUND', 'open-book', `Book '${book.title}' not visible in collection`, book.title);
    }
    await driver.tap(tile);
  }

  /**
   * Returns false when the notebook reports no notes
   */
  private async openNotebook(book: Book): Promise<boolean> {
    const { driver } = this.ctx.handle;

    let notebook = await findAction(this.ctx, 'notebook');
    if (!notebook) {
      this.ctx.logger.info('Notebook button not shown, trying the book menu', { title: book.title });
      notebook = await this.notebookFromMenu(book);
    }
    if (!notebook) {
      throw new PipelineError('UI_ELEMENT_NOT_FOUND', 'open-notes', `Notebook button not found for '${book.title}'`, book.title);
    }
    await driver.tap(notebook);

    const empty = await findAction(this.ctx, 'emptyNotebook', this.optionalTimeout());
    return empty === null;
  }

  /**
   * Some app versions only offer the notebook from the long-press menu of
   * the book tile in the collection.
   */
  private async notebookFromMenu(book: Book): Promise<UiElement | null> {
    const { driver } = this.ctx.handle;

    await driver.pressBack();
    const tile = await scrollToFind(this.ctx, book.title);
    if (!tile) return null;
    await driver.longPress(tile);
    return findAction(this.ctx, 'notebook');
  }

  private async shareToCloud(book: Book): Promise<void> {
    const { driver } = this.ctx.handle;

    const share = await findAction(this.ctx, 'share');
    if (!share) {
      throw new PipelineError('EXPORT_ACTION_FAILED', 'share', `Share action not found for '${book.title}'`, book.title);
    }
    await driver.tap(share);

    // Citation-style dialog on newer app versions
    const confirm = await findAction(this.ctx, 'exportConfirm', this.optionalTimeout());
    if (confirm) {
      await driver.tap(confirm);
    }

    const target = await findAction(this.ctx, 'cloudTarget');
    if (!target) {
      throw new PipelineError('EXPORT_ACTION_FAILED', 'share', `Cloud target not offered for '${book.title}'`, book.title);
    }
    await driver.tap(target);

    const upload = await findAction(this.ctx, 'uploadConfirm', this.optionalTimeout());
    if (upload) {
      await driver.tap(upload);
    }
  }

  /**
   * Press back until the collection is on screen again (bounded). Not
   * reaching it is logged; the next book's lookup will report the failure.
   */
  private async returnToCollection(book: Book): Promise<void> {
    const { driver } = this.ctx.handle;
    const maxPresses = this.options.maxBackPresses ?? 4;

    try {
      for (let i = 0; i < maxPresses; i++) {
        if (await driver.findByText(this.options.collectionName, 0)) {
          return;
        }
        await driver.pressBack();
      }
      if (!(await driver.findByText(this.options.collectionName, this.optionalTimeout()))) {
        this.ctx.logger.warn('Could not return to collection', { after: book.title });
      }
    } catch (err) {
      this.ctx.logger.warn('Failed to navigate back to collection', { after: book.title, error: err });
    }
  }

  private optionalTimeout(): number {
    return this.options.optionalStepTimeoutMs ?? Math.min(this.ctx.uiTimeoutMs, 2000);
  }
}
