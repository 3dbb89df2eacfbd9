/**
 * Collection Navigator
 *
 * Opens the Kindle library, switches to the Collections view and enters
 * the named collection, then reads the book titles it shows. Every label
 * lookup goes through the injected retry policy.
 */

import type { AutomationContext } from './automation-context';
import { classifyDriverFailure, findAction, scrollToFind } from './automation-context';
import { PipelineError, errorMessage } from './errors';
import { allLabels } from './ui-labels';
import type { UiElement } from './ui-driver';
import type { Book } from './types';

export interface NavigatorOptions {
  appPackage: string;
  minTitleLength: number;
  launchWaitMs?: number;
}

export class CollectionNavigator {
  constructor(
    private readonly ctx: AutomationContext,
    private readonly options: NavigatorOptions
  ) {}

  /**
   * Open `collectionName` and return its books in processing order.
   * The array is frozen; the order holds for the whole run.
   */
  async open(collectionName: string): Promise<readonly Book[]> {
    const { driver } = this.ctx.handle;
    const { logger, retry } = this.ctx;

    logger.info('Navigating to collection', { collectionName });

    try {
      await driver.launchApp(this.options.appPackage);
      await this.ctx.clock.sleep(this.options.launchWaitMs ?? 3000);

      const library = await retry.until(async ({ attempt }) => {
        const element = await findAction(this.ctx, 'library');
        if (!element) logger.warn('Library tab not found', { attempt });
        return element;
      });
      if (!library) {
        throw new PipelineError(
          'APP_NOT_RESPONDING',
          'navigate',
          `Library tab did not appear after ${retry.maxAttempts} attempts`
        );
      }
      await driver.tap(library);

      // Some app versions open the collection list directly
      const collections = await findAction(this.ctx, 'collections');
      if (collections) {
        await driver.tap(collections);
      } else {
        logger.debug('No Collections entry, looking for the collection directly');
      }

      const entry = await retry.until(async ({ attempt }) => {
        const element = await scrollToFind(this.ctx, collectionName);
        if (!element) logger.warn('Collection not visible', { collectionName, attempt });
        return element;
      });
      if (!entry) {
        throw new PipelineError(
          'COLLECTION_NOT_FOUND',
          'navigate',
          `Collection '${collectionName}' not found after ${retry.maxAttempts} attempts`
        );
      }
      await driver.tap(entry);

      const books = await this.discoverBooks(collectionName);
      logger.info('Found books in collection', { collectionName, count: books.length });
      return books;
    } catch (err) {
      throw await classifyDriverFailure(
        this.ctx,
        err,
        new PipelineError('APP_NOT_RESPONDING', 'navigate', `Navigation failed: ${errorMessage(err)}`)
      );
    }
  }

  /**
   * Read titles from the open collection, scrolling until a page adds
   * nothing new (bounded by maxScrolls), then scroll back to the top.
   */
  private async discoverBooks(collectionName: string): Promise<readonly Book[]> {
    const { driver } = this.ctx.handle;
    const chrome = allLabels(this.ctx.labels);
    chrome.add(collectionName);

    const titles: string[] = [];
    const seen = new Set<string>();

    const collect = (elements: UiElement[]): number => {
      let added = 0;
      for (const title of extractTitles(elements, chrome, this.options.minTitleLength)) {
        if (!seen.has(title)) {
          seen.add(title);
          titles.push(title);
          added++;
        }
      }
      return added;
    };

    collect(await driver.dumpElements());

    let scrolls = 0;
    while (scrolls < this.ctx.maxScrolls) {
      await driver.swipeUp();
      scrolls++;
      if (collect(await driver.dumpElements()) === 0) break;
    }
    for (let i = 0; i < scrolls; i++) {
      await driver.swipeDown();
    }

    return Object.freeze(titles.map((title, ordinal) => Object.freeze({ title, ordinal })));
  }
}

/**
 * Candidate book titles on one screen, top-to-bottom then left-to-right.
 * App chrome (any label in the table), system UI and short texts are dropped.
 */
export function extractTitles(
  elements: UiElement[],
  chrome: ReadonlySet<string>,
  minTitleLength: number
): string[] {
  return elements
    .filter(el => {
      const text = el.text.trim();
      return text.length >= minTitleLength &&
        !chrome.has(text) &&
        !el.resourceId.startsWith('com.android.systemui');
    })
    .sort((a, b) => a.bounds.top - b.bounds.top || a.bounds.left - b.bounds.left)
    .map(el => el.text.trim());
}
