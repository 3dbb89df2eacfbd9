/**
 * Book Export Controller Tests
 *
 * Each test first navigates the fake app into the collection, then
 * exports one book from there.
 */

import { describe, it, expect } from 'vitest';
import { BookExportController } from '../book-export-controller';
import { CollectionNavigator } from '../collection-navigator';
import { PipelineError } from '../errors';
import { KINDLE_APP, makeContext } from './harness/automation';
import { FakeKindleDriver } from './harness/fake-kindle-driver';
import type { FakeBook } from './harness/fake-kindle-driver';
import { ManualClock } from './harness/manual-clock';

const COLLECTION = 'To Export';
const EXPORT_DELAY_MS = 3000;

async function openWith(book: FakeBook, extra: { disconnectOnTap?: string } = {}) {
  const clock = new ManualClock();
  const driver = new FakeKindleDriver({ clock, collectionName: COLLECTION, books: [book], ...extra });
  const ctx = makeContext(driver, clock);

  await new CollectionNavigator(ctx, { appPackage: KINDLE_APP, minTitleLength: 6, launchWaitMs: 0 }).open(COLLECTION);
  driver.taps.length = 0;

  const controller = new BookExportController(ctx, { collectionName: COLLECTION, exportDelayMs: EXPORT_DELAY_MS });
  return { clock, driver, controller };
}

describe('BookExportController', () => {
  const book = { title: 'Alpha Book', ordinal: 0 };

  it('should share the notebook to the cloud target', async () => {
    const { clock, driver, controller } = await openWith({ title: 'Alpha Book' });

    const result = await controller.exportNotes(book);

    expect(result).toEqual({ status: 'accepted', book });
    expect(driver.taps).toEqual(['Alpha Book', 'Notebook', 'Export notebook', 'OneDrive']);
    expect(driver.exported).toEqual(['Alpha Book']);
    expect(driver.currentScreen).toBe('collection');
    expect(driver.backPresses).toBe(2);
    expect(clock.sleeps[clock.sleeps.length - 1]).toBe(EXPORT_DELAY_MS);
  });

  it('should decline a book whose notebook is empty', async () => {
    const { driver, controller } = await openWith({ title: 'Alpha Book', notebook: 'empty' });

    const result = await controller.exportNotes(book);

    expect(result).toEqual({ status: 'declined', book, reason: 'notebook is empty' });
    expect(driver.exported).toEqual([]);
    expect(driver.currentScreen).toBe('collection');
  });

  it('should fail with UI_ELEMENT_NOT_FOUND when the notebook button is missing', async () => {
    const { clock, driver, controller } = await openWith({ title: 'Alpha Book', notebook: 'missing' });

    await expect(controller.exportNotes(book)).rejects.toMatchObject({
      code: 'UI_ELEMENT_NOT_FOUND',
      stage: 'open-notes',
      bookTitle: 'Alpha Book',
    });
    expect(driver.longPresses).toEqual(['Alpha Book']);
    expect(driver.currentScreen).toBe('collection');
    expect(clock.sleeps[clock.sleeps.length - 1]).toBe(EXPORT_DELAY_MS);
  });

  it('should reach the notebook through the long-press menu when the book screen lacks it', async () => {
    const { driver, controller } = await openWith({ title: 'Alpha Book', notebook: 'menu-only' });

    const result = await controller.exportNotes(book);

    expect(result).toEqual({ status: 'accepted', book });
    expect(driver.longPresses).toEqual(['Alpha Book']);
    expect(driver.taps).toEqual(['Alpha Book', 'Notebook', 'Export notebook', 'OneDrive']);
    expect(driver.exported).toEqual(['Alpha Book']);
    expect(driver.currentScreen).toBe('collection');
  });

  it('should keep watching every label for the whole UI timeout', async () => {
    const { clock, driver, controller } = await openWith({ title: 'Alpha Book' });
    driver.renderDelayMs = 3000;
    const before = clock.sleeps.length;

    const result = await controller.exportNotes(book);

    expect(result).toEqual({ status: 'accepted', book });
    expect(driver.taps).toEqual(['Alpha Book', 'Notebook', 'Export notebook', 'OneDrive']);
    // book screen: 3 s to draw; notebook: 2 s optional empty check, then 1 s more
    expect(clock.sleeps.slice(before, before + 3)).toEqual([3000, 2000, 1000]);
  });

  it('should fail at open-book when the title is not in the collection', async () => {
    const { controller } = await openWith({ title: 'Alpha Book' });

    await expect(controller.exportNotes({ title: 'Vanished Book', ordinal: 1 })).rejects.toMatchObject({
      code: 'UI_ELEMENT_NOT_FOUND',
      stage: 'open-book',
    });
  });

  it('should fail with EXPORT_ACTION_FAILED when sharing is unavailable', async () => {
    const { driver, controller } = await openWith({ title: 'Alpha Book', share: 'missing' });

    await expect(controller.exportNotes(book)).rejects.toMatchObject({
      code: 'EXPORT_ACTION_FAILED',
      stage: 'share',
    });
    expect(driver.exported).toEqual([]);
  });

  it('should turn a dropped device into a session-fatal DEVICE_LOST', async () => {
    const { controller } = await openWith({ title: 'Alpha Book' }, { disconnectOnTap: 'Export notebook' });

    const err = await controller.exportNotes(book).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    expect(err).toMatchObject({ code: 'DEVICE_LOST' });
    expect(err instanceof PipelineError && err.sessionFatal).toBe(true);
  });
});
