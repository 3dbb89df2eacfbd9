/**
 * Builds the run context the automation stages expect, around a fake
 * driver and a manual clock.
 */

import type { AutomationContext } from '../../automation-context';
import { RetryPolicy } from '../../retry-policy';
import { buildLabelTable } from '../../ui-labels';
import { FAKE_SERIAL } from './fake-kindle-driver';
import type { FakeKindleDriver } from './fake-kindle-driver';
import type { ManualClock } from './manual-clock';
import { RecordingLogger } from './recording-logger';

export const KINDLE_APP = 'com.amazon.kindle';

export function makeContext(
  driver: FakeKindleDriver,
  clock: ManualClock,
  overrides: Partial<AutomationContext> = {}
): AutomationContext {
  return {
    handle: { serial: FAKE_SERIAL, driver },
    labels: buildLabelTable(),
    retry: new RetryPolicy({ maxAttempts: 3, backoffMs: 1000 }, clock),
    clock,
    logger: new RecordingLogger(),
    uiTimeoutMs: 10000,
    maxScrolls: 5,
    ...overrides,
  };
}

/**
 * Markdown notebook export for a book, in the layout the app shares
 */
export function notebookExport(title: string): string {
  return [
    '#### Example Author',
    '',
    `Author, Example. ${title}. 2020.`,
    '',
    '#KindleExport',
    '',
    '- Created: 2024-01-15_09-30-00',
    '',
    '---',
    '',
    '### Chapter 1',
    '',
    `- A passage from ${title}.`,
    `- Another passage from ${title}.`,
    '',
  ].join('\n');
}
