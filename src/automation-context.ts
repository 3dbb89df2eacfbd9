/**
 * Explicit run context handed to every automation stage: the device handle,
 * the label table, the retry policy and the clock. Nothing is ambient, so a
 * fake driver and a manual clock are enough to test a stage.
 */

import type { Clock } from './clock';
import type { DeviceHandle } from './device-session';
import { AdbCommandError, PipelineError } from './errors';
import type { RetryPolicy } from './retry-policy';
import type { Logger } from './rolling-logger';
import type { UiElement } from './ui-driver';
import type { UiAction, UiLabelTable } from './ui-labels';

export interface AutomationContext {
  handle: DeviceHandle;
  labels: UiLabelTable;
  retry: RetryPolicy;
  clock: Clock;
  logger: Logger;
  uiTimeoutMs: number;
  maxScrolls: number;
}

/**
 * Wait for any label of a logical action
 */
export function findAction(
  ctx: AutomationContext,
  action: UiAction,
  timeoutMs: number = ctx.uiTimeoutMs
): Promise<UiElement | null> {
  return ctx.handle.driver.findAnyText(ctx.labels[action], timeoutMs);
}

/**
 * Look for an exact label, scrolling down a page at a time (bounded by
 * maxScrolls). Scrolls back to the top when the label is not found so a
 * retry starts from the same place.
 */
export async function scrollToFind(ctx: AutomationContext, label: string): Promise<UiElement | null> {
  const driver = ctx.handle.driver;

  const first = await driver.findByText(label, ctx.uiTimeoutMs);
  if (first) return first;

  let scrolls = 0;
  while (scrolls < ctx.maxScrolls) {
    await driver.swipeUp();
    scrolls++;
    const element = await driver.findByText(label, 0);
    if (element) {
      ctx.logger.debug('Found label after scrolling', { label, scrolls });
      return element;
    }
  }

  for (let i = 0; i < scrolls; i++) {
    await driver.swipeDown();
  }
  return null;
}

/**
 * Turn a driver command failure into a typed pipeline error. A device that
 * dropped off the bus is session-fatal; anything else belongs to the stage.
 */
export async function classifyDriverFailure(
  ctx: AutomationContext,
  err: unknown,
  fallback: PipelineError
): Promise<PipelineError> {
  if (err instanceof PipelineError) return err;
  if (err instanceof AdbCommandError && !(await ctx.handle.driver.isConnected())) {
    return new PipelineError('DEVICE_LOST', 'session', `Device ${ctx.handle.serial} disconnected: ${err.message}`);
  }
  ctx.logger.warn('UI command failed', { stage: fallback.stage, error: err });
  return fallback;
}
