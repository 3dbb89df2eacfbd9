/**
 * ADB Bridge - Android Debug Bridge integration
 *
 * Drives an Android device through the `adb` CLI: device listing, input
 * events (tap, long press, swipe, back), app start/stop, and screen reads
 * via `uiautomator dump`. The hierarchy XML is parsed with xmldom.
 */

import { spawn } from 'child_process';
import { DOMParser } from '@xmldom/xmldom';
import { AdbCommandError } from './errors';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import type { Bounds, DeviceInfo, UiDriver, UiElement } from './ui-driver';
import { centerOf, firstMatch } from './ui-driver';

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

export interface CommandResult {
  success: boolean;
  output: string;
  error: string;
  code: number | null;
}

export function runCommand(cmd: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(cmd, args, { windowsHide: true });
    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({
        success: code === 0,
        output: stdout,
        error: stderr,
        code
      });
    });

    proc.on('error', (err) => {
      resolve({
        success: false,
        output: '',
        error: err.message,
        code: null
      });
    });
  });
}

/**
 * Parse `adb devices` output into serial/state pairs
 */
export function parseDeviceList(output: string): DeviceInfo[] {
  const devices: DeviceInfo[] = [];
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('List of devices') || line.startsWith('*')) continue;
    const [serial, state] = line.split(/\s+/);
    if (serial && state) {
      devices.push({ serial, state });
    }
  }
  return devices;
}

/**
 * Parse uiautomator bounds "[l,t][r,b]"
 */
export function parseBounds(value: string): Bounds | null {
  const match = value.match(/^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/);
  if (!match) return null;
  return {
    left: Number(match[1]),
    top: Number(match[2]),
    right: Number(match[3]),
    bottom: Number(match[4]),
  };
}

/**
 * Parse a uiautomator hierarchy dump. Nodes without usable bounds are skipped.
 */
export function parseUiHierarchy(xml: string): UiElement[] {
  const start = xml.indexOf('<?xml') >= 0 ? xml.indexOf('<?xml') : xml.indexOf('<hierarchy');
  if (start < 0) return [];
  const end = xml.lastIndexOf('</hierarchy>');
  const body = end >= 0 ? xml.slice(start, end + '</hierarchy>'.length) : xml.slice(start);

  const doc = new DOMParser().parseFromString(body, 'text/xml');
  const nodes = doc.getElementsByTagName('node');
  const elements: UiElement[] = [];

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (!node) continue;
    const bounds = parseBounds(node.getAttribute('bounds') || '');
    if (!bounds) continue;

    elements.push({
      text: node.getAttribute('text') || '',
      contentDesc: node.getAttribute('content-desc') || '',
      resourceId: node.getAttribute('resource-id') || '',
      className: node.getAttribute('class') || '',
      bounds,
      clickable: node.getAttribute('clickable') === 'true',
    });
  }

  return elements;
}

const LOCK_PATTERNS = [
  /mDreamingLockscreen=true/,
  /mShowingLockscreen=true/,
  /isStatusBarKeyguard=true/,
  /mKeyguardShowing=true/,
];

// ─────────────────────────────────────────────────────────────────────────────
// Driver
// ─────────────────────────────────────────────────────────────────────────────

export interface AdbUiDriverOptions {
  adbPath: string;
  clock?: Clock;
  logger?: Logger;
  pollIntervalMs?: number;  // between hierarchy dumps while waiting for a label
  settleMs?: number;        // after every input event
  dumpPath?: string;        // on-device file for uiautomator output
}

export class AdbUiDriver implements UiDriver {
  private serial: string | null = null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly settleMs: number;
  private readonly dumpPath: string;

  constructor(private readonly options: AdbUiDriverOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.settleMs = options.settleMs ?? 500;
    this.dumpPath = options.dumpPath ?? '/sdcard/ui_dump.xml';
  }

  /**
   * Check adb is installed and runnable; returns its version line
   */
  async version(): Promise<string | null> {
    const result = await runCommand(this.options.adbPath, ['version']);
    if (!result.success) return null;
    return result.output.trim().split('\n')[0] || null;
  }

  selectDevice(serial: string): void {
    this.serial = serial;
  }

  private prefix(): string[] {
    return this.serial ? ['-s', this.serial] : [];
  }

  private async adb(args: string[]): Promise<string> {
    const fullArgs = [...this.prefix(), ...args];
    const result = await runCommand(this.options.adbPath, fullArgs);
    if (!result.success) {
      this.logger.error('ADB command failed', { args: fullArgs, stderr: result.error });
      throw new AdbCommandError([this.options.adbPath, ...fullArgs].join(' '), result.error, result.code);
    }
    return result.output.trim();
  }

  async listDevices(): Promise<DeviceInfo[]> {
    const result = await runCommand(this.options.adbPath, ['devices']);
    if (!result.success) {
      throw new AdbCommandError(`${this.options.adbPath} devices`, result.error, result.code);
    }
    return parseDeviceList(result.output);
  }

  async isConnected(): Promise<boolean> {
    const result = await runCommand(this.options.adbPath, [...this.prefix(), 'get-state']);
    return result.success && result.output.trim() === 'device';
  }

  async isScreenLocked(): Promise<boolean> {
    const power = await this.adb(['shell', 'dumpsys', 'power']);
    if (/mWakefulness=Asleep/.test(power) || /Display Power: state=OFF/.test(power)) {
      return true;
    }
    const windows = await this.adb(['shell', 'dumpsys', 'window']);
    return LOCK_PATTERNS.some(pattern => pattern.test(windows));
  }

  async dumpElements(): Promise<UiElement[]> {
    await this.adb(['shell', 'uiautomator', 'dump', this.dumpPath]);
    const xml = await this.adb(['shell', 'cat', this.dumpPath]);
    return parseUiHierarchy(xml);
  }

  findByText(label: string, timeoutMs: number): Promise<UiElement | null> {
    return this.findAnyText([label], timeoutMs);
  }

  async findAnyText(labels: readonly string[], timeoutMs: number): Promise<UiElement | null> {
    const deadline = this.clock.now() + timeoutMs;
    for (;;) {
      const hit = firstMatch(await this.dumpElements(), labels);
      if (hit) return hit;

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) return null;
      await this.clock.sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  async tap(element: UiElement): Promise<void> {
    const { x, y } = centerOf(element.bounds);
    await this.adb(['shell', 'input', 'tap', String(x), String(y)]);
    this.logger.debug('Tapped', { x, y, text: element.text || element.contentDesc });
    await this.clock.sleep(this.settleMs);
  }

  async longPress(element: UiElement, durationMs: number = 1000): Promise<void> {
    const { x, y } = centerOf(element.bounds);
    await this.adb(['shell', 'input', 'swipe', String(x), String(y), String(x), String(y), String(durationMs)]);
    await this.clock.sleep(this.settleMs);
  }

  async pressBack(): Promise<void> {
    await this.adb(['shell', 'input', 'keyevent', 'KEYCODE_BACK']);
    await this.clock.sleep(this.settleMs);
  }

  private async screenSize(): Promise<{ width: number; height: number }> {
    const output = await this.adb(['shell', 'wm', 'size']);
    const match = output.match(/(\d+)x(\d+)\s*$/m);
    if (!match) return { width: 1080, height: 1920 };
    return { width: Number(match[1]), height: Number(match[2]) };
  }

  private async verticalSwipe(fromRatio: number, toRatio: number): Promise<void> {
    const { width, height } = await this.screenSize();
    const x = Math.round(width / 2);
    await this.adb([
      'shell', 'input', 'swipe',
      String(x), String(Math.round(height * fromRatio)),
      String(x), String(Math.round(height * toRatio)),
      '300',
    ]);
    await this.clock.sleep(this.settleMs * 2);
  }

  /** Scroll content down (finger moves up) */
  async swipeUp(): Promise<void> {
    await this.verticalSwipe(0.8, 0.2);
  }

  async swipeDown(): Promise<void> {
    await this.verticalSwipe(0.2, 0.8);
  }

  async launchApp(packageName: string): Promise<void> {
    await this.adb(['shell', 'monkey', '-p', packageName, '-c', 'android.intent.category.LAUNCHER', '1']);
    this.logger.info('Launched app', { packageName });
  }

  async stopApp(packageName: string): Promise<void> {
    await this.adb(['shell', 'am', 'force-stop', packageName]);
    this.logger.info('Stopped app', { packageName });
  }
}
