/**
 * UI driver capability
 *
 * The automation stages depend only on this surface. AdbUiDriver in
 * adb-bridge.ts implements it for a real device; tests use a fake.
 */

export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface UiElement {
  text: string;
  contentDesc: string;
  resourceId: string;
  className: string;
  bounds: Bounds;
  clickable: boolean;
}

export interface DeviceInfo {
  serial: string;
  state: string;   // 'device', 'offline', 'unauthorized', ...
}

export interface UiDriver {
  /** Devices attached to the host, in any state */
  listDevices(): Promise<DeviceInfo[]>;

  /** Bind later commands to one device */
  selectDevice(serial: string): void;

  isConnected(): Promise<boolean>;
  isScreenLocked(): Promise<boolean>;

  /**
   * Wait up to `timeoutMs` for an element whose text or content description
   * equals `label`. Resolves null when nothing matched in time.
   */
  findByText(label: string, timeoutMs: number): Promise<UiElement | null>;

  /**
   * Wait up to `timeoutMs` for any of `labels`. Every poll checks all of
   * them against one screen read; when several are on screen the earliest
   * in the list wins.
   */
  findAnyText(labels: readonly string[], timeoutMs: number): Promise<UiElement | null>;

  /** Current screen hierarchy, in document order */
  dumpElements(): Promise<UiElement[]>;

  tap(element: UiElement): Promise<void>;
  longPress(element: UiElement, durationMs?: number): Promise<void>;
  pressBack(): Promise<void>;
  swipeUp(): Promise<void>;
  swipeDown(): Promise<void>;

  launchApp(packageName: string): Promise<void>;
  stopApp(packageName: string): Promise<void>;
}

export function centerOf(bounds: Bounds): { x: number; y: number } {
  return {
    x: Math.round((bounds.left + bounds.right) / 2),
    y: Math.round((bounds.top + bounds.bottom) / 2),
  };
}

/**
 * Exact label match on text or content description. Matching is
 * case-sensitive; collection names must match exactly.
 */
export function matchesLabel(element: UiElement, label: string): boolean {
  return element.text === label || element.contentDesc === label;
}

/**
 * First element matching a label, trying labels in order
 */
export function firstMatch(elements: readonly UiElement[], labels: readonly string[]): UiElement | null {
  for (const label of labels) {
    const hit = elements.find(el => matchesLabel(el, label));
    if (hit) return hit;
  }
  return null;
}
