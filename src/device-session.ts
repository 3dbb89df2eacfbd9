/**
 * Device Session
 *
 * Picks exactly one automation-capable device and hands out a handle that
 * every later stage receives explicitly. The handle is released (reading
 * app stopped) when the scoped run ends, whatever the outcome.
 */

import { AdbCommandError, PipelineError } from './errors';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import type { DeviceInfo, UiDriver } from './ui-driver';

export interface DeviceHandle {
  readonly serial: string;
  readonly driver: UiDriver;
}

export interface ConnectOptions {
  deviceSerial?: string;
  logger?: Logger;
}

export interface SessionOptions extends ConnectOptions {
  appPackage: string;
}

const NO_DEVICE_GUIDANCE = `No Android device detected. Please:
1. Enable USB debugging (Settings > About phone > tap Build number 7 times,
   then Settings > System > Developer options > USB debugging)
2. Connect the device via USB and unlock it
3. Accept the USB debugging prompt on the device`;

async function listDevicesOrFail(driver: UiDriver): Promise<DeviceInfo[]> {
  try {
    return await driver.listDevices();
  } catch (err) {
    if (err instanceof AdbCommandError) {
      throw new PipelineError(
        'ADB_UNAVAILABLE',
        'session',
        `adb is not available: ${err.message}. Install Android Platform Tools and add them to PATH.`
      );
    }
    throw err;
  }
}

/**
 * Resolve the single device to automate. Only devices in the `device`
 * state count; offline and unauthorized entries are ignored.
 */
export async function connect(driver: UiDriver, options: ConnectOptions = {}): Promise<DeviceHandle> {
  const logger = options.logger ?? silentLogger;
  const all = await listDevicesOrFail(driver);
  const ready = all.filter(device => device.state === 'device');

  for (const device of all) {
    if (device.state !== 'device') {
      logger.warn('Ignoring device that is not ready', device);
    }
  }

  if (ready.length === 0) {
    throw new PipelineError('NO_DEVICE_FOUND', 'session', NO_DEVICE_GUIDANCE);
  }

  let serial: string;
  if (options.deviceSerial) {
    const match = ready.find(device => device.serial === options.deviceSerial);
    if (!match) {
      throw new PipelineError(
        'DEVICE_NOT_FOUND',
        'session',
        `Device ${options.deviceSerial} not found. Available devices: ${ready.map(d => d.serial).join(', ')}`
      );
    }
    serial = match.serial;
  } else if (ready.length > 1) {
    throw new PipelineError(
      'MULTIPLE_DEVICES_AMBIGUOUS',
      'session',
      `${ready.length} devices attached (${ready.map(d => d.serial).join(', ')}); choose one with --device`
    );
  } else {
    serial = ready[0].serial;
  }

  driver.selectDevice(serial);

  if (await driver.isScreenLocked()) {
    throw new PipelineError(
      'SCREEN_LOCKED',
      'session',
      'Device screen is locked. Unlock it and keep the screen on during the export.'
    );
  }

  logger.info('Connected to device', { serial });
  return { serial, driver };
}

/**
 * Scoped acquisition: connect, run, and always release.
 */
export async function withDeviceSession<T>(
  driver: UiDriver,
  options: SessionOptions,
  fn: (handle: DeviceHandle) => Promise<T>
): Promise<T> {
  const logger = options.logger ?? silentLogger;
  const handle = await connect(driver, options);

  try {
    return await fn(handle);
  } finally {
    await release(handle, options.appPackage, logger);
  }
}

async function release(handle: DeviceHandle, appPackage: string, logger: Logger): Promise<void> {
  try {
    if (await handle.driver.isConnected()) {
      await handle.driver.stopApp(appPackage);
    }
    logger.info('Device session released', { serial: handle.serial });
  } catch (err) {
    // Release must not mask the run's own result
    logger.warn('Failed to stop app during release', { serial: handle.serial, error: err });
  }
}

export interface DeviceCheckReport {
  adbVersion: string | null;
  devices: DeviceInfo[];
}

/**
 * Report adb availability and attached devices (the `devices` command)
 */
export async function checkDevices(
  driver: UiDriver & { version(): Promise<string | null> }
): Promise<DeviceCheckReport> {
  const adbVersion = await driver.version();
  if (adbVersion === null) {
    return { adbVersion, devices: [] };
  }
  return { adbVersion, devices: await driver.listDevices() };
}
