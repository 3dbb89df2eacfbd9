/**
 * Device Session Tests
 */

import { describe, it, expect } from 'vitest';
import { checkDevices, connect, withDeviceSession } from '../device-session';
import { PipelineError } from '../errors';
import { FAKE_SERIAL, FakeKindleDriver } from './harness/fake-kindle-driver';
import type { FakeKindleOptions } from './harness/fake-kindle-driver';
import { ManualClock } from './harness/manual-clock';

const APP = 'com.amazon.kindle';

function makeDriver(options: Partial<FakeKindleOptions> = {}): FakeKindleDriver {
  return new FakeKindleDriver({ clock: new ManualClock(), collectionName: 'To Export', books: [], ...options });
}

describe('connect', () => {
  it('should pick the only ready device', async () => {
    const driver = makeDriver({
      devices: [
        { serial: FAKE_SERIAL, state: 'device' },
        { serial: 'R58M123', state: 'unauthorized' },
      ],
    });

    const handle = await connect(driver);

    expect(handle.serial).toBe(FAKE_SERIAL);
    expect(driver.selectedSerial).toBe(FAKE_SERIAL);
  });

  it('should fail with NO_DEVICE_FOUND when nothing is ready', async () => {
    const driver = makeDriver({ devices: [{ serial: 'R58M123', state: 'offline' }] });

    await expect(connect(driver)).rejects.toMatchObject({ code: 'NO_DEVICE_FOUND', stage: 'session' });
  });

  it('should refuse to guess between several devices', async () => {
    const driver = makeDriver({
      devices: [
        { serial: 'device-a', state: 'device' },
        { serial: 'device-b', state: 'device' },
      ],
    });

    await expect(connect(driver)).rejects.toMatchObject({ code: 'MULTIPLE_DEVICES_AMBIGUOUS' });
  });

  it('should honour an explicit serial', async () => {
    const driver = makeDriver({
      devices: [
        { serial: 'device-a', state: 'device' },
        { serial: 'device-b', state: 'device' },
      ],
    });

    const handle = await connect(driver, { deviceSerial: 'device-b' });

    expect(handle.serial).toBe('device-b');
    await expect(connect(driver, { deviceSerial: 'device-c' })).rejects.toMatchObject({ code: 'DEVICE_NOT_FOUND' });
  });

  it('should fail with SCREEN_LOCKED on a locked device', async () => {
    await expect(connect(makeDriver({ locked: true }))).rejects.toMatchObject({ code: 'SCREEN_LOCKED' });
  });

  it('should report a missing adb as ADB_UNAVAILABLE', async () => {
    const err = await connect(makeDriver({ adbMissing: true })).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    expect(err).toMatchObject({ code: 'ADB_UNAVAILABLE', stage: 'session' });
    expect(err instanceof PipelineError && err.sessionFatal).toBe(true);
  });
});

describe('withDeviceSession', () => {
  it('should stop the app after the run', async () => {
    const driver = makeDriver();

    const result = await withDeviceSession(driver, { appPackage: APP }, async handle => handle.serial);

    expect(result).toBe(FAKE_SERIAL);
    expect(driver.stopped).toEqual([APP]);
  });

  it('should release the device when the run throws', async () => {
    const driver = makeDriver();

    await expect(withDeviceSession(driver, { appPackage: APP }, async () => {
      throw new Error('stage failed');
    })).rejects.toThrow('stage failed');
    expect(driver.stopped).toEqual([APP]);
  });

  it('should skip stopping the app on a disconnected device', async () => {
    const driver = makeDriver();

    await withDeviceSession(driver, { appPackage: APP }, async () => {
      driver.connected = false;
    });

    expect(driver.stopped).toEqual([]);
  });
});

describe('checkDevices', () => {
  it('should list devices when adb runs', async () => {
    const driver = Object.assign(makeDriver(), { version: async () => 'Android Debug Bridge version 1.0.41' });

    expect(await checkDevices(driver)).toEqual({
      adbVersion: 'Android Debug Bridge version 1.0.41',
      devices: [{ serial: FAKE_SERIAL, state: 'device' }],
    });
  });

  it('should report no version when adb is missing', async () => {
    const driver = Object.assign(makeDriver(), { version: async () => null });

    expect(await checkDevices(driver)).toEqual({ adbVersion: null, devices: [] });
  });
});
