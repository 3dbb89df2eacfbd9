/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE, getAdbPath, labelTableFor, loadConfig, parseConfigObject } from '../config';
import { RecordingLogger } from './harness/recording-logger';
import { createTempFolders } from './harness/temp-folders';
import type { TempFolders } from './harness/temp-folders';

describe('loadConfig', () => {
  let folders: TempFolders;

  beforeEach(async () => {
    folders = await createTempFolders();
  });

  afterEach(async () => {
    await folders.cleanup();
  });

  async function writeConfig(content: unknown, fileName = DEFAULT_CONFIG_FILE): Promise<void> {
    await fs.writeFile(path.join(folders.root, fileName), JSON.stringify(content), 'utf-8');
  }

  it('should use the defaults when nothing is configured', () => {
    expect(loadConfig({ cwd: folders.root, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should read the config file from the working directory', async () => {
    await writeConfig({
      collectionName: 'Reading 2024',
      exportDelayMs: 500,
      defaultTags: ['Kindle'],
      labels: { cloudTarget: ['Google Drive'] },
    });

    const config = loadConfig({ cwd: folders.root, env: {} });

    expect(config.collectionName).toBe('Reading 2024');
    expect(config.exportDelayMs).toBe(500);
    expect(config.defaultTags).toEqual(['Kindle']);
    expect(labelTableFor(config).cloudTarget).toEqual(['Google Drive']);
    expect(labelTableFor(config).share).toEqual(labelTableFor(DEFAULT_CONFIG).share);
  });

  it('should let the environment beat the file and the command line beat both', async () => {
    await writeConfig({ deviceSerial: 'file-serial', collectionName: 'From File' });

    const fromEnv = loadConfig({ cwd: folders.root, env: { ANDROID_SERIAL: 'env-serial' } });
    const fromCli = loadConfig({
      cwd: folders.root,
      env: { ANDROID_SERIAL: 'env-serial' },
      overrides: { deviceSerial: 'cli-serial', collectionName: undefined },
    });

    expect(fromEnv.deviceSerial).toBe('env-serial');
    expect(fromCli.deviceSerial).toBe('cli-serial');
    expect(fromCli.collectionName).toBe('From File');
  });

  it('should read an explicitly named file', async () => {
    await writeConfig({ watchFolder: '/sync/Kindle' }, 'custom.json');

    const config = loadConfig({ cwd: folders.root, env: {}, configPath: 'custom.json' });

    expect(config.watchFolder).toBe('/sync/Kindle');
  });

  it('should fail when an explicitly named file is missing', () => {
    expect(() => loadConfig({ cwd: folders.root, env: {}, configPath: 'missing.json' })).toThrow();
  });

  it('should fall back to defaults on invalid JSON', async () => {
    await fs.writeFile(path.join(folders.root, DEFAULT_CONFIG_FILE), '{ not json', 'utf-8');
    const logger = new RecordingLogger();

    const config = loadConfig({ cwd: folders.root, env: {}, logger });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(logger.messages('WARN')).toEqual(['Invalid config file, using defaults']);
  });
});

describe('parseConfigObject', () => {
  it('should drop values of the wrong type and unknown label actions', () => {
    const logger = new RecordingLogger();

    const result = parseConfigObject({
      uiTimeoutMs: 'fast',
      maxScrolls: 8,
      outputFolder: '',
      labels: { bogus: ['x'], share: ['Teilen'] },
      somethingElse: true,
    }, logger);

    expect(result).toEqual({ maxScrolls: 8, labels: { share: ['Teilen'] } });
    expect(logger.messages('WARN')).toEqual([
      'Ignoring config value, expected a non-empty string',
      'Ignoring config value, expected a non-negative number',
      'Ignoring unknown UI action in labels',
    ]);
  });

  it('should keep defaults for counts and intervals that would stall a run', () => {
    const logger = new RecordingLogger();

    const result = parseConfigObject({
      exportDelayMs: 0,
      syncPollIntervalMs: 0,
      retryAttempts: 0,
      maxScrolls: 2.5,
      minTitleLength: 4,
    }, logger);

    expect(result).toEqual({ exportDelayMs: 0, minTitleLength: 4 });
    expect(logger.messages('WARN')).toEqual([
      'Ignoring config value, expected a positive number',
      'Ignoring config value, expected a positive integer',
      'Ignoring config value, expected a non-negative integer',
    ]);
  });

  it('should ignore a config that is not an object', () => {
    expect(parseConfigObject(['a'])).toEqual({});
  });
});

describe('getAdbPath', () => {
  let folders: TempFolders;

  beforeEach(async () => {
    folders = await createTempFolders();
  });

  afterEach(async () => {
    await folders.cleanup();
  });

  it('should prefer a configured adb that exists', async () => {
    const adb = path.join(folders.root, 'adb');
    await fs.writeFile(adb, '');

    expect(getAdbPath({ adbPath: adb }, {})).toBe(adb);
  });

  it('should look in the Android SDK when the configured path is missing', async () => {
    const sdkAdb = path.join(folders.root, 'sdk', 'platform-tools', process.platform === 'win32' ? 'adb.exe' : 'adb');
    await fs.mkdir(path.dirname(sdkAdb), { recursive: true });
    await fs.writeFile(sdkAdb, '');

    const resolved = getAdbPath({ adbPath: path.join(folders.root, 'nope') }, { ANDROID_HOME: path.join(folders.root, 'sdk') });

    expect(resolved).toBe(sdkAdb);
  });
});
