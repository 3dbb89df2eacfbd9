/**
 * Configuration
 *
 * Run settings and external tool paths.
 *
 * Priority order (later wins):
 * 1. Built-in defaults
 * 2. JSON config file (--config, KINDLE_NOTES_CONFIG, or ./kindle-notes.config.json)
 * 3. Environment variables
 * 4. Command-line overrides
 */

import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import type { UiAction, UiLabelTable } from './ui-labels';
import { buildLabelTable, isUiAction } from './ui-labels';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ExportConfig {
  // Folders
  watchFolder: string;     // where the cloud-sync client drops exports
  outputFolder: string;    // markdown notes
  backupFolder: string;    // originals after conversion

  // Device
  collectionName: string;
  deviceSerial?: string;
  adbPath?: string;
  kindlePackage: string;

  // Timing (ms)
  exportDelayMs: number;       // pause after every book
  uiTimeoutMs: number;         // bounded wait for one UI element
  syncTimeoutMs: number;       // bounded wait for an export to arrive
  syncPollIntervalMs: number;
  retryAttempts: number;
  retryBackoffMs: number;

  // Discovery
  maxScrolls: number;
  minTitleLength: number;

  // Notes
  defaultTags: string[];
  labels: Partial<Record<UiAction, string[]>>;

  logDir?: string;
}

export type ConfigOverrides = Partial<ExportConfig>;

export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

export const DEFAULT_CONFIG_FILE = 'kindle-notes.config.json';

export const DEFAULT_CONFIG: ExportConfig = {
  watchFolder: path.join(os.homedir(), 'OneDrive', 'Kindle'),
  outputFolder: path.join('.', 'export'),
  backupFolder: path.join('.', 'backup'),
  collectionName: 'To Export',
  kindlePackage: 'com.amazon.kindle',
  exportDelayMs: 3000,
  uiTimeoutMs: 10000,
  syncTimeoutMs: 120000,
  syncPollIntervalMs: 2000,
  retryAttempts: 3,
  retryBackoffMs: 1000,
  maxScrolls: 5,
  minTitleLength: 6,
  defaultTags: ['KindleExport'],
  labels: {},
};

// ─────────────────────────────────────────────────────────────────────────────
// Config File Parsing
// ─────────────────────────────────────────────────────────────────────────────

const STRING_KEYS = [
  'watchFolder', 'outputFolder', 'backupFolder', 'collectionName',
  'deviceSerial', 'adbPath', 'kindlePackage', 'logDir',
] as const;

const NUMBER_KEYS = [
  'exportDelayMs', 'uiTimeoutMs', 'syncTimeoutMs', 'syncPollIntervalMs',
  'retryAttempts', 'retryBackoffMs', 'maxScrolls', 'minTitleLength',
] as const;

type NumberKey = typeof NUMBER_KEYS[number];

// Whole-number settings, and settings where zero would stall the run
const INTEGER_KEYS: ReadonlySet<NumberKey> = new Set<NumberKey>(['retryAttempts', 'maxScrolls', 'minTitleLength']);
const POSITIVE_KEYS: ReadonlySet<NumberKey> = new Set<NumberKey>(['retryAttempts', 'syncPollIntervalMs']);

function numberRule(key: NumberKey): string {
  const sign = POSITIVE_KEYS.has(key) ? 'positive' : 'non-negative';
  return `${sign} ${INTEGER_KEYS.has(key) ? 'integer' : 'number'}`;
}

function isValidNumber(key: NumberKey, value: unknown): value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return false;
  if (INTEGER_KEYS.has(key) && !Number.isInteger(value)) return false;
  return POSITIVE_KEYS.has(key) ? value > 0 : value >= 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Pick the recognised keys out of parsed JSON. Unknown keys are ignored;
 * keys with the wrong type are reported and dropped.
 */
export function parseConfigObject(raw: unknown, logger: Logger = silentLogger): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (!isRecord(raw)) {
    logger.warn('Config file is not a JSON object, ignoring it');
    return result;
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'string' && value !== '') {
      result[key] = value;
    } else {
      logger.warn('Ignoring config value, expected a non-empty string', { key });
    }
  }

  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isValidNumber(key, value)) {
      result[key] = value;
    } else {
      logger.warn(`Ignoring config value, expected a ${numberRule(key)}`, { key });
    }
  }

  if (raw.defaultTags !== undefined) {
    if (isStringArray(raw.defaultTags)) {
      result.defaultTags = raw.defaultTags;
    } else {
      logger.warn('Ignoring config value, expected a list of strings', { key: 'defaultTags' });
    }
  }

  if (raw.labels !== undefined) {
    if (isRecord(raw.labels)) {
      const labels: Partial<Record<UiAction, string[]>> = {};
      for (const [action, value] of Object.entries(raw.labels)) {
        if (!isUiAction(action)) {
          logger.warn('Ignoring unknown UI action in labels', { action });
        } else if (isStringArray(value)) {
          labels[action] = value;
        } else {
          logger.warn('Ignoring labels entry, expected a list of strings', { action });
        }
      }
      result.labels = labels;
    } else {
      logger.warn('Ignoring config value, expected an object', { key: 'labels' });
    }
  }

  return result;
}

function readConfigFile(configPath: string, logger: Logger): ConfigOverrides {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(content);
    logger.info('Loaded config', { configPath });
    return parseConfigObject(parsed, logger);
  } catch (err) {
    logger.warn('Invalid config file, using defaults', { configPath, error: err });
    return {};
  }
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (env.ANDROID_SERIAL) result.deviceSerial = env.ANDROID_SERIAL;
  if (env.ADB_PATH) result.adbPath = env.ADB_PATH;
  if (env.KINDLE_NOTES_LOG_DIR) result.logDir = env.KINDLE_NOTES_LOG_DIR;
  return result;
}

function withoutUndefined(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Resolve the effective configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): ExportConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? silentLogger;

  let fileOverrides: ConfigOverrides = {};
  const explicitPath = options.configPath || env.KINDLE_NOTES_CONFIG;
  if (explicitPath) {
    // An explicitly named file must exist
    fileOverrides = readConfigFile(path.resolve(cwd, explicitPath), logger);
  } else {
    const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(candidate)) {
      fileOverrides = readConfigFile(candidate, logger);
    }
  }

  const cliOverrides = withoutUndefined(options.overrides ?? {});

  return {
    ...DEFAULT_CONFIG,
    ...fileOverrides,
    ...envOverrides(env),
    ...cliOverrides,
    labels: {
      ...DEFAULT_CONFIG.labels,
      ...fileOverrides.labels,
      ...cliOverrides.labels,
    },
  };
}

export function labelTableFor(config: ExportConfig): UiLabelTable {
  return buildLabelTable(config.labels);
}

// ─────────────────────────────────────────────────────────────────────────────
// ADB Path Detection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Find first existing path from a list of candidates
 */
function findExistingPath(candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Get common platform-tools locations for current platform
 */
function getAdbCandidates(env: NodeJS.ProcessEnv): string[] {
  const platform = os.platform();
  const homeDir = os.homedir();
  const exe = platform === 'win32' ? 'adb.exe' : 'adb';
  const candidates: string[] = [];

  for (const sdkRoot of [env.ANDROID_HOME, env.ANDROID_SDK_ROOT]) {
    if (sdkRoot) {
      candidates.push(path.join(sdkRoot, 'platform-tools', exe));
    }
  }

  if (platform === 'win32') {
    const localAppData = env.LOCALAPPDATA || path.join(homeDir, 'AppData', 'Local');
    candidates.push(
      path.join(localAppData, 'Android', 'Sdk', 'platform-tools', exe),
      'C:\\platform-tools\\adb.exe',
    );
  } else if (platform === 'darwin') {
    candidates.push(
      '/opt/homebrew/bin/adb',
      '/usr/local/bin/adb',
      path.join(homeDir, 'Library', 'Android', 'sdk', 'platform-tools', exe),
    );
  } else {
    candidates.push(
      '/usr/bin/adb',
      '/usr/local/bin/adb',
      path.join(homeDir, 'Android', 'Sdk', 'platform-tools', exe),
    );
  }

  return candidates;
}

/**
 * Get adb executable path
 * Priority: config > ADB_PATH > SDK / common locations > fallback to 'adb' on PATH
 */
export function getAdbPath(config: Pick<ExportConfig, 'adbPath'>, env: NodeJS.ProcessEnv = process.env): string {
  if (config.adbPath && fs.existsSync(config.adbPath)) {
    return config.adbPath;
  }

  if (env.ADB_PATH && fs.existsSync(env.ADB_PATH)) {
    return env.ADB_PATH;
  }

  const detected = findExistingPath(getAdbCandidates(env));
  if (detected) {
    return detected;
  }

  return 'adb';
}
