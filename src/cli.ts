#!/usr/bin/env node
/**
 * kindle-notes-sync command line
 *
 *   export   drive the Kindle app and convert what it exports
 *   convert  convert export files already on disk
 *   devices  check adb and list attached devices
 *   inspect  list the elements on the device screen
 */

import { parseArgs } from 'util';
import { AdbUiDriver } from './adb-bridge';
import type { Clock } from './clock';
import { systemClock } from './clock';
import type { ConfigOverrides, ExportConfig } from './config';
import { getAdbPath, labelTableFor, loadConfig } from './config';
import { checkDevices, connect } from './device-session';
import { SessionFatalError, errorMessage } from './errors';
import { ExportIngestor } from './export-ingestor';
import { formatFolderSummary, ingestFolder } from './folder-ingest';
import { formatRunSummary, runExport } from './orchestrator';
import type { Logger } from './rolling-logger';
import { closeLoggers, getMainLogger } from './rolling-logger';
import type { UiDriver } from './ui-driver';
import { formatInspection } from './ui-inspector';

const USAGE = `Usage: kindle-notes-sync <command> [options]

Commands:
  export    --collection <name> --watch <dir> --output <dir> --backup <dir>
            [--delay <ms>] [--device <serial>] [--config <file>]
  convert   --input <path> --output <dir> [--backup <dir>] [--config <file>]
  devices   [--config <file>]
  inspect   [--find <text>] [--clickable] [--device <serial>] [--config <file>]

Options:
  --verbose   mirror log entries to the console
  --help      show this message`;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export type CliDriver = UiDriver & { version(): Promise<string | null> };

/** What the commands run against; tests swap in a fake device */
export interface CliDependencies {
  createDriver(adbPath: string, logger: Logger): CliDriver;
  clock: Clock;
}

const defaultDependencies: CliDependencies = {
  createDriver: (adbPath, logger) => new AdbUiDriver({ adbPath, logger }),
  clock: systemClock,
};

const OPTIONS = {
  collection: { type: 'string' },
  watch: { type: 'string' },
  output: { type: 'string' },
  backup: { type: 'string' },
  input: { type: 'string' },
  delay: { type: 'string' },
  device: { type: 'string' },
  config: { type: 'string' },
  find: { type: 'string' },
  clickable: { type: 'boolean', default: false },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseDelay(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const delay = Number(value);
  if (!Number.isInteger(delay) || delay < 0) {
    throw new UsageError(`--delay must be a non-negative integer, got '${value}'`);
  }
  return delay;
}

async function runExportCommand(
  config: ExportConfig,
  logger: Logger,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const driver = deps.createDriver(getAdbPath(config), logger);

  // First Ctrl+C finishes the current book, then stops
  const controller = new AbortController();
  const onSigint = () => {
    io.err('Stopping after the current book...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await runExport(
      config,
      { driver, clock: deps.clock, logger, labels: labelTableFor(config) },
      { signal: controller.signal }
    );
    io.out(formatRunSummary(result));
    return 0;
  } catch (err) {
    if (err instanceof SessionFatalError) {
      io.err(`Run stopped: ${err.message} (${err.code})`);
      if (err.completed.length > 0) {
        io.err(`${err.completed.length} book(s) were processed before the failure`);
      }
      return 1;
    }
    throw err;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function runConvertCommand(
  input: string | undefined,
  config: ExportConfig,
  logger: Logger,
  io: CliIo
): Promise<number> {
  if (!input) {
    throw new UsageError('convert needs --input <path>');
  }
  const ingestor = new ExportIngestor({
    outputFolder: config.outputFolder,
    backupFolder: config.backupFolder,
    defaultTags: config.defaultTags,
    logger,
  });
  const outcomes = await ingestFolder(input, ingestor, { logger });
  io.out(formatFolderSummary(outcomes));
  return 0;
}

async function runDevicesCommand(
  config: ExportConfig,
  logger: Logger,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const adbPath = getAdbPath(config);
  const report = await checkDevices(deps.createDriver(adbPath, logger));
  if (report.adbVersion === null) {
    io.err(`adb not found or not runnable (${adbPath}). Install Android platform-tools or set ADB_PATH.`);
    return 1;
  }
  io.out(report.adbVersion);
  if (report.devices.length === 0) {
    io.out('No devices attached');
  }
  for (const device of report.devices) {
    io.out(`${device.serial}\t${device.state}`);
  }
  return 0;
}

/**
 * Print the current screen. The app is left as it is.
 */
async function runInspectCommand(
  options: { find?: string; clickableOnly: boolean },
  config: ExportConfig,
  logger: Logger,
  io: CliIo,
  deps: CliDependencies
): Promise<number> {
  const handle = await connect(deps.createDriver(getAdbPath(config), logger), {
    deviceSerial: config.deviceSerial,
    logger,
  });
  const elements = await handle.driver.dumpElements();
  io.out(formatInspection(elements, options));
  return 0;
}

/**
 * Run one command. Returns the process exit code.
 */
export async function main(
  argv: string[],
  io: CliIo = consoleIo,
  overrides: Partial<CliDependencies> = {}
): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.err(errorMessage(err));
    io.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const command = positionals[0];
  if (values.help || !command) {
    io.out(USAGE);
    return values.help ? 0 : 2;
  }

  try {
    const overrides: ConfigOverrides = {
      collectionName: values.collection,
      watchFolder: values.watch,
      outputFolder: values.output,
      backupFolder: values.backup,
      exportDelayMs: parseDelay(values.delay),
      deviceSerial: values.device,
    };

    const config = loadConfig({ configPath: values.config, overrides });
    const logger = getMainLogger(config.logDir, values.verbose);

    switch (command) {
      case 'export':
        return await runExportCommand(config, logger, io, deps);
      case 'convert':
        return await runConvertCommand(values.input, config, logger, io);
      case 'devices':
        return await runDevicesCommand(config, logger, io, deps);
      case 'inspect':
        return await runInspectCommand(
          { find: values.find, clickableOnly: values.clickable },
          config,
          logger,
          io,
          deps
        );
      default:
        throw new UsageError(`Unknown command '${command}'`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(err.message);
      io.err(USAGE);
      return 2;
    }
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await closeLoggers();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
