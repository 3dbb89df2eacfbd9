export * from './types';
export * from './errors';
export { systemClock, formatStamp } from './clock';
export type { Clock } from './clock';
export { RetryPolicy } from './retry-policy';
export type { RetryAttempt, RetryPolicyOptions } from './retry-policy';
export { RollingLogger, getMainLogger, closeLoggers, silentLogger } from './rolling-logger';
export type { Logger, LogLevel } from './rolling-logger';
export { DEFAULT_CONFIG, loadConfig, labelTableFor, getAdbPath } from './config';
export type { ExportConfig, ConfigOverrides, LoadConfigOptions } from './config';
export { UI_ACTIONS, DEFAULT_UI_LABELS, buildLabelTable } from './ui-labels';
export type { UiAction, UiLabelTable } from './ui-labels';
export { firstMatch } from './ui-driver';
export type { UiDriver, UiElement, DeviceInfo, Bounds } from './ui-driver';
export { formatInspection, formatElement, selectElements } from './ui-inspector';
export type { InspectOptions } from './ui-inspector';
export { AdbUiDriver, parseDeviceList, parseUiHierarchy } from './adb-bridge';
export { connect, withDeviceSession, checkDevices } from './device-session';
export type { DeviceHandle } from './device-session';
export { CollectionNavigator } from './collection-navigator';
export { BookExportController } from './book-export-controller';
export type { ExportResult } from './book-export-controller';
export { SyncWaiter, isExportFile } from './sync-waiter';
export { ExportIngestor } from './export-ingestor';
export type { IngestResult, IngestorOptions } from './export-ingestor';
export { parseExport } from './parsers';
export type { ParsedExport, ParseOptions } from './parsers';
export { renderNote, writeNote, noteFileName, parseNoteHeader, sourceKey } from './note-writer';
export type { NoteHeader, WriteNoteOptions, WrittenNote } from './note-writer';
export { moveToBackup, numberedName } from './backup-store';
export { ingestFolder, findExportFiles } from './folder-ingest';
export type { FileOutcome } from './folder-ingest';
export { runExport, formatRunSummary, countOutcomes } from './orchestrator';
export type { RunConfig, RunDependencies, RunOptions } from './orchestrator';
