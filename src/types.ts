/**
 * Shared types for the export pipeline.
 *
 * Everything here is plain data: books discovered on the device, artifacts
 * picked up from the sync folder, parsed note documents and run outcomes.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Device side
// ─────────────────────────────────────────────────────────────────────────────

export interface Book {
  title: string;
  ordinal: number;  // 0-based position in the navigator-reported order
}

// ─────────────────────────────────────────────────────────────────────────────
// Sync folder side
// ─────────────────────────────────────────────────────────────────────────────

export interface ExportArtifact {
  path: string;
  fileName: string;
  discoveredAt: number;  // epoch ms, from the run clock
  modifiedAt: number;    // epoch ms, file mtime
  book?: Book;
}

// ─────────────────────────────────────────────────────────────────────────────
// Notes
// ─────────────────────────────────────────────────────────────────────────────

export interface Highlight {
  /** Passage text; commentary sub-bullets are kept as indented `- ` lines */
  text: string;
  location?: string;
  section?: string;
  annotation?: string;
}

export interface NoteDocument {
  title: string;
  source: string;       // author or site
  citation: string;
  created: string;      // YYYY-MM-DD_HH-mm-ss
  tags: string[];
  highlights: Highlight[];
  sourceFile: string;   // original artifact file name
}

export type ExportFormat = 'kindle-html' | 'markdown-notebook';

// ─────────────────────────────────────────────────────────────────────────────
// Run outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type PipelineStage =
  | 'session'
  | 'navigate'
  | 'open-book'
  | 'open-notes'
  | 'share'
  | 'sync'
  | 'convert'
  | 'archive';

export type SessionErrorCode =
  | 'ADB_UNAVAILABLE'
  | 'NO_DEVICE_FOUND'
  | 'MULTIPLE_DEVICES_AMBIGUOUS'
  | 'DEVICE_NOT_FOUND'
  | 'SCREEN_LOCKED'
  | 'DEVICE_LOST'
  | 'COLLECTION_NOT_FOUND'
  | 'APP_NOT_RESPONDING';

export type BookErrorCode =
  | 'UI_ELEMENT_NOT_FOUND'
  | 'EXPORT_ACTION_FAILED'
  | 'SYNC_TIMEOUT'
  | 'UNRECOGNIZED_FORMAT'
  | 'EMPTY_EXPORT'
  | 'READ_FAILED'
  | 'WRITE_FAILED';

export type PipelineErrorCode = SessionErrorCode | BookErrorCode;

export type BookOutcome =
  | {
      status: 'success';
      book: Book;
      notePath: string;
      backupPath: string | null;
      highlightCount: number;
    }
  | {
      status: 'skipped';
      book: Book;
      reason: string;
    }
  | {
      status: 'failed';
      book: Book;
      stage: PipelineStage;
      code: PipelineErrorCode;
      message: string;
    };

export interface RunCounts {
  success: number;
  skipped: number;
  failed: number;
}

export interface RunResult {
  collection: string;
  startedAt: string;   // ISO timestamp
  finishedAt: string;  // ISO timestamp
  outcomes: BookOutcome[];
  counts: RunCounts;
}
