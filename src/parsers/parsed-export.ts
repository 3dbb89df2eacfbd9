import type { ExportFormat, Highlight } from '../types';

/**
 * What a format parser extracts. The ingestor fills in the creation
 * timestamp when the export does not carry one.
 */
export interface ParsedExport {
  format: ExportFormat;
  title: string;
  source: string;
  citation: string;
  created: string | null;
  tags: string[];
  highlights: Highlight[];
}

export interface ParseOptions {
  fileName: string;
  defaultTags: readonly string[];
}
