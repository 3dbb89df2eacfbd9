/**
 * Export Ingestor
 *
 * Owns an artifact from hand-off until it is converted and archived, or
 * has failed and stays where it is for manual inspection.
 */

import * as fs from 'fs/promises';
import { moveToBackup } from './backup-store';
import { formatStamp } from './clock';
import { PipelineError, errorMessage } from './errors';
import { writeNote } from './note-writer';
import type { WrittenNote } from './note-writer';
import { parseExport } from './parsers';
import type { ParsedExport } from './parsers';
import type { Logger } from './rolling-logger';
import { silentLogger } from './rolling-logger';
import type { ExportArtifact, NoteDocument } from './types';

export interface IngestorOptions {
  outputFolder: string;
  /** Empty string disables the backup; the original is then left in place */
  backupFolder: string;
  defaultTags: readonly string[];
  logger?: Logger;
}

export interface IngestResult {
  document: NoteDocument;
  notePath: string;
  backupPath: string | null;
}

export class ExportIngestor {
  private readonly logger: Logger;

  constructor(private readonly options: IngestorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Parse an artifact. Reads the file only; nothing is written or moved.
   */
  async convert(artifact: ExportArtifact): Promise<NoteDocument> {
    return this.convertContent(await this.read(artifact), artifact);
  }

  convertContent(content: string, artifact: ExportArtifact): NoteDocument {
    return this.toDocument(content, artifact).document;
  }

  /**
   * Convert, write the note, then archive the original.
   */
  async ingest(artifact: ExportArtifact): Promise<IngestResult> {
    const { document: parsed, stamped } = this.toDocument(await this.read(artifact), artifact);

    let written: WrittenNote;
    try {
      // An export without its own timestamp keeps the one of its earlier note
      written = await writeNote(parsed, this.options.outputFolder, { keepCreated: stamped });
    } catch (err) {
      throw new PipelineError('WRITE_FAILED', 'convert', `Could not write note for ${artifact.fileName}: ${errorMessage(err)}`, artifact.book?.title);
    }
    const { notePath, document } = written;

    let backupPath: string | null = null;
    if (this.options.backupFolder) {
      try {
        backupPath = await moveToBackup(artifact.path, this.options.backupFolder);
      } catch (err) {
        throw new PipelineError('WRITE_FAILED', 'archive', `Could not archive ${artifact.fileName}: ${errorMessage(err)}`, artifact.book?.title);
      }
    }

    this.logger.info('Converted export', {
      fileName: artifact.fileName,
      notePath,
      backupPath,
      highlights: document.highlights.length,
    });

    return { document, notePath, backupPath };
  }

  private async read(artifact: ExportArtifact): Promise<string> {
    try {
      return await fs.readFile(artifact.path, 'utf-8');
    } catch (err) {
      throw new PipelineError('READ_FAILED', 'convert', `Could not read ${artifact.fileName}: ${errorMessage(err)}`, artifact.book?.title);
    }
  }

  /**
   * `stamped` is set when the export carries no timestamp of its own and
   * `created` is the discovery time.
   */
  private toDocument(content: string, artifact: ExportArtifact): { document: NoteDocument; stamped: boolean } {
    if (content.replace(/^\uFEFF/, '').trim() === '') {
      throw new PipelineError('EMPTY_EXPORT', 'convert', `${artifact.fileName} is empty`, artifact.book?.title);
    }

    let parsed: ParsedExport;
    try {
      parsed = parseExport(content, {
        fileName: artifact.fileName,
        defaultTags: this.options.defaultTags,
      });
    } catch (err) {
      if (err instanceof PipelineError) {
        throw new PipelineError(err.code, err.stage, err.message, artifact.book?.title);
      }
      throw new PipelineError('UNRECOGNIZED_FORMAT', 'convert', `Could not parse ${artifact.fileName}: ${errorMessage(err)}`, artifact.book?.title);
    }

    const document: NoteDocument = {
      title: parsed.title,
      source: parsed.source,
      citation: parsed.citation,
      created: parsed.created ?? formatStamp(artifact.discoveredAt),
      tags: parsed.tags,
      highlights: parsed.highlights,
      sourceFile: artifact.fileName,
    };
    return { document, stamped: parsed.created === null };
  }
}
