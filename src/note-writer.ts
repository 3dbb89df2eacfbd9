/**
 * Note Writer
 *
 * Renders a NoteDocument as markdown and writes it to the output folder.
 * Rendering is deterministic so re-running on the same source gives a
 * byte-identical file.
 *
 * A note is only ever replaced by a note from the same export. The export's
 * file name is kept in the frontmatter (`source_file`); another export whose
 * title maps to the same file name gets "Title (1).md", "Title (2).md", ...
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { numberedName } from './backup-store';
import { hasErrorCode } from './errors';
import type { Highlight, NoteDocument } from './types';
import { stripTitleTags } from './parsers/text-normalize';

const INVALID_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001F\u007F]/g;
const MAX_FILENAME_LENGTH = 200;
const MAX_SUFFIX = 10000;

/**
 * Note file name from a title: bracketed tags dropped, filesystem-unsafe
 * characters removed.
 */
export function noteFileName(title: string): string {
  const base = stripTitleTags(title)
    .replace(INVALID_FILENAME_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '')
    .slice(0, MAX_FILENAME_LENGTH)
    .trim();
  return `${base || 'Untitled'}.md`;
}

function yamlString(value: string): string {
  return JSON.stringify(value);
}

function renderHighlight(highlight: Highlight): string[] {
  const [first, ...rest] = highlight.text.split('\n');
  const lines = [`- ${first}`];
  for (const line of rest) {
    lines.push(`\t${line}`);
  }
  if (highlight.location) {
    lines.push(`\t- Location: ${highlight.location}`);
  }
  if (highlight.annotation) {
    lines.push(`\t- Note: ${highlight.annotation}`);
  }
  return lines;
}

export function renderNote(doc: NoteDocument): string {
  const lines: string[] = [
    '---',
    `title: ${yamlString(doc.title)}`,
    `source: ${yamlString(doc.source)}`,
    `citation: ${yamlString(doc.citation)}`,
    `created: ${yamlString(doc.created)}`,
    `source_file: ${yamlString(doc.sourceFile)}`,
  ];

  if (doc.tags.length > 0) {
    lines.push('tags:');
    for (const tag of doc.tags) {
      lines.push(`  - ${yamlString(tag)}`);
    }
  } else {
    lines.push('tags: []');
  }
  lines.push('---', '', `# ${doc.title}`, '');

  let section: string | undefined;
  for (const highlight of doc.highlights) {
    if (highlight.section && highlight.section !== section) {
      if (lines[lines.length - 1] !== '') lines.push('');
      lines.push(`## ${highlight.section}`, '');
    }
    section = highlight.section ?? section;
    lines.push(...renderHighlight(highlight));
  }

  return lines.join('\n').replace(/\n*$/, '\n');
}

// Atomic file write - writes to temp file then renames to prevent corruption
// Uses temp file in same directory to avoid cross-device link issues
async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.kindle-notes-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`);

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/** Frontmatter fields read back from a note on disk */
export interface NoteHeader {
  sourceFile: string | null;
  created: string | null;
}

function frontmatterValue(line: string, key: string): string | null {
  if (!line.startsWith(`${key}: `)) return null;
  try {
    const value: unknown = JSON.parse(line.slice(key.length + 2));
    return typeof value === 'string' ? value : null;
  } catch {
    return null;
  }
}

export function parseNoteHeader(content: string): NoteHeader {
  const header: NoteHeader = { sourceFile: null, created: null };
  const lines = content.split(/\r?\n/);
  if (lines[0] !== '---') return header;

  for (const line of lines.slice(1)) {
    if (line === '---') break;
    header.sourceFile = frontmatterValue(line, 'source_file') ?? header.sourceFile;
    header.created = frontmatterValue(line, 'created') ?? header.created;
  }
  return header;
}

/**
 * Identity of an export across runs: the file name without its extension
 * or a sync client's " (1)" collision suffix.
 */
export function sourceKey(fileName: string): string {
  return fileName.replace(/\.[^.]+$/, '').replace(/\s+\(\d+\)$/, '');
}

async function readNoteHeader(notePath: string): Promise<NoteHeader | null> {
  try {
    return parseNoteHeader(await fs.readFile(notePath, 'utf-8'));
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw err;
  }
}

export interface WriteNoteOptions {
  /** Keep the `created` stamp of an earlier note from the same export */
  keepCreated?: boolean;
}

export interface WrittenNote {
  notePath: string;
  /** The document as written; `created` may come from the earlier note */
  document: NoteDocument;
}

/**
 * Write the note, replacing an earlier note from the same export.
 */
export async function writeNote(
  doc: NoteDocument,
  outputFolder: string,
  options: WriteNoteOptions = {}
): Promise<WrittenNote> {
  await fs.mkdir(outputFolder, { recursive: true });
  const fileName = noteFileName(doc.title);
  const key = sourceKey(doc.sourceFile);

  for (let counter = 0; counter < MAX_SUFFIX; counter++) {
    const notePath = path.join(outputFolder, numberedName(fileName, counter));
    const existing = await readNoteHeader(notePath);
    if (existing && (existing.sourceFile === null || sourceKey(existing.sourceFile) !== key)) {
      continue;
    }

    const document = options.keepCreated && existing?.created
      ? { ...doc, created: existing.created }
      : doc;
    await atomicWriteFile(notePath, renderNote(document));
    return { notePath, document };
  }

  throw new Error(`No free note name for ${fileName} in ${outputFolder}`);
}
