/**
 * Markdown notebook parser
 *
 * Header region (everything before the first `---` line):
 *
 *   # Optional Title
 *   #### acoup.blog                 source
 *   Devereaux, Bret. "..." (2023)   citation
 *   #KindleExport #Acoup            tags (or: Tags: KindleExport, Acoup)
 *   - Created: 2023-01-27_23-20-47
 *
 * Body: `## ` / `### ` section headings and `- ` bullets. An indented
 * `- ` line is commentary on the bullet above it and stays part of that
 * highlight's text.
 */

import { PipelineError } from '../errors';
import type { Highlight } from '../types';
import type { ParseOptions, ParsedExport } from './parsed-export';
import { normalizeMarkdownInline, titleFromFileName, uniqueTags } from './text-normalize';

const SEPARATOR = /^\s*(-{3,}|\*{3,}|_{3,})\s*$/;
const HEADING = /^(#{1,6})\s+(.*)$/;
const TAG_LINE = /^(#[^\s#]+\s*)+$/;
const TAGS_FIELD = /^tags\s*:\s*(.*)$/i;
const CREATED_FIELD = /^(?:[-*]\s+)?created\s*:\s*(.*)$/i;
const BULLET = /^[-*+]\s+(.*)$/;
const SUB_BULLET = /^[ \t]+[-*+]\s+(.*)$/;

export interface NotebookHeader {
  title: string;
  source: string;
  citation: string;
  created: string | null;
  tags: string[];
}

function splitLines(content: string): string[] {
  return content.replace(/^\uFEFF/, '').split(/\r\n?|\n/);
}

function findBodyStart(lines: string[]): { headerEnd: number; bodyStart: number; hasSeparator: boolean } {
  const separator = lines.findIndex(line => SEPARATOR.test(line));
  if (separator >= 0) {
    return { headerEnd: separator, bodyStart: separator + 1, hasSeparator: true };
  }
  // No separator: the body starts at the first section heading or bullet
  const first = lines.findIndex(line =>
    /^#{2,3}\s/.test(line) || (BULLET.test(line) && !CREATED_FIELD.test(line.trim())));
  const index = first >= 0 ? first : lines.length;
  return { headerEnd: index, bodyStart: index, hasSeparator: false };
}

export function parseNotebookHeader(lines: string[]): NotebookHeader {
  const header: NotebookHeader = { title: '', source: '', citation: '', created: null, tags: [] };
  const citation: string[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const created = line.match(CREATED_FIELD);
    if (created) {
      header.created = normalizeMarkdownInline(created[1]) || null;
      continue;
    }

    const tagsField = line.match(TAGS_FIELD);
    if (tagsField) {
      header.tags.push(...tagsField[1].split(',').map(tag => normalizeMarkdownInline(tag.replace(/^\s*#/, ''))));
      continue;
    }

    if (TAG_LINE.test(line)) {
      header.tags.push(...line.split(/\s+/).map(token => normalizeMarkdownInline(token.slice(1))));
      continue;
    }

    const heading = line.match(HEADING);
    if (heading) {
      const level = heading[1].length;
      const text = normalizeMarkdownInline(heading[2]);
      if (level === 1 && !header.title) {
        header.title = text;
      } else if (level === 4 && !header.source) {
        header.source = text;
      }
      continue;
    }

    citation.push(normalizeMarkdownInline(line));
  }

  header.citation = citation.filter(Boolean).join(' ');
  header.tags = uniqueTags(header.tags);
  return header;
}

export function parseNotebookBody(lines: string[]): Highlight[] {
  const highlights: Highlight[] = [];
  let section: string | undefined;

  const start = (text: string) => {
    const highlight: Highlight = { text };
    if (section) highlight.section = section;
    highlights.push(highlight);
  };

  for (const rawLine of lines) {
    if (!rawLine.trim() || SEPARATOR.test(rawLine)) continue;

    const heading = rawLine.match(HEADING);
    if (heading) {
      section = normalizeMarkdownInline(heading[2]) || undefined;
      continue;
    }

    const sub = rawLine.match(SUB_BULLET);
    if (sub) {
      const text = normalizeMarkdownInline(sub[1]);
      if (!text) continue;
      const previous = highlights[highlights.length - 1];
      if (previous) {
        previous.text += `\n- ${text}`;
      } else {
        start(text);
      }
      continue;
    }

    const bullet = rawLine.match(BULLET);
    if (bullet) {
      const text = normalizeMarkdownInline(bullet[1].replace(/^>\s*/, ''));
      if (text) start(text);
      continue;
    }

    // Wrapped line: continues the previous passage
    const text = normalizeMarkdownInline(rawLine.replace(/^>\s*/, ''));
    const previous = highlights[highlights.length - 1];
    if (text && previous) {
      previous.text += ` ${text}`;
    }
  }

  return highlights;
}

export function parseMarkdownNotebook(content: string, options: ParseOptions): ParsedExport {
  const lines = splitLines(content);
  const { headerEnd, bodyStart, hasSeparator } = findBodyStart(lines);

  const header = parseNotebookHeader(lines.slice(0, headerEnd));
  const highlights = parseNotebookBody(lines.slice(bodyStart));

  const recognized = hasSeparator || header.source !== '' || header.created !== null || highlights.length > 0;
  if (!recognized) {
    throw new PipelineError('UNRECOGNIZED_FORMAT', 'convert', `${options.fileName} is not a notebook export`);
  }

  return {
    format: 'markdown-notebook',
    title: header.title || titleFromFileName(options.fileName),
    source: header.source,
    citation: header.citation,
    created: header.created,
    tags: uniqueTags([...options.defaultTags, ...header.tags]),
    highlights,
  };
}
