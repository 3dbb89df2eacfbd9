/**
 * Kindle notebook HTML parser
 *
 * Reads the "Export notebook" HTML the Kindle app shares:
 *   .bookTitle / .authors / .citation      header
 *   .sectionHeading                        chapter
 *   .noteHeading  "Highlight (yellow) - Page 5 · Location 67"
 *   .noteText                              passage or note body
 *
 * Kindle often leaves .noteText divs unclosed, so later headings end up
 * nested inside them; nested blocks are stripped before reading text.
 */

import * as cheerio from 'cheerio';
import type { Highlight } from '../types';
import type { ParseOptions, ParsedExport } from './parsed-export';
import {
  authorTag,
  normalizeInline,
  stripTitleTags,
  titleFromFileName,
  titleTags,
  uniqueTags,
} from './text-normalize';

const BLOCK_SELECTORS = '.sectionHeading, .noteHeading, .noteText';
const MARKER_PATTERN = /<[a-z0-9]+[^>]*class\s*=\s*["']?[^"'>]*\b(bookTitle|noteText|noteHeading)\b/i;

type HeadingKind = 'highlight' | 'note' | 'bookmark';

interface NoteHeading {
  kind: HeadingKind;
  location?: string;
}

export function looksLikeKindleHtml(content: string): boolean {
  return MARKER_PATTERN.test(content);
}

/**
 * "Highlight (yellow) - Page 5 · Location 67" → highlight at "Page 5 · Location 67"
 */
export function parseNoteHeading(text: string): NoteHeading {
  const normalized = normalizeInline(text);
  const separator = normalized.indexOf(' - ');
  const label = separator >= 0 ? normalized.slice(0, separator) : normalized;
  const location = separator >= 0 ? normalized.slice(separator + 3).trim() : '';

  let kind: HeadingKind = 'highlight';
  if (/^(note|notiz|remarque|nota)\b/i.test(label)) {
    kind = 'note';
  } else if (/^(bookmark|lesezeichen|signet|marque-page|marcador)\b/i.test(label)) {
    kind = 'bookmark';
  }

  return location ? { kind, location } : { kind };
}

export function parseKindleHtml(content: string, options: ParseOptions): ParsedExport {
  const $ = cheerio.load(content);

  const rawTitle = normalizeInline($('.bookTitle').first().text());
  const source = normalizeInline($('.authors').first().text());
  const citation = normalizeInline($('.citation').first().text());
  const title = stripTitleTags(rawTitle) || titleFromFileName(options.fileName);

  const highlights: Highlight[] = [];
  let section: string | undefined;
  let pending: NoteHeading | null = null;

  $(BLOCK_SELECTORS).each((_, el) => {
    const block = $(el);

    if (block.hasClass('sectionHeading')) {
      section = normalizeInline(block.text()) || undefined;
      return;
    }

    if (block.hasClass('noteHeading')) {
      pending = parseNoteHeading(block.clone().find('.noteText, .sectionHeading').remove().end().text());
      return;
    }

    // .noteText: keep only its own text, not nested blocks
    const text = normalizeInline(block.clone().find(BLOCK_SELECTORS).remove().end().text());
    const heading: NoteHeading = pending ?? { kind: 'highlight' };
    pending = null;

    if (!text || heading.kind === 'bookmark') return;

    const previous = highlights[highlights.length - 1];
    if (heading.kind === 'note' && previous && previous.annotation === undefined) {
      previous.annotation = text;
      return;
    }

    const highlight: Highlight = { text };
    if (heading.location) highlight.location = heading.location;
    if (section) highlight.section = section;
    highlights.push(highlight);
  });

  const tags = uniqueTags([
    ...options.defaultTags,
    ...titleTags(rawTitle),
    ...(source ? [authorTag(source)] : []),
  ]);

  return {
    format: 'kindle-html',
    title,
    source,
    citation,
    created: null,
    tags,
    highlights,
  };
}
