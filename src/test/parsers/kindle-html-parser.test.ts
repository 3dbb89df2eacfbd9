/**
 * Kindle notebook HTML parser tests
 */

import { describe, it, expect } from 'vitest';
import { looksLikeKindleHtml, parseKindleHtml, parseNoteHeading } from '../../parsers/kindle-html-parser';
import { KINDLE_HTML_FIXTURE, readFixture } from '../fixtures';

const OPTIONS = { fileName: 'The Lighthouse Keeper - Notebook.html', defaultTags: ['KindleExport'] };

describe('parseNoteHeading', () => {
  it('should split kind and location', () => {
    expect(parseNoteHeading('Highlight (yellow) - Page 5 \u00B7 Location 67')).toEqual({
      kind: 'highlight',
      location: 'Page 5 \u00B7 Location 67',
    });
  });

  it('should recognise notes and bookmarks', () => {
    expect(parseNoteHeading('Note - Location 12')).toEqual({ kind: 'note', location: 'Location 12' });
    expect(parseNoteHeading('Bookmark - Location 99').kind).toBe('bookmark');
  });

  it('should omit the location when there is none', () => {
    expect(parseNoteHeading('Highlight (pink)')).toEqual({ kind: 'highlight' });
  });
});

describe('looksLikeKindleHtml', () => {
  it('should detect notebook markers', () => {
    expect(looksLikeKindleHtml(readFixture(KINDLE_HTML_FIXTURE))).toBe(true);
  });

  it('should reject ordinary HTML', () => {
    expect(looksLikeKindleHtml('<html><body><p class="intro">Hello</p></body></html>')).toBe(false);
  });
});

describe('parseKindleHtml', () => {
  const parsed = parseKindleHtml(readFixture(KINDLE_HTML_FIXTURE), OPTIONS);

  it('should read the header', () => {
    expect(parsed.format).toBe('kindle-html');
    expect(parsed.title).toBe('The Lighthouse Keeper');
    expect(parsed.source).toBe('Jane Q. Writer');
    expect(parsed.citation).toBe('Writer, Jane Q. The Lighthouse Keeper. Harbor Press, 2021. Kindle edition.');
    expect(parsed.created).toBeNull();
  });

  it('should build tags from defaults, bracketed title tags and the author', () => {
    expect(parsed.tags).toEqual(['KindleExport', 'History', 'Maritime', 'JaneQWriter']);
  });

  it('should keep highlights in order with sections, locations and attached notes', () => {
    expect(parsed.highlights).toEqual([
      {
        text: 'The light must never go out, not even for a single night.',
        location: 'Page 5 \u00B7 Location 67',
        section: 'Chapter 1: The Coast',
        annotation: "Compare with the harbor master's log.",
      },
      {
        text: 'Storms arrive from the west in autumn.',
        location: 'Page 14 \u00B7 Location 201',
        section: 'Chapter 2: Storms',
      },
    ]);
  });

  it('should read passages out of unclosed noteText blocks', () => {
    const html = [
      '<div class="bookTitle">Nested</div>',
      '<div class="noteHeading">Highlight (yellow) - Location 10</div>',
      '<div class="noteText">First passage',
      '<div class="noteHeading">Highlight (yellow) - Location 12</div>',
      '<div class="noteText">Second passage',
    ].join('\n');

    const result = parseKindleHtml(html, OPTIONS);

    expect(result.highlights).toEqual([
      { text: 'First passage', location: 'Location 10' },
      { text: 'Second passage', location: 'Location 12' },
    ]);
  });

  it('should keep a note with no passage before it as its own entry', () => {
    const html = [
      '<div class="bookTitle">Loose Note</div>',
      '<div class="noteHeading">Note - Location 3</div>',
      '<div class="noteText">Standalone thought</div>',
    ].join('\n');

    expect(parseKindleHtml(html, OPTIONS).highlights).toEqual([
      { text: 'Standalone thought', location: 'Location 3' },
    ]);
  });

  it('should fall back to the file name for the title', () => {
    const html = '<div class="noteHeading">Highlight (yellow) - Location 1</div><div class="noteText">Only text</div>';
    const result = parseKindleHtml(html, { fileName: 'Untitled Draft - Notebook.html', defaultTags: [] });

    expect(result.title).toBe('Untitled Draft');
    expect(result.source).toBe('');
    expect(result.tags).toEqual([]);
  });

  it('should strip invisible characters from passages', () => {
    const html = '<div class="bookTitle">Clean</div><div class="noteText">soft\u00ADhyphen and zero\u200Bwidth</div>';

    expect(parseKindleHtml(html, OPTIONS).highlights[0].text).toBe('softhyphen and zerowidth');
  });
});
