/**
 * Cleanup shared by the export parsers. Exports carry stray control
 * characters, non-breaking spaces, soft hyphens and styling markers; none
 * of them may reach a note.
 */

// Soft hyphen, zero-width space/joiners, word joiner, BOM
const INVISIBLE = /[\u00AD\u200B-\u200D\u2060\uFEFF]/g;

// No-break, figure, narrow no-break and other fixed-width spaces
const ODD_SPACES = /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;

// C0/C1 controls except tab and newline
const CONTROLS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;

// Markdown emphasis and highlight markers
const STYLE_MARKERS = /\*\*|__|==|~~/g;

/**
 * Normalize one run of text to a single line: invisible characters
 * dropped, any whitespace collapsed to one space, ends trimmed.
 */
export function normalizeInline(value: string): string {
  return value
    .replace(/\r\n?/g, '\n')
    .replace(INVISIBLE, '')
    .replace(CONTROLS, '')
    .replace(ODD_SPACES, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Same as normalizeInline, plus removal of markdown styling markers.
 */
export function normalizeMarkdownInline(value: string): string {
  return normalizeInline(value.replace(INVISIBLE, '').replace(STYLE_MARKERS, ''));
}

/**
 * First letter upper, the rest lower.
 */
export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Tags keep first-seen order; blanks and repeats are dropped.
 */
export function uniqueTags(tags: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag && !seen.has(tag)) {
      seen.add(tag);
      result.push(tag);
    }
  }
  return result;
}

/**
 * "Title [tag one, two]" → "Title"
 */
export function stripTitleTags(title: string): string {
  const index = title.lastIndexOf('[');
  return index === -1 ? title.trim() : title.slice(0, index).trim();
}

/**
 * Bracketed suffix tags: "Title [history, war]" → ["History", "War"]
 */
export function titleTags(title: string): string[] {
  const match = title.match(/\S\s*\[([^\]]*)\]\s*$/);
  if (!match) return [];
  return match[1]
    .split(',')
    .map(part => part.trim())
    .filter(part => part !== '')
    .map(capitalize);
}

/**
 * Author or site as one tag: "acoup.blog" → "AcoupBlog"
 */
export function authorTag(authors: string): string {
  return authors
    .replace(/\n/g, '')
    .trim()
    .split(/[.,! ]/)
    .filter(part => part.trim() !== '')
    .map(capitalize)
    .join('');
}

/**
 * Book title from an export file name: "Dune - Notebook.html" → "Dune"
 */
export function titleFromFileName(fileName: string): string {
  const stem = fileName.replace(/\.[^.]+$/, '');
  return normalizeInline(stem.replace(/\s*-\s*Notebook$/i, ''));
}
