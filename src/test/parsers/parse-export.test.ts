import { describe, it, expect } from 'vitest';
import { PipelineError } from '../../errors';
import { parseExport } from '../../parsers';
import { KINDLE_HTML_FIXTURE, MARKDOWN_FIXTURE, readFixture } from '../fixtures';

describe('parseExport', () => {
  it('should pick the parser from the content', () => {
    const html = parseExport(readFixture(KINDLE_HTML_FIXTURE), { fileName: 'export.txt', defaultTags: [] });
    const markdown = parseExport(readFixture(MARKDOWN_FIXTURE), { fileName: 'export.md', defaultTags: [] });

    expect(html.format).toBe('kindle-html');
    expect(markdown.format).toBe('markdown-notebook');
  });

  it('should refuse HTML that is not a notebook export', () => {
    expect(() => parseExport('<html><body><p>hi</p></body></html>', { fileName: 'page.html', defaultTags: [] }))
      .toThrow(PipelineError);
  });
});
