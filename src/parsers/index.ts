import * as path from 'path';
import { PipelineError } from '../errors';
import { looksLikeKindleHtml, parseKindleHtml } from './kindle-html-parser';
import { parseMarkdownNotebook } from './markdown-notebook-parser';
import type { ParseOptions, ParsedExport } from './parsed-export';

export type { ParseOptions, ParsedExport } from './parsed-export';

const HTML_EXTENSIONS = new Set(['.html', '.htm']);

/**
 * Pick a parser by content first, extension second. HTML without Kindle
 * notebook markers is not something we can read.
 */
export function parseExport(content: string, options: ParseOptions): ParsedExport {
  if (looksLikeKindleHtml(content)) {
    return parseKindleHtml(content, options);
  }

  if (HTML_EXTENSIONS.has(path.extname(options.fileName).toLowerCase())) {
    throw new PipelineError(
      'UNRECOGNIZED_FORMAT',
      'convert',
      `${options.fileName} is HTML but not a Kindle notebook export`
    );
  }

  return parseMarkdownNotebook(content, options);
}
