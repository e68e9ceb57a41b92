import type { ReportSink } from '../checker/types.js';
import { lineNumberAt } from './line-number.js';

const CLOSING_TAG_AT_END = /\?>\s*$/;

/**
 * Removes a `?>` that closes a pure PHP file, where trailing output after it
 * would only be accidental whitespace.
 */
export function trailingPhpTagRemover(content: string, sink: ReportSink): string {
  if (!content.startsWith('<?php')) {
    return content;
  }
  const match = CLOSING_TAG_AT_END.exec(content);
  if (!match || content.indexOf('?>') !== match.index) {
    return content;
  }

  sink.fix('contains closing PHP tag ?>', lineNumberAt(content, match.index));
  const newline = content.includes('\r\n') ? '\r\n' : '\n';
  return content.slice(0, match.index).replace(/\s+$/, '') + newline;
}
