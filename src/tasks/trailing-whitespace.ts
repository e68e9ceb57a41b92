import type { ReportSink } from '../checker/types.js';
import { lineNumberAt } from './line-number.js';

const TRAILING_WHITESPACE = /[\t ]+(?=\r?\n|\r|$)/g;

export function trailingWhitespaceFixer(content: string, sink: ReportSink): string {
  const matches = [...content.matchAll(TRAILING_WHITESPACE)];
  const first = matches[0];
  if (first === undefined) {
    return content;
  }

  const count = matches.length;
  sink.fix(
    `has trailing whitespace on ${count} line${count === 1 ? '' : 's'}`,
    lineNumberAt(content, first.index ?? 0)
  );
  return content.replace(TRAILING_WHITESPACE, '');
}
