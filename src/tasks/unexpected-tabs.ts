import type { ReportSink } from '../checker/types.js';
import { lineNumberAt } from './line-number.js';

export function unexpectedTabsChecker(content: string, sink: ReportSink): string {
  const index = content.indexOf('\t');
  if (index !== -1) {
    sink.error('Found unexpected tabulator', lineNumberAt(content, index));
  }
  return content;
}
