import type { ReportSink } from '../checker/types.js';

/** UTF-8 byte order mark as a binary string. */
export const UTF8_BOM = '\xEF\xBB\xBF';

export function bomFixer(content: string, sink: ReportSink): string {
  if (!content.startsWith(UTF8_BOM)) {
    return content;
  }
  sink.fix('contains BOM');
  return content.slice(UTF8_BOM.length);
}
