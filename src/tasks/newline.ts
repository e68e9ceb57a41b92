import type { ReportSink, TaskHandler } from '../checker/types.js';
import type { Eol } from '../config/loader.js';

const LINE_ENDINGS: Record<Eol, string> = { lf: '\n', crlf: '\r\n' };

export function createNewlineNormalizer(eol: Eol): TaskHandler {
  const ending = LINE_ENDINGS[eol];

  return function newlineNormalizer(content: string, sink: ReportSink): string {
    const normalized = content.replace(/\r\n|\r|\n/g, ending);
    if (normalized !== content) {
      sink.fix(`contains line endings other than ${eol.toUpperCase()}`);
    }
    return normalized;
  };
}
