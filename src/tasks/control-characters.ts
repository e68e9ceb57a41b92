import type { ReportSink } from '../checker/types.js';
import { lineNumberAt } from './line-number.js';

// C0 controls other than tab, line feed and carriage return.
const CONTROL_CHARACTER = /[\x00-\x08\x0B\x0C\x0E-\x1F]/;

export function controlCharactersChecker(content: string, sink: ReportSink): string {
  const match = CONTROL_CHARACTER.exec(content);
  if (match) {
    sink.error('Contains control characters', lineNumberAt(content, match.index));
  }
  return content;
}
