import type { ReportSink } from '../checker/types.js';

// Spaces after leading tabs, unless they start a ` *` block-comment line.
const SPACE_INDENT = /^\t* (?!\*)/;

export function tabIndentationChecker(content: string, sink: ReportSink): string {
  const lines = content.split('\n');
  const index = lines.findIndex((line) => SPACE_INDENT.test(line) && line.trim() !== '');
  if (index !== -1) {
    sink.error('Used space to indent instead of tab', index + 1);
  }
  return content;
}
