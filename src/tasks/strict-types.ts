import type { ReportSink } from '../checker/types.js';

const STRICT_TYPES_DECLARATION = /declare\s*\(\s*strict_types\s*=\s*1\s*\)/i;

export function strictTypesChecker(content: string, sink: ReportSink): string {
  if (!STRICT_TYPES_DECLARATION.test(content)) {
    sink.error('Missing declare(strict_types=1)');
  }
  return content;
}
