import { Buffer, isUtf8 } from 'node:buffer';
import type { ReportSink } from '../checker/types.js';

export function utf8Checker(content: string, sink: ReportSink): string {
  if (!isUtf8(Buffer.from(content, 'latin1'))) {
    sink.error('Is not valid UTF-8 file');
  }
  return content;
}
