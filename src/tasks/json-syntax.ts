import { Buffer } from 'node:buffer';
import type { ReportSink } from '../checker/types.js';

export function jsonSyntaxChecker(content: string, sink: ReportSink): string {
  const text = Buffer.from(content, 'latin1').toString('utf-8').replace(/^\uFEFF/, '');
  try {
    JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    sink.error(`Invalid JSON: ${message}`);
  }
  return content;
}
