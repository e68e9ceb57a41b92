import path from 'node:path';
import { Chalk, type ChalkInstance } from 'chalk';
import type { ReportLevel } from './types.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ReporterOptions {
  colors: boolean;
  readOnly: boolean;
  showProgress?: boolean;
  stream?: OutputStream;
}

const TAG_WIDTH = 10;
const PROGRESS_WIDTH = 40;

export class Reporter {
  private readonly chalk: ChalkInstance;
  private readonly stream: OutputStream;
  readonly readOnly: boolean;
  readonly showProgress: boolean;

  constructor(options: ReporterOptions) {
    // Explicit level: terminal detection belongs to the caller.
    this.chalk = new Chalk({ level: options.colors ? 1 : 0 });
    this.stream = options.stream ?? process.stdout;
    this.readOnly = options.readOnly;
    this.showProgress = options.showProgress ?? false;
  }

  start(root: string): void {
    if (this.readOnly) {
      this.writeLine('Running in read-only mode');
    }
    this.writeLine(`Scanning ${this.chalk.bold(root)}`);
  }

  progress(counter: number): void {
    if (!this.showProgress) return;
    this.stream.write('.'.repeat(counter % PROGRESS_WIDTH).padEnd(PROGRESS_WIDTH) + '\r');
  }

  finish(): void {
    if (this.showProgress) {
      this.stream.write(' '.repeat(PROGRESS_WIDTH) + '\r');
    }
    this.writeLine('Done.');
  }

  report(level: ReportLevel, relativePath: string, message: string, line?: number): void {
    this.writeLine(this.format(level, relativePath, message, line));
  }

  format(level: ReportLevel, relativePath: string, message: string, line?: number): string {
    const paint = this.levelColor(level);
    const base = path.basename(relativePath);
    const dir = base === relativePath ? '' : path.dirname(relativePath) + path.sep;
    const location = line ? `${base}:${line}` : base;

    return [
      paint(`[${this.levelTag(level)}]`.padEnd(TAG_WIDTH)),
      dir ? this.chalk.dim(dir) : '',
      this.chalk.bold(location),
      '    ',
      paint(message),
    ].join('');
  }

  private levelTag(level: ReportLevel): string {
    switch (level) {
      case 'fix':
        return this.readOnly ? 'FOUND' : 'FIX';
      case 'warning':
        return 'WARNING';
      case 'error':
        return 'ERROR';
    }
  }

  private levelColor(level: ReportLevel): ChalkInstance {
    switch (level) {
      case 'fix':
        return this.chalk.cyan;
      case 'warning':
        return this.chalk.yellow;
      case 'error':
        return this.chalk.red;
    }
  }

  private writeLine(text: string): void {
    this.stream.write(text + '\n');
  }
}
