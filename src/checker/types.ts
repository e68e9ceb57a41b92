export type ReportLevel = 'fix' | 'warning' | 'error';

/**
 * Per-file reporting interface handed to every task invocation.
 */
export interface ReportSink {
  /** A correctable issue. Fails the file only in read-only mode. */
  fix(message: string, line?: number): void;
  /** Informational; never fails the file. */
  warning(message: string, line?: number): void;
  /** Always fails the file and discards the reporting task's edits. */
  error(message: string, line?: number): void;
}

/**
 * A task receives the file content as a binary string (one char per byte)
 * and returns the new content.
 */
export type TaskHandler = (content: string, sink: ReportSink) => string;

export interface Task {
  name: string;
  handler: TaskHandler;
  /** Comma-separated globs, optionally prefixed with `!` to negate the list. */
  pattern?: string;
}

export interface FileRecord {
  absolutePath: string;
  relativePath: string;
}

export interface GlobSet {
  accept: readonly string[];
  ignore: readonly string[];
}

export interface RunState {
  originalContent: string;
  currentContent: string;
  hasError: boolean;
}

export interface FileResult {
  success: boolean;
  changed: boolean;
}

export interface RunResult {
  success: boolean;
  filesChecked: number;
  filesChanged: number;
  filesFailed: number;
}
