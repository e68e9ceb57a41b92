import fs from 'node:fs';
import path from 'node:path';
import { matchFileName } from './glob.js';
import type { TaskRegistry } from './registry.js';
import type { Reporter } from './reporter.js';
import type {
  FileRecord,
  FileResult,
  GlobSet,
  ReportSink,
  RunResult,
  RunState,
  Task,
} from './types.js';
import { scanFiles } from './walker.js';

/** Read-only mode and progress display are taken from the reporter. */
export interface RunOptions extends GlobSet {
  root: string;
  registry: TaskRegistry;
  reporter: Reporter;
}

export interface ProcessOptions {
  reporter: Reporter;
}

// Files are read and written as binary strings: one char per byte.
const FILE_ENCODING = 'latin1';

export function runChecker(options: RunOptions): RunResult {
  const { root, reporter } = options;
  // Snapshot the configuration so the run sees a fixed task list and glob sets.
  const tasks = options.registry.all();
  const globs: GlobSet = { accept: [...options.accept], ignore: [...options.ignore] };

  const result: RunResult = { success: true, filesChecked: 0, filesChanged: 0, filesFailed: 0 };

  reporter.start(root);

  for (const record of scanFiles(root, globs)) {
    reporter.progress(result.filesChecked);
    const fileResult = processFile(record, tasks, { reporter });

    result.filesChecked++;
    if (fileResult.changed) result.filesChanged++;
    if (!fileResult.success) result.filesFailed++;
    result.success = fileResult.success && result.success;
  }

  reporter.finish();
  return result;
}

/**
 * Thread one file through the task list. A task's output is committed only
 * while the file has no error; once an error is reported, later tasks still
 * run but their edits are dropped.
 */
export function processFile(
  record: FileRecord,
  tasks: readonly Task[],
  options: ProcessOptions
): FileResult {
  const { readOnly } = options.reporter;
  const original = fs.readFileSync(record.absolutePath, FILE_ENCODING);
  const state: RunState = { originalContent: original, currentContent: original, hasError: false };
  const sink = createSink(record.relativePath, state, options);
  const baseName = path.basename(record.absolutePath);

  for (const task of tasks) {
    if (task.pattern && !matchFileName(task.pattern, baseName)) {
      continue;
    }

    let working = state.currentContent;
    try {
      working = task.handler(working, sink);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      sink.error(`Task ${task.name} failed: ${message}`);
    }

    if (!state.hasError) {
      state.currentContent = working;
    }
  }

  const changed = state.currentContent !== state.originalContent && !readOnly;
  if (changed) {
    writeFileAtomic(record.absolutePath, state.currentContent);
  }

  return { success: !state.hasError, changed };
}

function createSink(relativePath: string, state: RunState, options: ProcessOptions): ReportSink {
  const { reporter } = options;
  const { readOnly } = reporter;
  return {
    fix(message, line) {
      reporter.report('fix', relativePath, message, line);
      state.hasError = state.hasError || readOnly;
    },
    warning(message, line) {
      reporter.report('warning', relativePath, message, line);
    },
    error(message, line) {
      reporter.report('error', relativePath, message, line);
      state.hasError = true;
    },
  };
}

/**
 * Replace a file's content via a temp file beside it and a rename, so an
 * interrupted run never leaves a half-written file behind. Symlinks are
 * resolved first: the link stays a link and its target gets the content.
 */
function writeFileAtomic(filePath: string, content: string): void {
  const targetPath = fs.realpathSync(filePath);
  const { mode } = fs.statSync(targetPath);
  const tempPath = path.join(
    path.dirname(targetPath),
    `.${path.basename(targetPath)}.${process.pid}.tidytree-tmp`
  );

  try {
    fs.writeFileSync(tempPath, content, { encoding: FILE_ENCODING, mode });
    fs.renameSync(tempPath, targetPath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
