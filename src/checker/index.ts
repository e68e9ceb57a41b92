export { matchFileName, matchesAny, globToRegExp } from './glob.js';
export { scanFiles } from './walker.js';
export { TaskRegistry } from './registry.js';
export { Reporter, type OutputStream, type ReporterOptions } from './reporter.js';
export { runChecker, processFile, type RunOptions, type ProcessOptions } from './runner.js';
export type {
  FileRecord,
  FileResult,
  GlobSet,
  ReportLevel,
  ReportSink,
  RunResult,
  RunState,
  Task,
  TaskHandler,
} from './types.js';
