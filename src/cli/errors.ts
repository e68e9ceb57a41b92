export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class PathNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Path not found: ${path}`);
    this.name = 'PathNotFoundError';
  }
}

export class UnsupportedPathError extends Error {
  constructor(public readonly path: string) {
    super(`Not a regular file or directory: ${path}`);
    this.name = 'UnsupportedPathError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(`${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}
