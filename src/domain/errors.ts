export class DomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class AmbiguousInputError extends DomainError {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Cannot resolve ${path}: ${reason}`);
  }
}

export class MaterializationError extends DomainError {
  constructor(
    public readonly repository: string,
    public readonly revision: string,
    public readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to download ${repository}@${revision}: ${detail}`, options);
  }
}

export class NotFoundError extends DomainError {
  constructor(
    public readonly root: string,
    public readonly recordedPath: string,
  ) {
    super(`No file under ${root} matches ${recordedPath}`);
  }
}

export class IOError extends DomainError {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to read ${filePath}`, options);
  }
}

export class CancelledError extends DomainError {
  constructor(operation: string) {
    super(`Cancelled: ${operation}`);
  }
}

export class ToolchainError extends DomainError {
  constructor(
    public readonly command: string,
    public readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${command} failed: ${detail}`, options);
  }
}
