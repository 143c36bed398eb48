/**
 * Error classes for the archive run.
 */

export class ArchiveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArchiveError';
  }
}

/**
 * A page the rest of the archive depends on (course page, tab listing,
 * course API) could not be fetched. Aborts the run.
 */
export class RequiredResourceError extends ArchiveError {
  constructor(
    public readonly resource: string,
    public readonly url: string,
    public readonly cause?: unknown
  ) {
    super(`Failed to fetch required ${resource}: ${url}`);
    this.name = 'RequiredResourceError';
  }
}

export class UnsupportedUnitError extends ArchiveError {
  constructor(
    public readonly unitType: string,
    public readonly url: string
  ) {
    super(
      `Unsupported content unit type "${unitType}" (${url}). ` +
        'Pass --ignore-unsupported to archive it as unavailable.'
    );
    this.name = 'UnsupportedUnitError';
  }
}

/**
 * Raised by object stores. The optimization cache treats it as a miss.
 */
export class CacheError extends ArchiveError {
  constructor(
    public readonly key: string,
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(`Cache ${operation} failed for ${key}`);
    this.name = 'CacheError';
  }
}

export class ConfigError extends ArchiveError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
