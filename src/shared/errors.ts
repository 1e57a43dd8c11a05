/**
 * citegraph error hierarchy
 */

export class CitegraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CitegraphError';
  }
}

// --- Config ---

export class ConfigError extends CitegraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'citegraph init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

// --- Database ---

export class DatabaseError extends CitegraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

export class MigrationError extends DatabaseError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

// --- Input ---

export class InvalidInputError extends CitegraphError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

// --- Persisted graphs ---

export class CorruptDataError extends CitegraphError {
  constructor(
    message: string,
    public readonly source: string | null = null,
    cause?: Error,
  ) {
    super(
      source ? `Corrupt graph data in ${source}: ${message}` : `Corrupt graph data: ${message}`,
      'CORRUPT_DATA',
      cause,
    );
    this.name = 'CorruptDataError';
  }
}

// --- Providers ---

export class ProviderUnavailableError extends CitegraphError {
  constructor(
    public readonly identifier: string,
    message: string,
    public readonly status: number | null = null,
    cause?: Error,
  ) {
    super(`Provider unavailable for ${identifier}: ${message}`, 'PROVIDER_UNAVAILABLE', cause);
    this.name = 'ProviderUnavailableError';
  }
}

export class NotFoundError extends CitegraphError {
  constructor(
    public readonly identifier: string,
    where: string,
  ) {
    super(`${identifier} not found in ${where}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

// --- Runs ---

export class RunNotFoundError extends CitegraphError {
  constructor(runId: number) {
    super(`Traversal run not found: #${runId}`, 'RUN_NOT_FOUND');
    this.name = 'RunNotFoundError';
  }
}

export class NodeNotFoundError extends CitegraphError {
  constructor(identifier: string) {
    super(`Node not found in any recorded run: ${identifier}`, 'NODE_NOT_FOUND');
    this.name = 'NodeNotFoundError';
  }
}

export class CheckpointUnavailableError extends CitegraphError {
  constructor() {
    super(
      'Checkpoint store is not available. The project has not been initialized.',
      'CHECKPOINT_UNAVAILABLE',
    );
    this.name = 'CheckpointUnavailableError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
