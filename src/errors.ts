/**
 * Error types
 *
 * Entity-level and batch-level errors are recovered where they occur;
 * only StoreConnectionError surfaces from a run.
 */

export type CadGraphErrorCode =
  | 'IDENTITY_UNAVAILABLE'
  | 'HOST_UNAVAILABLE'
  | 'TRANSIENT_STORE_FAILURE'
  | 'BATCH_LOAD_FAILED'
  | 'STORE_CONNECTION_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_SNAPSHOT';

export class CadGraphError extends Error {
  constructor(
    readonly code: CadGraphErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The host exposes no persistent token for an entity (transient or virtual
 * geometry). The entity is skipped.
 */
export class IdentityUnavailableError extends CadGraphError {
  constructor(
    readonly objectType: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('IDENTITY_UNAVAILABLE', `No stable token for ${objectType}: ${reason}`, options);
  }
}

/**
 * The CAD document went away mid-run (closed by the user, host shut down).
 */
export class HostUnavailableError extends CadGraphError {
  constructor(message = 'CAD document is no longer available') {
    super('HOST_UNAVAILABLE', message);
  }
}

/**
 * Connection reset, deadlock, leader switch or timeout; worth retrying.
 */
export class TransientStoreError extends CadGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_STORE_FAILURE', message, options);
  }
}

export class BatchLoadFailedError extends CadGraphError {
  constructor(
    readonly sequence: number,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      'BATCH_LOAD_FAILED',
      `Batch ${sequence} failed after ${attempts} attempt(s): ${errorMessage(options?.cause)}`,
      options
    );
  }
}

export class StoreConnectionError extends CadGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_CONNECTION_FAILED', message, options);
  }
}

export class ConfigError extends CadGraphError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export class SnapshotFormatError extends CadGraphError {
  constructor(message: string) {
    super('INVALID_SNAPSHOT', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
