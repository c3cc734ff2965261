/**
 * Error classes for course synchronization
 *
 * Every fatal failure raised during a run extends SyncError so callers can
 * read a stable `code` without parsing messages.
 */

// =============================================================================
// Base
// =============================================================================

/**
 * Base error class for sync failures
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'SyncError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

// =============================================================================
// Repository Errors
// =============================================================================

export type TransportErrorCode =
  | 'TRANSPORT_ERROR'
  | 'RATE_LIMITED'
  | 'AUTH_FAILED'
  | 'NOT_FOUND';

/**
 * The repository host could not be reached or rejected a request
 */
export class TransportError extends SyncError {
  /** HTTP status, when the failure came from a response */
  public readonly status?: number;
  /** Seconds until the host accepts requests again */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    code: TransportErrorCode = 'TRANSPORT_ERROR',
    options: { status?: number; retryAfter?: number; suggestion?: string } = {}
  ) {
    super(message, code, options.suggestion);
    this.name = 'TransportError';
    this.status = options.status;
    this.retryAfter = options.retryAfter;
  }
}

/**
 * The snapshot tree listing came back empty
 */
export class EmptySnapshotError extends SyncError {
  constructor(public readonly snapshotIdentity: string) {
    super(
      `Empty repository tree at ${snapshotIdentity.substring(0, 7)}`,
      'EMPTY_SNAPSHOT',
      'Check that the configured branch contains course files'
    );
    this.name = 'EmptySnapshotError';
  }
}

// =============================================================================
// Content Errors
// =============================================================================

/**
 * A page declared an activity type the platform cannot construct, or left
 * out a field that type requires
 */
export class UnsupportedActivityError extends SyncError {
  constructor(
    public readonly activityType: string,
    public readonly repoPath: string,
    public readonly detail?: string
  ) {
    super(
      detail
        ? `Cannot create ${activityType} activity from ${repoPath}: ${detail}`
        : `Unsupported activity type "${activityType}" in ${repoPath}`,
      'UNSUPPORTED_ACTIVITY',
      'Use one of: page, label, url, multichoice, truefalse'
    );
    this.name = 'UnsupportedActivityError';
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'CONFIG_UNKNOWN_COURSE'
  | 'CONFIG_MISSING_SECRET';

/**
 * Configuration file missing, unreadable or invalid
 */
export class ConfigError extends SyncError {
  constructor(
    message: string,
    code: ConfigErrorCode,
    public readonly issues: string[] = [],
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
  }

  override toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    for (const issue of this.issues) {
      msg += `\n  - ${issue}`;
    }
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

// =============================================================================
// State Errors
// =============================================================================

/**
 * A persisted state file exists but does not hold what the store expects
 */
export class StateFileError extends SyncError {
  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(
      `Invalid state file ${filePath}: ${detail}`,
      'STATE_CORRUPT',
      'Restore the file from a backup or delete it to start from an empty state'
    );
    this.name = 'StateFileError';
  }
}

// =============================================================================
// Warnings
// =============================================================================

/**
 * Structured metadata failed to parse and the flat key/value subset was
 * used instead. Reported, never thrown.
 */
export interface ParseFallbackWarning {
  kind: 'parse_fallback';
  /** Repository path of the metadata file */
  path: string;
  /** Strategy that failed */
  strategy: string;
  /** Parser message */
  reason: string;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Type guard for SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Code for any thrown value; UNEXPECTED for anything that is not a SyncError
 */
export function errorCode(error: unknown): string {
  return isSyncError(error) ? error.code : 'UNEXPECTED';
}

/**
 * Message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
