/**
 * Shared types for CLI commands
 */

import type { SyncConfig } from './config/types.js';

/**
 * Global CLI options available to all commands
 */
export interface GlobalOptions {
  /** Path to course-sync.yaml */
  config?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Recorded as the trigger of manual runs */
  user?: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Output format for CLI results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Loaded and validated configuration */
  config: SyncConfig;
}
