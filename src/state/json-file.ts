/**
 * JSON document on disk with validated reads and serialized writes
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StateFileError } from '../errors.js';

/**
 * Turns parsed JSON into a typed value or throws StateFileError
 */
export type Decoder<T> = (raw: unknown, filePath: string) => T;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFile<T> {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly decode: Decoder<T>,
    private readonly empty: () => T
  ) {}

  /**
   * Read and decode the file; a missing file reads as empty
   */
  async read(): Promise<T> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return this.empty();
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StateFileError(
        this.filePath,
        error instanceof Error ? error.message : String(error)
      );
    }
    return this.decode(raw, this.filePath);
  }

  /**
   * Replace the file contents. Writes run one at a time in call order and
   * go through a temporary file so readers never see a partial document.
   */
  write(data: T): Promise<void> {
    const text = JSON.stringify(data, null, 2) + '\n';
    const next = this.queue.then(() => this.writeNow(text));
    // the caller receives the failure; the queue moves on
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async writeNow(text: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, text, 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

// =============================================================================
// Decoding Helpers
// =============================================================================

export function expectRecord(
  value: unknown,
  where: string,
  filePath: string
): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new StateFileError(filePath, `${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function expectArray(value: unknown, where: string, filePath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new StateFileError(filePath, `${where} must be an array`);
  }
  return value;
}

export function expectString(value: unknown, where: string, filePath: string): string {
  if (typeof value !== 'string') {
    throw new StateFileError(filePath, `${where} must be a string`);
  }
  return value;
}

export function expectNullableString(
  value: unknown,
  where: string,
  filePath: string
): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return expectString(value, where, filePath);
}

export function expectNumber(value: unknown, where: string, filePath: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new StateFileError(filePath, `${where} must be a number`);
  }
  return value;
}
