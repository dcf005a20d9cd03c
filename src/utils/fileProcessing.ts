/**
 * File Processing Module
 *
 * Bounded concurrent map over a file list. A fixed number of workers pull
 * paths from a shared cursor; a failure on one file is recorded and the
 * remaining files are still processed.
 *
 * Results come back in completion order, not input order.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import { getLogger } from './logger.js';
import { fileTooLarge } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A file that could not be processed
 */
export interface FileProcessingError {
  path: string;
  error: Error;
}

export interface MapFilesResult<T> {
  results: T[];
  errors: FileProcessingError[];
}

/**
 * Called once per file, processed or failed
 */
export type ProgressCallback = (path: string) => void;

export interface MapFilesOptions {
  /** Number of concurrent workers (default: 2 x CPU count) */
  concurrency?: number;
  onProgress?: ProgressCallback;
}

/** Workers per CPU; file reads overlap with parsing */
export const DEFAULT_WORKER_MULTIPLIER = 2;

export function getDefaultConcurrency(): number {
  return Math.max(1, os.cpus().length * DEFAULT_WORKER_MULTIPLIER);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Apply `fn` to every file with bounded concurrency
 *
 * @param files - Paths to process
 * @param fn - Per-file work; a throw is recorded in `errors`
 * @param options - Concurrency and progress
 */
export async function mapFiles<T>(
  files: readonly string[],
  fn: (filePath: string) => Promise<T> | T,
  options: MapFilesOptions = {}
): Promise<MapFilesResult<T>> {
  const results: T[] = [];
  const errors: FileProcessingError[] = [];

  if (files.length === 0) {
    return { results, errors };
  }

  const workerCount = Math.min(
    files.length,
    Math.max(1, options.concurrency ?? getDefaultConcurrency())
  );
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < files.length) {
      const filePath = files[cursor++];
      try {
        results.push(await fn(filePath));
      } catch (error) {
        errors.push({
          path: filePath,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
      options.onProgress?.(filePath);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  getLogger().debug('fileProcessing', 'Processed files', {
    total: files.length,
    failed: errors.length,
    workers: workerCount,
  });

  return { results, errors };
}

/**
 * `mapFiles` that first rejects files larger than `maxSize` bytes
 *
 * A `maxSize` of 0 disables the check. Oversized files are reported with a
 * FILE_TOO_LARGE error and never reach `fn`.
 */
export async function mapFilesWithSizeLimit<T>(
  files: readonly string[],
  maxSize: number,
  fn: (filePath: string) => Promise<T> | T,
  options: MapFilesOptions = {}
): Promise<MapFilesResult<T>> {
  if (maxSize <= 0) {
    return mapFiles(files, fn, options);
  }

  return mapFiles(
    files,
    async (filePath) => {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > maxSize) {
        throw fileTooLarge(filePath, stats.size, maxSize);
      }
      return fn(filePath);
    },
    options
  );
}
