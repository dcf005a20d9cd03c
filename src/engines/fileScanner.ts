/**
 * File Scanner
 *
 * Lists the source files of a project: glob over the include patterns,
 * drop anything matching the hardcoded or user excludes, keep only
 * extensions with a grammar.
 *
 * @module fileScanner
 */

import * as fs from 'node:fs';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import { type Config, HARDCODED_EXCLUDES } from '../storage/config.js';
import { normalizePath, toAbsolutePath } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import { pathNotFound, scanFailed } from '../errors/index.js';
import { getTreeSitterParser } from './treeSitterParser.js';

/**
 * Turn a directory pattern such as `vendor/` into a glob matching
 * everything beneath it at any depth
 */
export function toExcludeGlob(pattern: string): string {
  if (pattern.endsWith('/')) {
    const dir = pattern.startsWith('**/') ? pattern : `**/${pattern}`;
    return `${dir}**`;
  }
  return pattern;
}

/**
 * Check if a relative path matches any pattern in a list
 */
export function matchesAnyPattern(relativePath: string, patterns: readonly string[]): boolean {
  const withoutPrefix = relativePath.startsWith('./') ? relativePath.slice(2) : relativePath;
  return patterns.some((pattern) => minimatch(withoutPrefix, pattern, { dot: true }));
}

export function hasSupportedExtension(filePath: string): boolean {
  return getTreeSitterParser().isSupported(filePath);
}

/**
 * Scan a project for analyzable source files
 *
 * @param projectPath - Root directory
 * @param config - Include and exclude patterns
 * @returns Absolute paths, sorted by relative path
 * @throws CohesionError PATH_NOT_FOUND if the root is missing or not a directory
 * @throws CohesionError SCAN_FAILED if the directory walk fails
 */
export async function scanFiles(
  projectPath: string,
  config: Pick<Config, 'include' | 'exclude'>
): Promise<string[]> {
  const logger = getLogger();
  const root = normalizePath(projectPath);

  let isDirectory = false;
  try {
    isDirectory = (await fs.promises.stat(root)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw pathNotFound(root);
  }

  logger.info('FileScanner', 'Starting file scan', { projectPath: root });

  const hardExcludes = HARDCODED_EXCLUDES.map(toExcludeGlob);
  const userExcludes = config.exclude.map(toExcludeGlob);

  let matched: string[];
  try {
    matched = await glob(config.include.length > 0 ? config.include : ['**/*'], {
      cwd: root,
      nodir: true,
      dot: true,
      absolute: false,
      ignore: hardExcludes,
    });
  } catch (error) {
    throw scanFailed(root, error instanceof Error ? error : new Error(String(error)));
  }

  logger.debug('FileScanner', `Found ${matched.length} total files before filtering`);

  const files = matched
    .map((file) => file.replace(/\\/g, '/'))
    .filter((file) => !matchesAnyPattern(file, hardExcludes))
    .filter((file) => !matchesAnyPattern(file, userExcludes))
    .filter(hasSupportedExtension)
    .sort()
    .map((file) => normalizePath(toAbsolutePath(file, root)));

  logger.info('FileScanner', 'File scan complete', {
    matched: matched.length,
    supported: files.length,
  });

  return files;
}
