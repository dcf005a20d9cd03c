/**
 * Path Utilities Module
 *
 * Cross-platform path helpers used by the scanner, the analyzer and the
 * error messages:
 * - Path normalization (absolute paths, separator normalization)
 * - Relative path conversion (always forward-slash separated)
 * - Config and log locations inside an analyzed project
 * - Path sanitization for display
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Name of the per-project configuration file */
export const CONFIG_FILE_NAME = 'cohesion.config.json';

// ============================================================================
// Path Normalization
// ============================================================================

/**
 * Normalize a path to absolute form with consistent separators
 *
 * @example
 * ```typescript
 * normalizePath('/home/dev/project/')
 * // => '/home/dev/project'
 * ```
 */
export function normalizePath(inputPath: string): string {
  let normalized = path.normalize(path.resolve(inputPath));

  // Remove trailing separator (except for root paths like '/' or 'C:\')
  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }

  if (process.platform === 'win32' && /^[A-Za-z]:$/.test(normalized)) {
    normalized = normalized + path.sep;
  }

  return normalized;
}

/**
 * Convert an absolute path to a forward-slash relative path
 *
 * @example
 * ```typescript
 * toRelativePath('/home/dev/project/src/Shape.java', '/home/dev/project')
 * // => 'src/Shape.java'
 * ```
 */
export function toRelativePath(absolutePath: string, basePath: string): string {
  const relativePath = path.relative(
    normalizePath(basePath),
    normalizePath(absolutePath)
  );
  return relativePath.replace(/\\/g, '/');
}

/**
 * Convert a forward-slash relative path to an absolute, platform-native path
 */
export function toAbsolutePath(relativePath: string, basePath: string): string {
  const platformRelative = relativePath.replace(/\//g, path.sep);
  return path.join(normalizePath(basePath), platformRelative);
}

/**
 * Check if a path is within a directory
 */
export function isWithinDirectory(targetPath: string, directoryPath: string): boolean {
  const normalizedTarget = normalizePath(targetPath);
  const normalizedDir = normalizePath(directoryPath);

  // On Windows, compare case-insensitively
  if (process.platform === 'win32') {
    const lowerTarget = normalizedTarget.toLowerCase();
    const lowerDir = normalizedDir.toLowerCase();
    return lowerTarget === lowerDir || lowerTarget.startsWith(lowerDir + path.sep);
  }

  return normalizedTarget === normalizedDir || normalizedTarget.startsWith(normalizedDir + path.sep);
}

/**
 * Deepest directory containing every path, or null for an empty list
 *
 * @example
 * ```typescript
 * commonDirectory(['/work/app/src/A.java', '/work/app/lib/B.java'])
 * // => '/work/app'
 * ```
 */
export function commonDirectory(filePaths: readonly string[]): string | null {
  const [first, ...rest] = filePaths.map((filePath) =>
    path.dirname(normalizePath(filePath)).split(path.sep)
  );
  if (!first) {
    return null;
  }

  let length = first.length;
  for (const segments of rest) {
    let shared = 0;
    while (shared < length && segments[shared] === first[shared]) {
      shared++;
    }
    length = shared;
  }

  const joined = first.slice(0, length).join(path.sep);
  // Only the filesystem root is shared
  return joined === '' || /^[A-Za-z]:$/.test(joined) ? joined + path.sep : joined;
}

// ============================================================================
// Project Path Helpers
// ============================================================================

/**
 * Get the configuration file path for a project root
 */
export function getConfigPath(projectPath: string): string {
  return path.join(normalizePath(projectPath), CONFIG_FILE_NAME);
}

/**
 * Get the file extension from a path (lowercase, with the dot)
 *
 * @example
 * ```typescript
 * getExtension('src/Main.JAVA')  // => '.java'
 * getExtension('Makefile')       // => ''
 * ```
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

// ============================================================================
// Path Sanitization (for error messages)
// ============================================================================

/**
 * Sanitize a path for display in error messages
 *
 * Paths inside `projectPath` become `./relative`, paths under the home
 * directory become `~/...`.
 *
 * @example
 * ```typescript
 * sanitizePath('/home/john/projects/app/src/Foo.java', '/home/john/projects/app')
 * // => './src/Foo.java'
 * ```
 */
export function sanitizePath(fullPath: string, projectPath?: string): string {
  if (!fullPath) {
    return '<unknown>';
  }

  if (projectPath) {
    const normalizedFull = normalizePath(fullPath);
    const normalizedProject = normalizePath(projectPath);

    if (isWithinDirectory(normalizedFull, normalizedProject)) {
      return `./${toRelativePath(normalizedFull, normalizedProject)}`;
    }
  }

  const normalizedHome = normalizePath(os.homedir());
  const normalizedPath = normalizePath(fullPath);

  if (isWithinDirectory(normalizedPath, normalizedHome)) {
    const relativePath = path.relative(normalizedHome, normalizedPath);
    return '~/' + relativePath.replace(/\\/g, '/');
  }

  return normalizedPath.replace(/\\/g, '/');
}
