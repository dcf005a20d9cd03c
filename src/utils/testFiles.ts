/**
 * Test File Detection
 *
 * Naming-convention heuristic used to keep test code out of an analysis.
 */

import * as path from 'node:path';
import { toRelativePath } from './paths.js';

const TEST_SUFFIXES = [
  '_test.go',
  '_test.py',
  '.test.ts', '.test.js', '.test.tsx', '.test.jsx',
  '.spec.ts', '.spec.js', '.spec.tsx', '.spec.jsx',
  '_test.rb', '_spec.rb',
  'Test.java',
  'Tests.cs', 'Test.cs',
];

const TEST_DIRECTORIES = ['tests', 'test', '__tests__', 'spec'];

/**
 * Check if a path looks like a test file
 *
 * Directory names are only matched below `projectRoot` when one is given,
 * so a checkout under `/home/dev/test/` does not turn every file into a
 * test.
 *
 * @example
 * ```typescript
 * isTestFile('src/shapes/CircleTest.java')  // => true
 * isTestFile('pkg/test_models.py')          // => true
 * isTestFile('src/Circle.java')             // => false
 * isTestFile('/home/dev/test/app/src/Circle.java', '/home/dev/test/app')  // => false
 * ```
 */
export function isTestFile(filePath: string, projectRoot?: string): boolean {
  const scoped = projectRoot ? toRelativePath(filePath, projectRoot) : filePath;
  const normalized = scoped.replace(/\\/g, '/');
  const base = path.posix.basename(normalized);

  if (TEST_SUFFIXES.some((suffix) => normalized.endsWith(suffix))) {
    return true;
  }

  // test_*.py, test_*.rb and friends
  if (base.startsWith('test_')) {
    return true;
  }

  if (base.startsWith('Test') && base.endsWith('.java')) {
    return true;
  }

  const directories = normalized.split('/').slice(0, -1);
  return directories.some((segment) => TEST_DIRECTORIES.includes(segment));
}
