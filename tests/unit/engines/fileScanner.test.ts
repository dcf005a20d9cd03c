import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  scanFiles,
  toExcludeGlob,
  matchesAnyPattern,
  hasSupportedExtension,
} from '../../../src/engines/fileScanner.js';
import { ErrorCode } from '../../../src/errors/index.js';
import { getLogger, resetLogger } from '../../../src/utils/logger.js';
import { normalizePath } from '../../../src/utils/paths.js';

function writeFile(root: string, relativePath: string, content = ''): void {
  const fullPath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
}

describe('File Scanner', () => {
  let root: string;

  beforeEach(() => {
    resetLogger();
    getLogger().setSilentConsole(true);
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'oo-cohesion-scan-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    resetLogger();
  });

  describe('toExcludeGlob', () => {
    it('should expand directory patterns to any depth', () => {
      expect(toExcludeGlob('vendor/')).toBe('**/vendor/**');
      expect(toExcludeGlob('**/gen/')).toBe('**/gen/**');
    });

    it('should leave file patterns unchanged', () => {
      expect(toExcludeGlob('**/*.pb.go')).toBe('**/*.pb.go');
      expect(toExcludeGlob('src/Legacy.java')).toBe('src/Legacy.java');
    });
  });

  describe('matchesAnyPattern', () => {
    it('should match nested paths against directory globs', () => {
      expect(matchesAnyPattern('lib/vendor/x/Y.java', ['**/vendor/**'])).toBe(true);
      expect(matchesAnyPattern('src/Vendor.java', ['**/vendor/**'])).toBe(false);
    });

    it('should ignore a leading ./', () => {
      expect(matchesAnyPattern('./src/A.java', ['src/*.java'])).toBe(true);
    });

    it('should match dot directories', () => {
      expect(matchesAnyPattern('.git/hooks/pre-commit.py', ['**/.git/**'])).toBe(true);
    });

    it('should return false for an empty pattern list', () => {
      expect(matchesAnyPattern('src/A.java', [])).toBe(false);
    });
  });

  describe('hasSupportedExtension', () => {
    it('should accept files with a grammar', () => {
      expect(hasSupportedExtension('src/Shape.java')).toBe(true);
      expect(hasSupportedExtension('lib/shape.PY')).toBe(true);
    });

    it('should reject other files', () => {
      expect(hasSupportedExtension('README.md')).toBe(false);
      expect(hasSupportedExtension('Makefile')).toBe(false);
    });
  });

  describe('scanFiles', () => {
    it('should return supported files sorted by relative path', async () => {
      writeFile(root, 'src/geo/Circle.py');
      writeFile(root, 'src/Shape.java');
      writeFile(root, 'README.md');
      writeFile(root, 'notes.txt');

      const files = await scanFiles(root, { include: ['**/*'], exclude: [] });

      const base = normalizePath(root);
      expect(files).toEqual([
        path.join(base, 'src', 'Shape.java'),
        path.join(base, 'src', 'geo', 'Circle.py'),
      ]);
    });

    it('should skip hardcoded excluded directories', async () => {
      writeFile(root, 'src/App.ts');
      writeFile(root, 'node_modules/pkg/index.js');
      writeFile(root, 'vendor/lib/Util.java');
      writeFile(root, 'packages/core/dist/bundle.js');
      writeFile(root, '.git/hooks/update.py');

      const files = await scanFiles(root, { include: ['**/*'], exclude: [] });

      expect(files).toEqual([path.join(normalizePath(root), 'src', 'App.ts')]);
    });

    it('should apply user excludes', async () => {
      writeFile(root, 'src/App.java');
      writeFile(root, 'src/gen/Generated.java');
      writeFile(root, 'src/Legacy.java');

      const files = await scanFiles(root, {
        include: ['**/*'],
        exclude: ['gen/', 'src/Legacy.java'],
      });

      expect(files).toEqual([path.join(normalizePath(root), 'src', 'App.java')]);
    });

    it('should honor include patterns', async () => {
      writeFile(root, 'src/App.java');
      writeFile(root, 'scripts/tool.py');

      const files = await scanFiles(root, { include: ['src/**'], exclude: [] });

      expect(files).toEqual([path.join(normalizePath(root), 'src', 'App.java')]);
    });

    it('should return an empty list for an empty directory', async () => {
      await expect(scanFiles(root, { include: ['**/*'], exclude: [] })).resolves.toEqual([]);
    });

    it('should reject a missing root with PATH_NOT_FOUND', async () => {
      await expect(
        scanFiles(path.join(root, 'missing'), { include: ['**/*'], exclude: [] })
      ).rejects.toMatchObject({ code: ErrorCode.PATH_NOT_FOUND });
    });

    it('should reject a file given as root', async () => {
      writeFile(root, 'Shape.java');

      await expect(
        scanFiles(path.join(root, 'Shape.java'), { include: ['**/*'], exclude: [] })
      ).rejects.toMatchObject({ code: ErrorCode.PATH_NOT_FOUND });
    });
  });
});
