import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ErrorCode,
  CohesionError,
  parseFailed,
  fileTooLarge,
  fileNotFound,
  permissionDenied,
  pathNotFound,
  scanFailed,
  parserUnavailable,
  invalidOption,
  isCohesionError,
  getErrnoCode,
} from '../../../src/errors/index.js';
import { getLogger, resetLogger } from '../../../src/utils/logger.js';

describe('Error Handling System', () => {
  beforeEach(() => {
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
  });

  describe('ErrorCode enum', () => {
    it('should have exactly 8 error codes', () => {
      expect(Object.values(ErrorCode)).toEqual([
        'PARSE_FAILED',
        'FILE_TOO_LARGE',
        'FILE_NOT_FOUND',
        'PERMISSION_DENIED',
        'PATH_NOT_FOUND',
        'SCAN_FAILED',
        'PARSER_UNAVAILABLE',
        'INVALID_OPTION',
      ]);
    });
  });

  describe('CohesionError class', () => {
    it('should extend Error and set all properties', () => {
      const cause = new Error('Original error');
      const error = new CohesionError({
        code: ErrorCode.SCAN_FAILED,
        userMessage: 'User message',
        developerMessage: 'Developer message',
        cause,
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CohesionError);
      expect(error.code).toBe(ErrorCode.SCAN_FAILED);
      expect(error.userMessage).toBe('User message');
      expect(error.developerMessage).toBe('Developer message');
      expect(error.message).toBe('Developer message');
      expect(error.cause).toBe(cause);
      expect(error.name).toBe('CohesionError[SCAN_FAILED]');
    });

    it('should serialize to JSON', () => {
      const error = new CohesionError({
        code: ErrorCode.PARSE_FAILED,
        userMessage: 'User',
        developerMessage: 'Dev',
        cause: new TypeError('bad'),
      });

      expect(error.toJSON()).toEqual({
        code: 'PARSE_FAILED',
        userMessage: 'User',
        developerMessage: 'Dev',
        cause: { name: 'TypeError', message: 'bad' },
      });
      expect(error.toString()).toBe('CohesionError[PARSE_FAILED]: Dev');
    });

    it('should log recoverable errors as warnings', () => {
      const logger = getLogger();
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

      fileTooLarge('/opt/shapes/Big.java', 2000, 1000);

      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).not.toHaveBeenCalled();
    });

    it('should log fatal errors as errors', () => {
      const logger = getLogger();
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

      pathNotFound('/opt/shapes/missing');

      expect(error).toHaveBeenCalledWith(
        'CohesionError',
        'Analysis root is missing or not a directory: /opt/shapes/missing',
        expect.objectContaining({ code: 'PATH_NOT_FOUND' })
      );
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('factory functions', () => {
    beforeEach(() => {
      getLogger().setSilentConsole(true);
    });

    it('should mark per-file codes as recoverable', () => {
      expect(parseFailed('/opt/shapes/A.java', 'bad').recoverable).toBe(true);
      expect(fileTooLarge('/opt/shapes/A.java', 2, 1).recoverable).toBe(true);
      expect(fileNotFound('/opt/shapes/A.java').recoverable).toBe(true);
      expect(permissionDenied('/opt/shapes/A.java').recoverable).toBe(false);
      expect(pathNotFound('/opt/shapes').recoverable).toBe(false);
      expect(scanFailed('/opt/shapes', new Error('x')).recoverable).toBe(false);
      expect(parserUnavailable(new Error('x')).recoverable).toBe(false);
      expect(invalidOption('--top', 'x').recoverable).toBe(false);
    });

    it('should include file details in developer messages', () => {
      expect(parseFailed('/opt/shapes/A.java', 'unexpected token').developerMessage).toBe(
        'Failed to parse /opt/shapes/A.java: unexpected token'
      );
      expect(fileTooLarge('/opt/shapes/A.java', 2048, 1024).developerMessage).toBe(
        'File too large: /opt/shapes/A.java (2048 bytes, limit 1024 bytes)'
      );
      expect(scanFailed('/opt/shapes/project', new Error('EMFILE')).developerMessage).toBe(
        'Failed to scan /opt/shapes/project: EMFILE'
      );
    });

    it('should phrase invalid options for users', () => {
      const error = invalidOption('--sort', 'expected one of lcom, wmc, cbo, dit, got "noc"');
      expect(error.code).toBe(ErrorCode.INVALID_OPTION);
      expect(error.userMessage).toBe('Invalid value for --sort: expected one of lcom, wmc, cbo, dit, got "noc"');
    });

    it('should keep the cause of parser failures', () => {
      const cause = new Error('wasm missing');
      const error = parserUnavailable(cause);
      expect(error.cause).toBe(cause);
      expect(error.developerMessage).toBe('Tree-sitter initialization failed: wasm missing');
    });
  });

  describe('isCohesionError', () => {
    it('should distinguish CohesionError from other values', () => {
      getLogger().setSilentConsole(true);
      expect(isCohesionError(fileNotFound('/opt/shapes/A.java'))).toBe(true);
      expect(isCohesionError(new Error('plain'))).toBe(false);
      expect(isCohesionError('string')).toBe(false);
      expect(isCohesionError(null)).toBe(false);
    });
  });

  describe('getErrnoCode', () => {
    it('should read the code of system errors', () => {
      const error = Object.assign(new Error('denied'), { code: 'EACCES' });
      expect(getErrnoCode(error)).toBe('EACCES');
    });

    it('should return undefined otherwise', () => {
      expect(getErrnoCode(new Error('plain'))).toBeUndefined();
      expect(getErrnoCode({ code: 'ENOENT' })).toBeUndefined();
      expect(getErrnoCode(undefined)).toBeUndefined();
    });
  });
});
