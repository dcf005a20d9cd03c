/**
 * Tree-sitter Parser Module
 *
 * Provides AST parsing using web-tree-sitter (WASM-based) for
 * cross-platform compatibility. Language grammars are loaded lazily from
 * tree-sitter-wasms and cached for the life of the parser.
 *
 * @module treeSitterParser
 */

import * as TreeSitter from 'web-tree-sitter';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { createRequire } from 'node:module';
import { getLogger } from '../utils/logger.js';
import { getExtension } from '../utils/paths.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import {
  parseFailed,
  fileNotFound,
  permissionDenied,
  parserUnavailable,
  getErrnoCode,
} from '../errors/index.js';

export type { Tree, Node, Language } from 'web-tree-sitter';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Languages the parser can load a grammar for
 */
export type ASTLanguage =
  | 'javascript'
  | 'typescript'
  | 'tsx'
  | 'python'
  | 'go'
  | 'java'
  | 'rust'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'ruby'
  | 'php';

interface LanguageConfig {
  /** Language name for loading grammar */
  language: ASTLanguage;
  /** WASM file name */
  wasmFile: string;
}

/**
 * A successfully parsed source file. The caller owns `tree` and must
 * `delete()` it when done.
 */
export interface ParsedFile {
  tree: TreeSitter.Tree;
  language: ASTLanguage;
  source: string;
}

// ============================================================================
// Constants
// ============================================================================

const EXTENSION_TO_LANGUAGE: Record<string, LanguageConfig> = {
  // JavaScript
  '.js': { language: 'javascript', wasmFile: 'tree-sitter-javascript.wasm' },
  '.mjs': { language: 'javascript', wasmFile: 'tree-sitter-javascript.wasm' },
  '.cjs': { language: 'javascript', wasmFile: 'tree-sitter-javascript.wasm' },
  '.jsx': { language: 'javascript', wasmFile: 'tree-sitter-javascript.wasm' },

  // TypeScript
  '.ts': { language: 'typescript', wasmFile: 'tree-sitter-typescript.wasm' },
  '.mts': { language: 'typescript', wasmFile: 'tree-sitter-typescript.wasm' },
  '.cts': { language: 'typescript', wasmFile: 'tree-sitter-typescript.wasm' },
  '.tsx': { language: 'tsx', wasmFile: 'tree-sitter-tsx.wasm' },

  // Python
  '.py': { language: 'python', wasmFile: 'tree-sitter-python.wasm' },
  '.pyi': { language: 'python', wasmFile: 'tree-sitter-python.wasm' },

  // Go
  '.go': { language: 'go', wasmFile: 'tree-sitter-go.wasm' },

  // Java
  '.java': { language: 'java', wasmFile: 'tree-sitter-java.wasm' },

  // Rust
  '.rs': { language: 'rust', wasmFile: 'tree-sitter-rust.wasm' },

  // C
  '.c': { language: 'c', wasmFile: 'tree-sitter-c.wasm' },
  '.h': { language: 'c', wasmFile: 'tree-sitter-c.wasm' },

  // C++
  '.cpp': { language: 'cpp', wasmFile: 'tree-sitter-cpp.wasm' },
  '.cc': { language: 'cpp', wasmFile: 'tree-sitter-cpp.wasm' },
  '.cxx': { language: 'cpp', wasmFile: 'tree-sitter-cpp.wasm' },
  '.hpp': { language: 'cpp', wasmFile: 'tree-sitter-cpp.wasm' },
  '.hxx': { language: 'cpp', wasmFile: 'tree-sitter-cpp.wasm' },

  // C#
  '.cs': { language: 'csharp', wasmFile: 'tree-sitter-c_sharp.wasm' },

  // Ruby
  '.rb': { language: 'ruby', wasmFile: 'tree-sitter-ruby.wasm' },

  // PHP
  '.php': { language: 'php', wasmFile: 'tree-sitter-php.wasm' },
};

/** Runtime wasm names across web-tree-sitter releases */
const RUNTIME_WASM_CANDIDATES = [
  'tree-sitter.wasm',
  'web-tree-sitter.wasm',
  'lib/tree-sitter.wasm',
  'lib/web-tree-sitter.wasm',
];

const GRAMMAR_DIR_CANDIDATES = ['out'];

// ============================================================================
// Package Files
// ============================================================================

const requireFromHere = createRequire(import.meta.url);

function readPackageName(packageJsonPath: string): string | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && typeof parsed.name === 'string') {
      return parsed.name;
    }
  } catch {
    // Unreadable manifest is treated as a foreign directory
    return null;
  }
  return null;
}

/**
 * Root directory of an installed package, as Node's resolver sees it
 *
 * Packages whose `exports` hide package.json are found from their main
 * entry by walking up to the directory whose manifest carries the name.
 */
export function resolvePackageRoot(packageName: string): string | null {
  try {
    return path.dirname(requireFromHere.resolve(`${packageName}/package.json`));
  } catch {
    // Hidden by exports or not installed; try the main entry
  }

  let entry: string;
  try {
    entry = requireFromHere.resolve(packageName);
  } catch {
    return null;
  }

  let dir = path.dirname(entry);
  while (dir !== path.dirname(dir)) {
    const manifest = path.join(dir, 'package.json');
    if (fs.existsSync(manifest) && readPackageName(manifest) === packageName) {
      return dir;
    }
    dir = path.dirname(dir);
  }
  return null;
}

/**
 * First existing file among `candidates`, relative to an installed package
 *
 * @returns Absolute path, or null when the package or every candidate is missing
 */
export function locatePackageFile(packageName: string, candidates: readonly string[]): string | null {
  const root = resolvePackageRoot(packageName);
  const roots = root ? [root] : [];
  roots.push(path.join(process.cwd(), 'node_modules', packageName));

  for (const base of roots) {
    for (const candidate of candidates) {
      const fullPath = path.join(base, candidate);
      if (fs.existsSync(fullPath)) {
        return fullPath;
      }
    }
  }

  getLogger().warn('treeSitterParser', 'Could not locate package file', { packageName, candidates, roots });
  return null;
}

// ============================================================================
// TreeSitterParser Class
// ============================================================================

/**
 * Tree-sitter parser wrapper with lazy loading and caching
 *
 * `setLanguage` and `parse` always run in one synchronous segment, so a
 * single instance can be shared by concurrent async workers. Grammar loads
 * are serialized and shared: concurrent callers of one language await the
 * same load.
 *
 * @example
 * ```typescript
 * const parser = getTreeSitterParser();
 * await parser.initialize();
 * const parsed = await parser.parseFile('src/Shape.java');
 * ```
 */
export class TreeSitterParser {
  private static instance: TreeSitterParser | null = null;
  private parser: TreeSitter.Parser | null = null;
  private grammarLoads: Map<ASTLanguage, Promise<TreeSitter.Language>> = new Map();
  private readonly loadMutex = new AsyncMutex('treeSitterParser');
  private initialized: boolean = false;
  private initializing: Promise<void> | null = null;
  private wasmBasePath: string | null = null;

  private constructor() {}

  static getInstance(): TreeSitterParser {
    if (!TreeSitterParser.instance) {
      TreeSitterParser.instance = new TreeSitterParser();
    }
    return TreeSitterParser.instance;
  }

  /**
   * Initialize the parser (must be called before parsing)
   *
   * Idempotent. Throws PARSER_UNAVAILABLE when the runtime cannot load.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    if (this.initializing) {
      return this.initializing;
    }

    const logger = getLogger();

    this.initializing = (async () => {
      try {
        const wasmPath = locatePackageFile('web-tree-sitter', RUNTIME_WASM_CANDIDATES);
        if (!wasmPath) {
          throw new Error('Could not find web-tree-sitter WASM file');
        }

        logger.debug('treeSitterParser', 'Initializing web-tree-sitter', { wasmPath });

        await TreeSitter.Parser.init({
          locateFile: (file: string) => {
            if (file === 'tree-sitter.wasm' || file === 'web-tree-sitter.wasm') {
              return wasmPath;
            }
            return file;
          },
        });

        this.parser = new TreeSitter.Parser();
        this.initialized = true;

        logger.debug('treeSitterParser', 'Tree-sitter parser initialized successfully');
      } catch (error) {
        this.initializing = null;
        const cause = error instanceof Error ? error : new Error(String(error));
        throw parserUnavailable(cause);
      }
    })();

    return this.initializing;
  }

  private findWasmBasePath(): string | null {
    if (!this.wasmBasePath) {
      this.wasmBasePath = locatePackageFile('tree-sitter-wasms', GRAMMAR_DIR_CANDIDATES);
    }
    return this.wasmBasePath;
  }

  /**
   * Load a language grammar, once per language
   *
   * A failed load is forgotten so a later call retries it.
   *
   * @throws Error when the grammar file is missing or fails to load
   */
  private loadLanguage(language: ASTLanguage): Promise<TreeSitter.Language> {
    const pending = this.grammarLoads.get(language);
    if (pending) {
      return pending;
    }

    const load = this.loadMutex
      .withLock(() => this.loadGrammarFile(language))
      .catch((error: unknown) => {
        this.grammarLoads.delete(language);
        throw error;
      });
    this.grammarLoads.set(language, load);
    return load;
  }

  private async loadGrammarFile(language: ASTLanguage): Promise<TreeSitter.Language> {
    const config = Object.values(EXTENSION_TO_LANGUAGE).find((c) => c.language === language);
    if (!config) {
      throw new Error(`No grammar registered for ${language}`);
    }

    const basePath = this.findWasmBasePath();
    if (!basePath) {
      throw new Error('Could not find the tree-sitter-wasms grammar directory');
    }

    const wasmPath = path.join(basePath, config.wasmFile);
    await fs.promises.access(wasmPath);
    const grammar = await TreeSitter.Language.load(wasmPath);

    getLogger().debug('treeSitterParser', 'Loaded language grammar', { language, wasmPath });
    return grammar;
  }

  /**
   * Parse source code
   *
   * @param sourceCode - Source code to parse
   * @param filePath - File path (used for language detection)
   * @returns The parsed file, or null when the extension has no grammar
   * @throws CohesionError PARSE_FAILED when the grammar cannot be loaded or fails on the source
   */
  async parse(sourceCode: string, filePath: string): Promise<ParsedFile | null> {
    if (!this.initialized || !this.parser) {
      await this.initialize();
    }

    const language = this.getLanguage(filePath);
    if (!language) {
      return null;
    }

    let grammar: TreeSitter.Language;
    try {
      grammar = await this.loadLanguage(language);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw parseFailed(filePath, `grammar for ${language} unavailable: ${cause.message}`, cause);
    }

    const parser = this.parser;
    if (!parser) {
      throw parseFailed(filePath, 'parser was released during parsing');
    }

    let tree: TreeSitter.Tree | null;
    try {
      parser.setLanguage(grammar);
      tree = parser.parse(sourceCode);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw parseFailed(filePath, cause.message, cause);
    }

    if (!tree) {
      throw parseFailed(filePath, 'parser returned no tree');
    }

    return { tree, language, source: sourceCode };
  }

  /**
   * Read and parse a file from disk
   *
   * @throws CohesionError FILE_NOT_FOUND or PERMISSION_DENIED on read errors
   */
  async parseFile(filePath: string): Promise<ParsedFile | null> {
    if (!this.isSupported(filePath)) {
      return null;
    }

    let source: string;
    try {
      source = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const code = getErrnoCode(error);
      if (code === 'EACCES' || code === 'EPERM') {
        throw permissionDenied(filePath, cause);
      }
      throw fileNotFound(filePath, cause);
    }

    return this.parse(source, filePath);
  }

  isSupported(filePath: string): boolean {
    return getExtension(filePath) in EXTENSION_TO_LANGUAGE;
  }

  /**
   * Get the language for a file path
   *
   * @returns Language name or null if not supported
   */
  getLanguage(filePath: string): ASTLanguage | null {
    const config = EXTENSION_TO_LANGUAGE[getExtension(filePath)];
    return config?.language ?? null;
  }

  getSupportedExtensions(): string[] {
    return Object.keys(EXTENSION_TO_LANGUAGE);
  }

  getSupportedLanguages(): ASTLanguage[] {
    const languages = new Set<ASTLanguage>();
    for (const config of Object.values(EXTENSION_TO_LANGUAGE)) {
      languages.add(config.language);
    }
    return Array.from(languages);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Release the parser and cached grammars
   */
  cleanup(): void {
    if (this.parser) {
      this.parser.delete();
      this.parser = null;
    }
    this.grammarLoads.clear();
    this.initialized = false;
    this.initializing = null;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function getTreeSitterParser(): TreeSitterParser {
  return TreeSitterParser.getInstance();
}

/**
 * Get the AST language for a file path
 */
export function getASTLanguage(filePath: string): ASTLanguage | null {
  return TreeSitterParser.getInstance().getLanguage(filePath);
}
