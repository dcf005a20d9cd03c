/**
 * Cohesion Analyzer
 *
 * Runs a project analysis in two phases over the same file list:
 *
 * 1. Parse every file and collect class/parent facts, then fold them into
 *    one InheritanceGraph.
 * 2. Parse every file that survived phase 1 again and compute per-class
 *    metrics against the finished graph.
 *
 * Files that are too large or fail to read or parse in phase 1 are left
 * out of both phases and reported in `skippedFiles`.
 *
 * @module cohesionAnalyzer
 */

import { getLogger } from '../utils/logger.js';
import { isTestFile } from '../utils/testFiles.js';
import { commonDirectory } from '../utils/paths.js';
import {
  mapFilesWithSizeLimit,
  getDefaultConcurrency,
  type FileProcessingError,
} from '../utils/fileProcessing.js';
import { isCohesionError, ErrorCode } from '../errors/index.js';
import type { SyntaxNode } from './astUtils.js';
import { getTreeSitterParser, type TreeSitterParser } from './treeSitterParser.js';
import { isOOLanguage, getClasses } from './languageCapabilities.js';
import { InheritanceGraph, extractClassFacts, type ClassFact } from './inheritanceGraph.js';
import { extractClassMetrics, type ClassMetrics } from './classMetrics.js';
import {
  calculateSummary,
  sortClasses,
  type CohesionAnalysis,
  type SkippedFile,
  type SkipReason,
} from './cohesionAnalysis.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A parsed file as seen by the analyzer
 */
export interface ParsedSource {
  language: string;
  root: SyntaxNode;
  /** Free the underlying tree */
  release(): void;
}

/**
 * Parser used by the analyzer. The default is backed by web-tree-sitter.
 */
export interface SourceParser {
  initialize(): Promise<void>;
  getLanguage(filePath: string): string | null;
  /** Null when the file's language has no grammar */
  parseSource(filePath: string): Promise<ParsedSource | null>;
  cleanup(): void;
}

export interface CohesionAnalyzerOptions {
  /** Leave test files out of both phases (default: true) */
  skipTestFiles?: boolean;
  /**
   * Directory test-file conventions are matched under
   * (default: the deepest directory shared by the input files)
   */
  projectRoot?: string;
  /** Maximum file size in bytes, 0 for no limit (default: 0) */
  maxFileSize?: number;
  /** Concurrent files per phase (default: 2 x CPU count) */
  concurrency?: number;
  /** Parser override */
  parser?: SourceParser;
}

export interface AnalysisProgress {
  /** Files finished so far, skipped ones included */
  processed: number;
  total: number;
  path: string;
}

export type AnalysisProgressCallback = (progress: AnalysisProgress) => void;

interface FileFacts {
  file: string;
  facts: ClassFact[];
}

interface FileMetrics {
  file: string;
  classes: ClassMetrics[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Adapt the tree-sitter wrapper to the analyzer's parser interface
 */
export function createTreeSitterSource(parser: TreeSitterParser = getTreeSitterParser()): SourceParser {
  return {
    initialize: () => parser.initialize(),
    getLanguage: (filePath) => parser.getLanguage(filePath),
    parseSource: async (filePath) => {
      const parsed = await parser.parseFile(filePath);
      if (!parsed) return null;
      return {
        language: parsed.language,
        root: parsed.tree.rootNode,
        release: () => parsed.tree.delete(),
      };
    },
    cleanup: () => parser.cleanup(),
  };
}

function toSkipReason(error: Error): SkipReason {
  if (isCohesionError(error)) {
    if (error.code === ErrorCode.FILE_TOO_LARGE) return 'too_large';
    if (error.code === ErrorCode.PARSE_FAILED) return 'parse_error';
  }
  return 'read_error';
}

function toSkippedFile({ path, error }: FileProcessingError): SkippedFile {
  return {
    path,
    reason: toSkipReason(error),
    message: isCohesionError(error) ? error.developerMessage : error.message,
  };
}

/**
 * Order per-file results by the position of their file in the input
 */
function inInputOrder<T extends { file: string }>(items: T[], files: readonly string[]): T[] {
  const position = new Map(files.map((file, index) => [file, index]));
  return [...items].sort(
    (a, b) => (position.get(a.file) ?? 0) - (position.get(b.file) ?? 0)
  );
}

// ============================================================================
// CohesionAnalyzer Class
// ============================================================================

/**
 * CK metrics analyzer for object-oriented source files
 *
 * @example
 * ```typescript
 * const analyzer = createCohesionAnalyzer({ maxFileSize: 1024 * 1024 });
 * try {
 *   const analysis = await analyzer.analyzeProject(files);
 *   console.log(analysis.summary.lowCohesionCount);
 * } finally {
 *   analyzer.close();
 * }
 * ```
 */
export class CohesionAnalyzer {
  private readonly skipTestFiles: boolean;
  private readonly projectRoot: string | undefined;
  private readonly maxFileSize: number;
  private readonly concurrency: number;
  private readonly parser: SourceParser;

  constructor(options: CohesionAnalyzerOptions = {}) {
    this.skipTestFiles = options.skipTestFiles ?? true;
    this.projectRoot = options.projectRoot;
    this.maxFileSize = Math.max(0, options.maxFileSize ?? 0);
    this.concurrency = options.concurrency ?? getDefaultConcurrency();
    this.parser = options.parser ?? createTreeSitterSource();
  }

  async analyzeProject(files: readonly string[]): Promise<CohesionAnalysis> {
    return this.analyzeProjectWithProgress(files);
  }

  /**
   * Analyze `files`, reporting progress once per file during phase 2
   *
   * @throws CohesionError PARSER_UNAVAILABLE when the parser cannot start
   */
  async analyzeProjectWithProgress(
    files: readonly string[],
    onProgress?: AnalysisProgressCallback
  ): Promise<CohesionAnalysis> {
    const logger = getLogger();
    const generatedAt = new Date();

    // Files in languages without classes pass through unanalyzed
    const root = this.projectRoot ?? commonDirectory(files) ?? undefined;
    const candidates = files.filter(
      (file) => this.isObjectOriented(file) && !(this.skipTestFiles && isTestFile(file, root))
    );

    logger.info('CohesionAnalyzer', 'Starting cohesion analysis', {
      files: files.length,
      candidates: candidates.length,
      maxFileSize: this.maxFileSize,
    });

    await this.parser.initialize();

    // Phase 1: inheritance facts
    const phase1 = await mapFilesWithSizeLimit(
      candidates,
      this.maxFileSize,
      (file) => this.collectFacts(file),
      { concurrency: this.concurrency }
    );

    const factsByFile = inInputOrder(phase1.results, candidates);
    const graph = InheritanceGraph.fromFacts(factsByFile.flatMap((entry) => entry.facts));
    const skippedFiles: SkippedFile[] = phase1.errors.map(toSkippedFile);

    logger.debug('CohesionAnalyzer', 'Inheritance graph built', {
      classes: graph.size,
      skipped: skippedFiles.length,
    });

    // Phase 2: per-class metrics
    const survivors = factsByFile.map((entry) => entry.file);
    const total = candidates.length;
    let processed = 0;
    const report = (path: string): void => {
      processed++;
      onProgress?.({ processed, total, path });
    };

    for (const skipped of skippedFiles) {
      report(skipped.path);
    }

    const phase2 = await mapFilesWithSizeLimit(
      survivors,
      0,
      (file) => this.collectMetrics(file, graph),
      { concurrency: this.concurrency, onProgress: report }
    );

    skippedFiles.push(...phase2.errors.map(toSkippedFile));
    skippedFiles.sort((a, b) => a.path.localeCompare(b.path));

    const classes = sortClasses(
      inInputOrder(phase2.results, survivors).flatMap((entry) => entry.classes),
      'lcom'
    );
    const summary = calculateSummary(classes);

    logger.info('CohesionAnalyzer', 'Cohesion analysis complete', {
      classes: summary.totalClasses,
      lowCohesion: summary.lowCohesionCount,
      skipped: skippedFiles.length,
    });

    return { generatedAt, classes, summary, skippedFiles };
  }

  /**
   * Release parser resources
   */
  close(): void {
    this.parser.cleanup();
  }

  private isObjectOriented(file: string): boolean {
    const language = this.parser.getLanguage(file);
    return language !== null && isOOLanguage(language);
  }

  private async collectFacts(file: string): Promise<FileFacts> {
    const parsed = await this.parser.parseSource(file);
    if (!parsed) {
      // The tree-sitter source returns null only for extensions without a grammar
      return { file, facts: [] };
    }

    try {
      return { file, facts: extractClassFacts(parsed.root, parsed.language, file) };
    } finally {
      parsed.release();
    }
  }

  private async collectMetrics(file: string, graph: InheritanceGraph): Promise<FileMetrics> {
    const parsed = await this.parser.parseSource(file);
    if (!parsed) {
      return { file, classes: [] };
    }

    try {
      const context = { path: file, language: parsed.language };
      const classes = getClasses(parsed.root, parsed.language).map((cls) =>
        extractClassMetrics(cls.node, context, graph)
      );
      return { file, classes };
    } finally {
      parsed.release();
    }
  }
}

/**
 * Create an analyzer
 */
export function createCohesionAnalyzer(options: CohesionAnalyzerOptions = {}): CohesionAnalyzer {
  return new CohesionAnalyzer(options);
}
