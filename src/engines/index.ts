/**
 * Core Analysis Engines
 *
 * Exports all analysis engines:
 * - treeSitterParser: Source parsing
 * - languageCapabilities: Per-language node tables
 * - inheritanceGraph: Cross-file parent/child relations
 * - classMetrics: Per-class CK metrics
 * - cohesionAnalyzer: Two-phase project analysis
 * - fileScanner: Source file discovery
 */

// Parser
export {
  type ASTLanguage,
  type ParsedFile,
  TreeSitterParser,
  getTreeSitterParser,
  getASTLanguage,
} from './treeSitterParser.js';

// AST Helpers
export {
  type Point,
  type SyntaxNode,
  type NodeVisitor,
  walk,
  getChildren,
  getNamedChildren,
  getNodeText,
  childByFieldName,
  getNameText,
  cleanTypeName,
  unqualifiedName,
  isPrimitiveType,
} from './astUtils.js';

// Language Capabilities
export {
  type OOLanguage,
  type LanguageCapabilities,
  type ClassNodeInfo,
  isOOLanguage,
  getLanguageCapabilities,
  getOOLanguages,
  getClasses,
  extractParentNames,
} from './languageCapabilities.js';

// Cohesion Calculator
export {
  type MethodFacts,
  calculateComplexity,
  calculateLCOM4,
} from './cohesionCalculator.js';

// Inheritance Graph
export {
  type ClassFact,
  extractClassFacts,
  InheritanceGraph,
} from './inheritanceGraph.js';

// Class Metrics
export {
  type ClassMetrics,
  type ClassContext,
  extractFields,
  findUsedFields,
  extractMethods,
  extractCalledNames,
  extractCoupledClasses,
  extractClassMetrics,
} from './classMetrics.js';

// Analysis Model
export {
  type SkipReason,
  type SkippedFile,
  type CohesionSummary,
  type CohesionAnalysis,
  type SortKey,
  SORT_KEYS,
  calculateSummary,
  sortClasses,
  sortByLCOM,
  sortByWMC,
  sortByCBO,
  sortByDIT,
  sortAnalysis,
  isSortKey,
} from './cohesionAnalysis.js';

// Analyzer
export {
  type ParsedSource,
  type SourceParser,
  type CohesionAnalyzerOptions,
  type AnalysisProgress,
  type AnalysisProgressCallback,
  createTreeSitterSource,
  CohesionAnalyzer,
  createCohesionAnalyzer,
} from './cohesionAnalyzer.js';

// File Scanner
export {
  toExcludeGlob,
  matchesAnyPattern,
  hasSupportedExtension,
  scanFiles,
} from './fileScanner.js';
