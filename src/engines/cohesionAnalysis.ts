/**
 * Cohesion Analysis Model
 *
 * Result types of a project analysis together with the pure summary and
 * ordering functions applied to them.
 *
 * @module cohesionAnalysis
 */

import type { ClassMetrics } from './classMetrics.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Why a file contributed nothing to an analysis
 */
export type SkipReason = 'parse_error' | 'read_error' | 'too_large';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  message: string;
}

export interface CohesionSummary {
  totalClasses: number;
  /** Distinct files with at least one class */
  totalFiles: number;
  avgWMC: number;
  avgCBO: number;
  avgRFC: number;
  avgLCOM: number;
  maxWMC: number;
  maxCBO: number;
  maxRFC: number;
  maxLCOM: number;
  maxDIT: number;
  /** Classes with LCOM > 1 */
  lowCohesionCount: number;
}

export interface CohesionAnalysis {
  readonly generatedAt: Date;
  readonly classes: readonly ClassMetrics[];
  readonly summary: CohesionSummary;
  readonly skippedFiles: readonly SkippedFile[];
}

export type SortKey = 'lcom' | 'wmc' | 'cbo' | 'dit';

export const SORT_KEYS: readonly SortKey[] = ['lcom', 'wmc', 'cbo', 'dit'];

// ============================================================================
// Summary
// ============================================================================

/**
 * Aggregate statistics; all zero for an empty class list
 */
export function calculateSummary(classes: readonly ClassMetrics[]): CohesionSummary {
  const summary: CohesionSummary = {
    totalClasses: 0,
    totalFiles: 0,
    avgWMC: 0,
    avgCBO: 0,
    avgRFC: 0,
    avgLCOM: 0,
    maxWMC: 0,
    maxCBO: 0,
    maxRFC: 0,
    maxLCOM: 0,
    maxDIT: 0,
    lowCohesionCount: 0,
  };

  if (classes.length === 0) {
    return summary;
  }

  const files = new Set<string>();
  let totalWMC = 0;
  let totalCBO = 0;
  let totalRFC = 0;
  let totalLCOM = 0;

  for (const cls of classes) {
    files.add(cls.path);
    totalWMC += cls.wmc;
    totalCBO += cls.cbo;
    totalRFC += cls.rfc;
    totalLCOM += cls.lcom;

    summary.maxWMC = Math.max(summary.maxWMC, cls.wmc);
    summary.maxCBO = Math.max(summary.maxCBO, cls.cbo);
    summary.maxRFC = Math.max(summary.maxRFC, cls.rfc);
    summary.maxLCOM = Math.max(summary.maxLCOM, cls.lcom);
    summary.maxDIT = Math.max(summary.maxDIT, cls.dit);

    if (cls.lcom > 1) {
      summary.lowCohesionCount++;
    }
  }

  const n = classes.length;
  summary.totalClasses = n;
  summary.totalFiles = files.size;
  summary.avgWMC = totalWMC / n;
  summary.avgCBO = totalCBO / n;
  summary.avgRFC = totalRFC / n;
  summary.avgLCOM = totalLCOM / n;

  return summary;
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Stable descending sort by one metric; ties keep their input order
 */
export function sortClasses(
  classes: readonly ClassMetrics[],
  key: SortKey
): ClassMetrics[] {
  return [...classes].sort((a, b) => b[key] - a[key]);
}

function withOrder(analysis: CohesionAnalysis, key: SortKey): CohesionAnalysis {
  return { ...analysis, classes: sortClasses(analysis.classes, key) };
}

/** Least cohesive first (the default order) */
export function sortByLCOM(analysis: CohesionAnalysis): CohesionAnalysis {
  return withOrder(analysis, 'lcom');
}

/** Most complex first */
export function sortByWMC(analysis: CohesionAnalysis): CohesionAnalysis {
  return withOrder(analysis, 'wmc');
}

/** Most coupled first */
export function sortByCBO(analysis: CohesionAnalysis): CohesionAnalysis {
  return withOrder(analysis, 'cbo');
}

/** Deepest inheritance first */
export function sortByDIT(analysis: CohesionAnalysis): CohesionAnalysis {
  return withOrder(analysis, 'dit');
}

export function sortAnalysis(analysis: CohesionAnalysis, key: SortKey): CohesionAnalysis {
  return withOrder(analysis, key);
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}
