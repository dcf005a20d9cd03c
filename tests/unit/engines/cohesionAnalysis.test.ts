import { describe, it, expect } from 'vitest';
import {
  calculateSummary,
  sortClasses,
  sortByLCOM,
  sortByWMC,
  sortByCBO,
  sortByDIT,
  sortAnalysis,
  isSortKey,
  type CohesionAnalysis,
} from '../../../src/engines/cohesionAnalysis.js';
import type { ClassMetrics } from '../../../src/engines/classMetrics.js';

function metrics(className: string, overrides: Partial<ClassMetrics> = {}): ClassMetrics {
  return {
    path: `src/${className}.java`,
    className,
    language: 'java',
    startLine: 1,
    endLine: 10,
    loc: 10,
    methods: [],
    fields: [],
    coupledClasses: [],
    wmc: 0,
    cbo: 0,
    rfc: 0,
    lcom: 0,
    dit: 0,
    noc: 0,
    nom: 0,
    nof: 0,
    ...overrides,
  };
}

function analysisOf(classes: ClassMetrics[]): CohesionAnalysis {
  return {
    generatedAt: new Date('2026-01-01T00:00:00Z'),
    classes,
    summary: calculateSummary(classes),
    skippedFiles: [],
  };
}

describe('Cohesion Analysis', () => {
  describe('calculateSummary', () => {
    it('should return all zeros for no classes', () => {
      expect(calculateSummary([])).toEqual({
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
      });
    });

    it('should aggregate averages, maxima and the low cohesion count', () => {
      const classes = [
        metrics('Shape', { path: 'src/shapes.java', wmc: 4, cbo: 2, rfc: 6, lcom: 1, dit: 0 }),
        metrics('Circle', { path: 'src/shapes.java', wmc: 8, cbo: 4, rfc: 10, lcom: 3, dit: 1 }),
        metrics('Canvas', { path: 'src/Canvas.java', wmc: 0, cbo: 0, rfc: 2, lcom: 2, dit: 2 }),
      ];

      expect(calculateSummary(classes)).toEqual({
        totalClasses: 3,
        totalFiles: 2,
        avgWMC: 4,
        avgCBO: 2,
        avgRFC: 6,
        avgLCOM: 2,
        maxWMC: 8,
        maxCBO: 4,
        maxRFC: 10,
        maxLCOM: 3,
        maxDIT: 2,
        lowCohesionCount: 2,
      });
    });
  });

  describe('sortClasses', () => {
    const classes = [
      metrics('A', { lcom: 1, wmc: 5, cbo: 1, dit: 2 }),
      metrics('B', { lcom: 3, wmc: 5, cbo: 7, dit: 0 }),
      metrics('C', { lcom: 1, wmc: 9, cbo: 1, dit: 1 }),
      metrics('D', { lcom: 3, wmc: 1, cbo: 2, dit: 2 }),
    ];

    it('should sort descending and keep input order for ties', () => {
      expect(sortClasses(classes, 'lcom').map((c) => c.className)).toEqual(['B', 'D', 'A', 'C']);
      expect(sortClasses(classes, 'wmc').map((c) => c.className)).toEqual(['C', 'A', 'B', 'D']);
      expect(sortClasses(classes, 'cbo').map((c) => c.className)).toEqual(['B', 'D', 'A', 'C']);
      expect(sortClasses(classes, 'dit').map((c) => c.className)).toEqual(['A', 'D', 'C', 'B']);
    });

    it('should not modify the input', () => {
      sortClasses(classes, 'wmc');
      expect(classes.map((c) => c.className)).toEqual(['A', 'B', 'C', 'D']);
    });

    it('should produce the same order on repeated sorts', () => {
      const once = sortClasses(classes, 'lcom');
      expect(sortClasses(once, 'lcom')).toEqual(once);
    });
  });

  describe('analysis ordering', () => {
    const analysis = analysisOf([
      metrics('A', { lcom: 1, wmc: 2, cbo: 9, dit: 0 }),
      metrics('B', { lcom: 2, wmc: 7, cbo: 1, dit: 3 }),
    ]);

    it('should return reordered copies', () => {
      expect(sortByLCOM(analysis).classes.map((c) => c.className)).toEqual(['B', 'A']);
      expect(sortByWMC(analysis).classes.map((c) => c.className)).toEqual(['B', 'A']);
      expect(sortByCBO(analysis).classes.map((c) => c.className)).toEqual(['A', 'B']);
      expect(sortByDIT(analysis).classes.map((c) => c.className)).toEqual(['B', 'A']);
      expect(analysis.classes.map((c) => c.className)).toEqual(['A', 'B']);
    });

    it('should keep summary and timestamp', () => {
      const sorted = sortAnalysis(analysis, 'cbo');
      expect(sorted.summary).toBe(analysis.summary);
      expect(sorted.generatedAt).toBe(analysis.generatedAt);
    });
  });

  describe('isSortKey', () => {
    it('should accept the four metric keys', () => {
      expect(['lcom', 'wmc', 'cbo', 'dit'].every(isSortKey)).toBe(true);
    });

    it('should reject other strings', () => {
      expect(isSortKey('noc')).toBe(false);
      expect(isSortKey('LCOM')).toBe(false);
    });
  });
});
