/**
 * Inheritance Graph
 *
 * Phase 1 of an analysis: every file contributes `ClassFact`s, which are
 * then folded into one immutable graph answering depth (DIT) and breadth
 * (NOC) queries.
 *
 * Classes are keyed by simple name. When a name is declared in more than
 * one file the last fact folded in wins for `parentsOf`; children lists
 * still collect every distinct child.
 *
 * @module inheritanceGraph
 */

import { type SyntaxNode, walk, getNameText } from './astUtils.js';
import { getLanguageCapabilities, extractParentNames } from './languageCapabilities.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One class declaration and the parents it names
 */
export interface ClassFact {
  className: string;
  /** Source order, multiple entries for multiple inheritance */
  parents: string[];
  file: string;
}

/**
 * Outcome of one DIT branch: a depth, or the classes on the current path
 * that the branch cycles back to
 */
type DepthResult = number | ReadonlySet<string>;

// ============================================================================
// Fact Extraction
// ============================================================================

/**
 * Collect a fact for every named class-like node in a file, nested
 * classes included
 */
export function extractClassFacts(root: SyntaxNode, language: string, file: string): ClassFact[] {
  const capabilities = getLanguageCapabilities(language);
  const facts: ClassFact[] = [];

  if (capabilities.classNodeTypes.length === 0) {
    return facts;
  }

  walk(root, (node) => {
    if (capabilities.classNodeTypes.includes(node.type)) {
      const className = getNameText(node);
      if (className) {
        facts.push({
          className,
          parents: extractParentNames(node, language),
          file,
        });
      }
    }
    return true;
  });

  return facts;
}

// ============================================================================
// InheritanceGraph Class
// ============================================================================

/**
 * Read-only parent/child index over all classes of a project
 *
 * @example
 * ```typescript
 * const graph = InheritanceGraph.fromFacts([
 *   { className: 'Animal', parents: [], file: 'Animal.java' },
 *   { className: 'Dog', parents: ['Animal'], file: 'Dog.java' },
 * ]);
 * graph.getDIT('Dog'); // 1
 * graph.getNOC('Animal'); // 1
 * ```
 */
export class InheritanceGraph {
  private readonly parentsOf: ReadonlyMap<string, readonly string[]>;
  private readonly childrenOf: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(
    parentsOf: Map<string, readonly string[]>,
    childrenOf: Map<string, Set<string>>
  ) {
    this.parentsOf = parentsOf;
    this.childrenOf = childrenOf;
  }

  /**
   * Fold facts into a graph (single pass, in the given order)
   */
  static fromFacts(facts: Iterable<ClassFact>): InheritanceGraph {
    const parentsOf = new Map<string, readonly string[]>();
    const childrenOf = new Map<string, Set<string>>();

    for (const fact of facts) {
      parentsOf.set(fact.className, [...fact.parents]);

      for (const parent of fact.parents) {
        let children = childrenOf.get(parent);
        if (!children) {
          children = new Set();
          childrenOf.set(parent, children);
        }
        children.add(fact.className);
      }
    }

    return new InheritanceGraph(parentsOf, childrenOf);
  }

  static empty(): InheritanceGraph {
    return InheritanceGraph.fromFacts([]);
  }

  /**
   * Depth of inheritance: longest parent chain up to a root
   *
   * Unknown classes, classes without parents and undeclared parents have
   * depth 0. A parent that is already on the current path closes a cycle
   * and that branch is ignored. A class whose every branch cycles back to
   * itself lies on the cycle and has depth 0. Descendants of such a class
   * count it as a root, so `C extends A` with `A <-> B` has depth 1.
   */
  getDIT(className: string): number {
    const depth = this.calculateDepth(className, new Set());
    return typeof depth === 'number' ? depth : 0;
  }

  private calculateDepth(className: string, path: Set<string>): DepthResult {
    const parents = this.parentsOf.get(className);
    if (!parents || parents.length === 0) {
      return 0;
    }

    path.add(className);

    let best = -1;
    const closesAt = new Set<string>();
    for (const parent of parents) {
      if (path.has(parent)) {
        closesAt.add(parent);
        continue;
      }
      const result = this.calculateDepth(parent, path);
      if (typeof result === 'number') {
        best = Math.max(best, result + 1);
      } else {
        for (const name of result) closesAt.add(name);
      }
    }

    path.delete(className);

    if (best >= 0) {
      return best;
    }
    // Cycles closing here stop here; the rest belong to classes further down the path
    closesAt.delete(className);
    return closesAt.size > 0 ? closesAt : 0;
  }

  /**
   * Number of direct children
   */
  getNOC(className: string): number {
    return this.childrenOf.get(className)?.size ?? 0;
  }

  getParents(className: string): readonly string[] {
    return this.parentsOf.get(className) ?? [];
  }

  /**
   * Direct children in the order they were first seen
   */
  getChildren(className: string): string[] {
    return Array.from(this.childrenOf.get(className) ?? []);
  }

  has(className: string): boolean {
    return this.parentsOf.has(className);
  }

  /** Number of declared classes */
  get size(): number {
    return this.parentsOf.size;
  }
}
