/**
 * Cohesion Calculator
 *
 * LCOM4 over the method/field usage graph, and the cyclomatic complexity
 * walk used for WMC.
 *
 * @module cohesionCalculator
 */

import { type SyntaxNode, walk } from './astUtils.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Facts collected for one method of a class
 */
export interface MethodFacts {
  name: string;
  /** Always >= 1 */
  cyclomaticComplexity: number;
  /** Field names referenced anywhere in the method body */
  usedFields: ReadonlySet<string>;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Named node types that open a decision, across all supported grammars
 */
const DECISION_NODE_TYPES: ReadonlySet<string> = new Set([
  // if / elif / unless
  'if_statement', 'if_expression', 'if', 'elif_clause', 'else_if_clause',
  'elsif', 'if_modifier', 'unless', 'unless_modifier',
  // loops
  'for_statement', 'for_expression', 'for', 'for_in_statement',
  'enhanced_for_statement', 'foreach_statement', 'for_range_loop',
  'while_statement', 'while_expression', 'while', 'while_modifier',
  'until', 'until_modifier', 'do_statement',
  // switch / match
  'switch_statement', 'switch_expression', 'match_expression',
  'case_clause', 'case_statement', 'switch_case', 'switch_section',
  'switch_block_statement_group', 'switch_rule', 'when',
  // exceptions
  'catch_clause', 'except_clause', 'rescue',
  // ternaries
  'conditional_expression', 'ternary_expression', 'conditional',
]);

/**
 * Short-circuit operator tokens (anonymous nodes)
 */
const LOGICAL_OPERATORS: ReadonlySet<string> = new Set(['&&', '||', 'and', 'or']);

// ============================================================================
// Complexity
// ============================================================================

/**
 * Cyclomatic complexity of a subtree: 1 + one per decision point
 *
 * Keyword tokens such as the anonymous `if` inside an `if_statement` are
 * not counted again; only operator tokens are matched among anonymous nodes.
 */
export function calculateComplexity(node: SyntaxNode): number {
  let complexity = 1;

  walk(node, (n) => {
    if (n.isNamed) {
      if (DECISION_NODE_TYPES.has(n.type)) complexity++;
    } else if (LOGICAL_OPERATORS.has(n.type)) {
      complexity++;
    }
    return true;
  });

  return complexity;
}

// ============================================================================
// LCOM4
// ============================================================================

function sharesField(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  for (const field of smaller) {
    if (larger.has(field)) return true;
  }
  return false;
}

/**
 * LCOM4: connected components of the graph where two methods are joined
 * when their used-field sets intersect
 *
 * - no methods: 0
 * - no fields: one component per method (no pairwise scan)
 */
export function calculateLCOM4(
  methods: readonly MethodFacts[],
  fields: readonly string[]
): number {
  if (methods.length === 0) {
    return 0;
  }
  if (fields.length === 0) {
    return methods.length;
  }

  const n = methods.length;
  const adjacency: number[][] = Array.from({ length: n }, () => []);

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (sharesField(methods[i].usedFields, methods[j].usedFields)) {
        adjacency[i].push(j);
        adjacency[j].push(i);
      }
    }
  }

  const visited = new Array<boolean>(n).fill(false);
  let components = 0;

  for (let start = 0; start < n; start++) {
    if (visited[start]) continue;
    components++;

    // Iterative DFS
    const stack = [start];
    visited[start] = true;
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const neighbor of adjacency[current]) {
        if (!visited[neighbor]) {
          visited[neighbor] = true;
          stack.push(neighbor);
        }
      }
    }
  }

  return components;
}
