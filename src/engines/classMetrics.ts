/**
 * Per-Class Metrics Extractor
 *
 * Phase 2 of an analysis: computes the CK suite for one class node.
 * CBO and RFC are syntactic: names are matched by node shape, never
 * resolved against a symbol table.
 *
 * @module classMetrics
 */

import { type SyntaxNode, walk, getNameText, isPrimitiveType } from './astUtils.js';
import { getLanguageCapabilities, type LanguageCapabilities } from './languageCapabilities.js';
import { calculateComplexity, calculateLCOM4, type MethodFacts } from './cohesionCalculator.js';
import type { InheritanceGraph } from './inheritanceGraph.js';

// ============================================================================
// Types
// ============================================================================

/**
 * CK metrics for one class
 */
export interface ClassMetrics {
  readonly path: string;
  readonly className: string;
  readonly language: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly loc: number;
  readonly methods: readonly string[];
  readonly fields: readonly string[];
  readonly coupledClasses: readonly string[];
  /** Weighted Methods per Class */
  readonly wmc: number;
  /** Coupling Between Objects */
  readonly cbo: number;
  /** Response For a Class */
  readonly rfc: number;
  /** Lack of Cohesion of Methods (LCOM4) */
  readonly lcom: number;
  /** Depth of Inheritance Tree */
  readonly dit: number;
  /** Number of Children */
  readonly noc: number;
  /** Number of methods */
  readonly nom: number;
  /** Number of fields */
  readonly nof: number;
}

/**
 * Where the class node comes from
 */
export interface ClassContext {
  path: string;
  language: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Call-like node shapes across grammars */
const CALL_NODE_TYPES: ReadonlySet<string> = new Set([
  'call_expression',
  'method_invocation',
  'invocation_expression',
  'call',
  'method_call',
  'function_call_expression',
  'member_call_expression',
  'scoped_call_expression',
]);

/** Child fields naming the callee */
const CALLEE_FIELDS = ['function', 'name', 'method'] as const;

/** Node types treated as references to another type */
const TYPE_REFERENCE_TYPES: ReadonlySet<string> = new Set([
  'type_identifier',
  'class_type',
  'simple_type',
  'named_type',
  'type_name',
  'identifier',
  'constant',
]);

// ============================================================================
// Extraction Steps
// ============================================================================

/**
 * Fields declared in the class subtree, one entry per occurrence
 */
export function extractFields(classNode: SyntaxNode, capabilities: LanguageCapabilities): string[] {
  const fields: string[] = [];

  walk(classNode, (node) => {
    if (capabilities.fieldNodeTypes.includes(node.type)) {
      fields.push(...capabilities.fieldNames(node));
    }
    return true;
  });

  return fields;
}

/**
 * Fields referenced by a method body, through self/this accesses and,
 * where the language allows it, bare identifiers naming a declared field
 */
export function findUsedFields(
  methodNode: SyntaxNode,
  capabilities: LanguageCapabilities,
  declaredFields: ReadonlySet<string>
): Set<string> {
  const used = new Set<string>();
  const body = methodNode.childForFieldName('body');
  // Bare names in a signature are parameters, not field uses
  const implicit = capabilities.implicitFieldAccess && body !== null;

  walk(body ?? methodNode, (node) => {
    const accessed = capabilities.fieldAccess(node);
    if (accessed) {
      used.add(accessed);
    } else if (
      implicit &&
      node.type === 'identifier' &&
      declaredFields.has(node.text)
    ) {
      used.add(node.text);
    }
    return true;
  });

  return used;
}

/**
 * Methods of the class; nested functions inside a method are not methods
 */
export function extractMethods(
  classNode: SyntaxNode,
  capabilities: LanguageCapabilities,
  declaredFields: ReadonlySet<string>
): MethodFacts[] {
  const methods: MethodFacts[] = [];

  walk(classNode, (node) => {
    if (!capabilities.methodNodeTypes.includes(node.type)) {
      return true;
    }

    const name = capabilities.methodName(node);
    if (name) {
      methods.push({
        name,
        cyclomaticComplexity: calculateComplexity(node),
        usedFields: findUsedFields(node, capabilities, declaredFields),
      });
    }
    return false;
  });

  return methods;
}

/**
 * Distinct callee names in the class subtree, in first-seen order
 */
export function extractCalledNames(classNode: SyntaxNode): string[] {
  const called = new Set<string>();

  walk(classNode, (node) => {
    if (CALL_NODE_TYPES.has(node.type)) {
      for (const field of CALLEE_FIELDS) {
        const callee = node.childForFieldName(field);
        if (callee) called.add(callee.text);
      }
    }
    return true;
  });

  return Array.from(called);
}

/**
 * Distinct type-like names in the class subtree, in first-seen order
 *
 * Primitives and single-character names are excluded.
 */
export function extractCoupledClasses(classNode: SyntaxNode): string[] {
  const coupled = new Set<string>();

  walk(classNode, (node) => {
    if (TYPE_REFERENCE_TYPES.has(node.type)) {
      const name = node.text;
      if (name.length > 1 && !isPrimitiveType(name)) {
        coupled.add(name);
      }
    }
    return true;
  });

  return Array.from(coupled);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Compute the CK metrics of one class node
 *
 * @param classNode - A node of one of the language's class node types
 * @param context - File path and language tag
 * @param graph - Project inheritance graph (DIT/NOC lookups)
 */
export function extractClassMetrics(
  classNode: SyntaxNode,
  context: ClassContext,
  graph: InheritanceGraph
): ClassMetrics {
  const capabilities = getLanguageCapabilities(context.language);
  const className = getNameText(classNode);
  const startLine = classNode.startPosition.row + 1;
  const endLine = classNode.endPosition.row + 1;

  const fields = extractFields(classNode, capabilities);
  const methods = extractMethods(classNode, capabilities, new Set(fields));
  const calledNames = extractCalledNames(classNode);
  const coupledClasses = extractCoupledClasses(classNode);

  const wmc = methods.reduce((sum, method) => sum + method.cyclomaticComplexity, 0);

  return {
    path: context.path,
    className,
    language: context.language,
    startLine,
    endLine,
    loc: endLine - startLine + 1,
    methods: methods.map((method) => method.name),
    fields,
    coupledClasses,
    wmc,
    cbo: coupledClasses.length,
    rfc: methods.length + calledNames.length,
    lcom: calculateLCOM4(methods, fields),
    dit: graph.getDIT(className),
    noc: graph.getNOC(className),
    nom: methods.length,
    nof: fields.length,
  };
}
