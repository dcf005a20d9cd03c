/**
 * AST Utilities
 *
 * Structural view of tree-sitter nodes plus the traversal and naming
 * helpers every extractor shares. Extractors depend on `SyntaxNode` only,
 * which web-tree-sitter's `Node` satisfies.
 *
 * @module astUtils
 */

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface Point {
  row: number;
  column: number;
}

/**
 * Minimal read-only view of a syntax tree node
 */
export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly isNamed: boolean;
  readonly childCount: number;
  readonly startPosition: Point;
  readonly endPosition: Point;
  child(index: number): SyntaxNode | null;
  childForFieldName(fieldName: string): SyntaxNode | null;
}

/**
 * Visitor for `walk`. Returning `false` skips the node's children.
 */
export type NodeVisitor = (node: SyntaxNode) => boolean | void;

// ============================================================================
// Constants
// ============================================================================

/**
 * Primitive and keyword tokens that never name a class
 */
const PRIMITIVE_TYPES: ReadonlySet<string> = new Set([
  'int', 'int8', 'int16', 'int32', 'int64',
  'uint', 'uint8', 'uint16', 'uint32', 'uint64',
  'float', 'float32', 'float64', 'double',
  'bool', 'boolean', 'Boolean',
  'string', 'String', 'str',
  'void', 'None', 'null', 'nil',
  'byte', 'char', 'short', 'long',
  'any', 'object', 'Object',
  'number', 'Number',
  'true', 'false',
  'self', 'this', 'super',
]);

// ============================================================================
// Traversal
// ============================================================================

/**
 * Pre-order traversal in source order
 *
 * Uses an explicit stack so deeply nested expressions cannot overflow
 * the call stack.
 */
export function walk(root: SyntaxNode, visit: NodeVisitor): void {
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (visit(node) === false) continue;

    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
  }
}

/**
 * Direct children, named and anonymous
 */
export function getChildren(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child) children.push(child);
  }
  return children;
}

export function getNamedChildren(node: SyntaxNode): SyntaxNode[] {
  return getChildren(node).filter((child) => child.isNamed);
}

export function getNodeText(node: SyntaxNode): string {
  return node.text;
}

export function childByFieldName(node: SyntaxNode, fieldName: string): SyntaxNode | null {
  return node.childForFieldName(fieldName);
}

/**
 * Text of the node's `name` field, or '' when absent
 */
export function getNameText(node: SyntaxNode): string {
  return node.childForFieldName('name')?.text ?? '';
}

// ============================================================================
// Type Names
// ============================================================================

/**
 * Strip generic/template parameters and surrounding whitespace
 *
 * @example
 * ```typescript
 * cleanTypeName('List<String>')       // => 'List'
 * cleanTypeName('ArrayList[String]')  // => 'ArrayList'
 * cleanTypeName('  Foo  ')            // => 'Foo'
 * ```
 */
export function cleanTypeName(name: string): string {
  const cut = name.search(/[<[]/);
  const base = cut === -1 ? name : name.slice(0, cut);
  return base.trim();
}

/**
 * Last segment of a qualified name (`a.b.C`, `ns::C`, `App\C`)
 */
export function unqualifiedName(name: string): string {
  const segments = name.split(/::|\.|\\/);
  return segments[segments.length - 1]?.trim() ?? '';
}

export function isPrimitiveType(name: string): boolean {
  return PRIMITIVE_TYPES.has(name);
}
