/**
 * Language Capability Table
 *
 * One closed record per object-oriented grammar describing how classes,
 * methods, fields, inheritance clauses and self/this accesses look in its
 * syntax tree. Extractors only consult these records, so adding a language
 * means adding one entry here.
 *
 * Node type names follow the grammars shipped in tree-sitter-wasms.
 *
 * @module languageCapabilities
 */

import {
  type SyntaxNode,
  walk,
  getChildren,
  getNamedChildren,
  getNameText,
  cleanTypeName,
  unqualifiedName,
  isPrimitiveType,
} from './astUtils.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Languages with a class system the engine analyzes
 */
export type OOLanguage =
  | 'java'
  | 'csharp'
  | 'cpp'
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'tsx'
  | 'ruby'
  | 'php';

export interface LanguageCapabilities {
  /** Null for the empty record returned for unsupported languages */
  readonly language: OOLanguage | null;
  /** (a) class-like declarations */
  readonly classNodeTypes: readonly string[];
  /** (b) method-like declarations */
  readonly methodNodeTypes: readonly string[];
  /** (c) field-like declarations */
  readonly fieldNodeTypes: readonly string[];
  /** (d) inheritance/heritage clauses, as direct children of a class node */
  readonly heritageNodeTypes: readonly string[];
  /** Node types inside a heritage clause that name one parent */
  readonly parentNameTypes: readonly string[];
  /** Bare identifiers matching a declared field count as field uses */
  readonly implicitFieldAccess: boolean;
  /** Method name, or '' when the node has none (or is not a method after all) */
  methodName(node: SyntaxNode): string;
  /** Names declared by a node of one of `fieldNodeTypes` */
  fieldNames(node: SyntaxNode): string[];
  /** Field referenced by a self/this access at `node`, or null */
  fieldAccess(node: SyntaxNode): string | null;
}

/**
 * A class-like declaration found by the top-level scan
 */
export interface ClassNodeInfo {
  name: string;
  /** 1-based */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
  node: SyntaxNode;
}

// ============================================================================
// Shared Rules
// ============================================================================

/** Subtrees of a heritage clause that never name a parent */
const HERITAGE_SKIP_TYPES: ReadonlySet<string> = new Set([
  'type_arguments',
  'type_argument_list',
  'template_argument_list',
  'arguments',
  'keyword_argument',
]);

/** Values that turn a class field into a method */
const FUNCTION_VALUE_TYPES: ReadonlySet<string> = new Set([
  'arrow_function',
  'function',
  'function_expression',
]);

const CPP_DECLARATOR_NAMES: ReadonlySet<string> = new Set([
  'field_identifier',
  'identifier',
  'qualified_identifier',
  'destructor_name',
  'operator_name',
]);

function nameField(node: SyntaxNode): string {
  return getNameText(node);
}

/**
 * `receiver.member` access where the receiver text is `self`/`this`
 */
function receiverAccess(
  nodeType: string,
  receiverField: string,
  memberField: string,
  receiver: string
): (node: SyntaxNode) => string | null {
  return (node) => {
    if (node.type !== nodeType) return null;
    const object = node.childForFieldName(receiverField);
    const member = node.childForFieldName(memberField);
    if (!object || !member || object.text !== receiver) return null;
    return member.text;
  };
}

/**
 * Follow a C/C++ declarator chain down to the declared name
 */
function unwrapDeclarator(node: SyntaxNode, allowFunctions: boolean): SyntaxNode | null {
  let current: SyntaxNode | null = node;

  while (current) {
    if (CPP_DECLARATOR_NAMES.has(current.type)) {
      return current;
    }
    if (current.type === 'function_declarator' && !allowFunctions) {
      return null;
    }
    const next: SyntaxNode | null = current.childForFieldName('declarator');
    if (next) {
      current = next;
    } else {
      const named = getNamedChildren(current);
      current = named[named.length - 1] ?? null;
    }
  }

  return null;
}

function isFunctionValued(node: SyntaxNode): boolean {
  const value = node.childForFieldName('value');
  return value !== null && FUNCTION_VALUE_TYPES.has(value.type);
}

/** JS/TS class fields: `name` in TypeScript, `property` in JavaScript */
function classFieldName(node: SyntaxNode): string {
  return (node.childForFieldName('name') ?? node.childForFieldName('property'))?.text ?? '';
}

// ============================================================================
// Capability Records
// ============================================================================

const JAVA: LanguageCapabilities = {
  language: 'java',
  classNodeTypes: ['class_declaration', 'interface_declaration', 'enum_declaration', 'record_declaration'],
  methodNodeTypes: ['method_declaration', 'constructor_declaration'],
  fieldNodeTypes: ['field_declaration'],
  heritageNodeTypes: ['superclass', 'super_interfaces', 'extends_interfaces'],
  parentNameTypes: ['type_identifier', 'scoped_type_identifier', 'generic_type'],
  implicitFieldAccess: true,
  methodName: nameField,
  fieldNames: (node) =>
    getNamedChildren(node)
      .filter((child) => child.type === 'variable_declarator')
      .map(nameField)
      .filter((name) => name !== ''),
  fieldAccess: receiverAccess('field_access', 'object', 'field', 'this'),
};

const CSHARP: LanguageCapabilities = {
  language: 'csharp',
  classNodeTypes: ['class_declaration', 'interface_declaration', 'struct_declaration', 'record_declaration'],
  methodNodeTypes: ['method_declaration', 'constructor_declaration'],
  fieldNodeTypes: ['field_declaration', 'property_declaration'],
  heritageNodeTypes: ['base_list'],
  parentNameTypes: ['identifier', 'generic_name', 'qualified_name'],
  implicitFieldAccess: true,
  methodName: nameField,
  fieldNames: (node) => {
    if (node.type === 'property_declaration') {
      const name = nameField(node);
      return name ? [name] : [];
    }
    const names: string[] = [];
    for (const declaration of getNamedChildren(node)) {
      if (declaration.type !== 'variable_declaration') continue;
      for (const declarator of getNamedChildren(declaration)) {
        if (declarator.type !== 'variable_declarator') continue;
        const name =
          nameField(declarator) ||
          (getNamedChildren(declarator).find((c) => c.type === 'identifier')?.text ?? '');
        if (name) names.push(name);
      }
    }
    return names;
  },
  fieldAccess: receiverAccess('member_access_expression', 'expression', 'name', 'this'),
};

const CPP: LanguageCapabilities = {
  language: 'cpp',
  classNodeTypes: ['class_specifier', 'struct_specifier'],
  methodNodeTypes: ['function_definition', 'function_declarator'],
  fieldNodeTypes: ['field_declaration'],
  heritageNodeTypes: ['base_class_clause'],
  parentNameTypes: ['type_identifier', 'qualified_identifier', 'template_type'],
  implicitFieldAccess: true,
  methodName: (node) => {
    const start = node.type === 'function_declarator' ? node.childForFieldName('declarator') : node;
    if (!start) return '';
    return unwrapDeclarator(start, true)?.text ?? '';
  },
  fieldNames: (node) => {
    const names: string[] = [];
    for (const child of getNamedChildren(node)) {
      // The type and default value never unwrap to a field_identifier
      const declared = unwrapDeclarator(child, false);
      if (declared && declared.type === 'field_identifier') {
        names.push(declared.text);
      }
    }
    return names;
  },
  fieldAccess: receiverAccess('field_expression', 'argument', 'field', 'this'),
};

const PYTHON: LanguageCapabilities = {
  language: 'python',
  classNodeTypes: ['class_definition'],
  methodNodeTypes: ['function_definition'],
  fieldNodeTypes: ['assignment'],
  heritageNodeTypes: ['argument_list'],
  parentNameTypes: ['identifier', 'attribute', 'subscript'],
  implicitFieldAccess: false,
  methodName: nameField,
  fieldNames: (node) => {
    const left = node.childForFieldName('left');
    if (!left) return [];
    const targets = left.type === 'attribute' ? [left] : getNamedChildren(left);
    const names: string[] = [];
    for (const target of targets) {
      const name = selfAttribute(target);
      if (name) names.push(name);
    }
    return names;
  },
  fieldAccess: (node) => selfAttribute(node),
};

function selfAttribute(node: SyntaxNode): string | null {
  return receiverAccess('attribute', 'object', 'attribute', 'self')(node);
}

function ecmaScript(language: 'javascript' | 'typescript' | 'tsx'): LanguageCapabilities {
  return {
    language,
    classNodeTypes: ['class_declaration', 'abstract_class_declaration', 'class'],
    methodNodeTypes: ['method_definition', 'public_field_definition', 'field_definition'],
    fieldNodeTypes: ['public_field_definition', 'field_definition'],
    heritageNodeTypes: ['class_heritage'],
    parentNameTypes: [
      'identifier',
      'type_identifier',
      'member_expression',
      'nested_identifier',
      'nested_type_identifier',
      'generic_type',
    ],
    implicitFieldAccess: false,
    methodName: (node) => {
      if (node.type === 'method_definition') return nameField(node);
      // Arrow-function fields are methods, everything else is state
      return isFunctionValued(node) ? classFieldName(node) : '';
    },
    fieldNames: (node) => {
      if (isFunctionValued(node)) return [];
      const name = classFieldName(node);
      return name ? [name] : [];
    },
    fieldAccess: receiverAccess('member_expression', 'object', 'property', 'this'),
  };
}

const RUBY: LanguageCapabilities = {
  language: 'ruby',
  classNodeTypes: ['class', 'module'],
  methodNodeTypes: ['method', 'singleton_method'],
  fieldNodeTypes: ['instance_variable'],
  heritageNodeTypes: ['superclass'],
  parentNameTypes: ['constant', 'scope_resolution'],
  implicitFieldAccess: false,
  methodName: nameField,
  fieldNames: (node) => [node.text],
  fieldAccess: (node) => (node.type === 'instance_variable' ? node.text : null),
};

const PHP: LanguageCapabilities = {
  language: 'php',
  classNodeTypes: ['class_declaration', 'interface_declaration', 'trait_declaration'],
  methodNodeTypes: ['method_declaration'],
  fieldNodeTypes: ['property_declaration'],
  heritageNodeTypes: ['base_clause', 'class_interface_clause'],
  parentNameTypes: ['name', 'qualified_name'],
  implicitFieldAccess: false,
  methodName: nameField,
  fieldNames: (node) => {
    const names: string[] = [];
    walk(node, (child) => {
      if (child.type === 'variable_name') {
        names.push(child.text.replace(/^\$/, ''));
        return false;
      }
      return true;
    });
    return names;
  },
  fieldAccess: receiverAccess('member_access_expression', 'object', 'name', '$this'),
};

const CAPABILITIES: Record<OOLanguage, LanguageCapabilities> = {
  java: JAVA,
  csharp: CSHARP,
  cpp: CPP,
  python: PYTHON,
  javascript: ecmaScript('javascript'),
  typescript: ecmaScript('typescript'),
  tsx: ecmaScript('tsx'),
  ruby: RUBY,
  php: PHP,
};

/**
 * Record for languages without a class system: every extractor finds nothing
 */
const EMPTY_CAPABILITIES: LanguageCapabilities = {
  language: null,
  classNodeTypes: [],
  methodNodeTypes: [],
  fieldNodeTypes: [],
  heritageNodeTypes: [],
  parentNameTypes: [],
  implicitFieldAccess: false,
  methodName: () => '',
  fieldNames: () => [],
  fieldAccess: () => null,
};

// ============================================================================
// Public API
// ============================================================================

export function isOOLanguage(language: string): language is OOLanguage {
  return Object.prototype.hasOwnProperty.call(CAPABILITIES, language);
}

/**
 * Capability record for a language tag (empty for unknown tags)
 */
export function getLanguageCapabilities(language: string): LanguageCapabilities {
  return isOOLanguage(language) ? CAPABILITIES[language] : EMPTY_CAPABILITIES;
}

export function getOOLanguages(): OOLanguage[] {
  return Object.keys(CAPABILITIES).filter(isOOLanguage);
}

/**
 * Find class-like declarations without descending into class bodies
 *
 * Nodes without a `name` field are skipped.
 */
export function getClasses(root: SyntaxNode, language: string): ClassNodeInfo[] {
  const capabilities = getLanguageCapabilities(language);
  const classes: ClassNodeInfo[] = [];

  walk(root, (node) => {
    if (!capabilities.classNodeTypes.includes(node.type)) {
      return true;
    }

    const name = getNameText(node);
    if (name) {
      classes.push({
        name,
        startLine: node.startPosition.row + 1,
        endLine: node.endPosition.row + 1,
        node,
      });
    }
    return false;
  });

  return classes;
}

/**
 * Parent names declared in a class node's heritage clauses
 *
 * Generic arguments are stripped, qualified names reduced to their last
 * segment, and primitives dropped. Order follows the source.
 */
export function extractParentNames(classNode: SyntaxNode, language: string): string[] {
  const capabilities = getLanguageCapabilities(language);
  const parents: string[] = [];

  for (const clause of getChildren(classNode)) {
    if (!capabilities.heritageNodeTypes.includes(clause.type)) continue;

    walk(clause, (node) => {
      if (node !== clause && HERITAGE_SKIP_TYPES.has(node.type)) {
        return false;
      }
      if (node !== clause && capabilities.parentNameTypes.includes(node.type)) {
        const name = unqualifiedName(cleanTypeName(node.text));
        if (name && !isPrimitiveType(name)) {
          parents.push(name);
        }
        return false;
      }
      return true;
    });
  }

  return parents;
}
