import { describe, it, expect } from 'vitest';
import {
  isOOLanguage,
  getOOLanguages,
  getLanguageCapabilities,
  getClasses,
  extractParentNames,
} from '../../../src/engines/languageCapabilities.js';
import { node, textNode, leaf, token, f, at } from '../../helpers/syntaxTree.js';

describe('Language Capabilities', () => {
  describe('isOOLanguage', () => {
    it('should accept languages with classes', () => {
      for (const language of ['java', 'csharp', 'cpp', 'python', 'javascript', 'typescript', 'tsx', 'ruby', 'php']) {
        expect(isOOLanguage(language)).toBe(true);
      }
    });

    it('should reject languages without classes', () => {
      expect(isOOLanguage('go')).toBe(false);
      expect(isOOLanguage('c')).toBe(false);
      expect(isOOLanguage('rust')).toBe(false);
      expect(isOOLanguage('toString')).toBe(false);
    });

    it('should list all nine languages', () => {
      expect(getOOLanguages()).toHaveLength(9);
    });
  });

  describe('getLanguageCapabilities', () => {
    it('should return an empty record for unknown languages', () => {
      const caps = getLanguageCapabilities('go');
      expect(caps.language).toBeNull();
      expect(caps.classNodeTypes).toEqual([]);
      expect(caps.methodName(leaf('identifier', 'x'))).toBe('');
      expect(caps.fieldAccess(leaf('identifier', 'x'))).toBeNull();
    });

    it('should read Java this-field accesses', () => {
      const caps = getLanguageCapabilities('java');
      const access = node('field_access', f('object', leaf('this', 'this')), token('.'), f('field', leaf('identifier', 'count')));
      const other = node('field_access', f('object', leaf('identifier', 'other')), token('.'), f('field', leaf('identifier', 'count')));

      expect(caps.fieldAccess(access)).toBe('count');
      expect(caps.fieldAccess(other)).toBeNull();
    });

    it('should read Python self attributes', () => {
      const caps = getLanguageCapabilities('python');
      const access = node('attribute', f('object', leaf('identifier', 'self')), token('.'), f('attribute', leaf('identifier', 'balance')));
      expect(caps.fieldAccess(access)).toBe('balance');
    });

    it('should read PHP $this accesses', () => {
      const caps = getLanguageCapabilities('php');
      const access = node(
        'member_access_expression',
        f('object', textNode('variable_name', '$this', token('$'), leaf('name', 'this'))),
        token('->'),
        f('name', leaf('name', 'items'))
      );
      expect(caps.fieldAccess(access)).toBe('items');
    });

    it('should strip $ from PHP property names', () => {
      const caps = getLanguageCapabilities('php');
      const property = node(
        'property_declaration',
        leaf('visibility_modifier', 'private'),
        node('property_element', textNode('variable_name', '$items', token('$'), leaf('name', 'items')))
      );
      expect(caps.fieldNames(property)).toEqual(['items']);
    });

    it('should name every declarator of a Java field declaration', () => {
      const caps = getLanguageCapabilities('java');
      const field = node(
        'field_declaration',
        leaf('integral_type', 'int'),
        node('variable_declarator', f('name', leaf('identifier', 'width'))),
        token(','),
        node('variable_declarator', f('name', leaf('identifier', 'height'))),
        token(';')
      );
      expect(caps.fieldNames(field)).toEqual(['width', 'height']);
    });

    it('should read C# fields and properties', () => {
      const caps = getLanguageCapabilities('csharp');
      const field = node(
        'field_declaration',
        node(
          'variable_declaration',
          f('type', leaf('predefined_type', 'int')),
          node('variable_declarator', leaf('identifier', 'total'))
        ),
        token(';')
      );
      const property = node(
        'property_declaration',
        f('type', leaf('predefined_type', 'string')),
        f('name', leaf('identifier', 'Label'))
      );

      expect(caps.fieldNames(field)).toEqual(['total']);
      expect(caps.fieldNames(property)).toEqual(['Label']);
    });

    it('should name C++ data members but not member functions', () => {
      const caps = getLanguageCapabilities('cpp');
      const data = node(
        'field_declaration',
        f('type', leaf('primitive_type', 'double')),
        f('declarator', leaf('field_identifier', 'radius')),
        token(';')
      );
      const pointer = node(
        'field_declaration',
        f('type', leaf('type_identifier', 'Node')),
        f('declarator', node('pointer_declarator', token('*'), f('declarator', leaf('field_identifier', 'next')))),
        token(';')
      );
      const declaration = node(
        'field_declaration',
        f('type', leaf('primitive_type', 'double')),
        f('declarator', node('function_declarator', f('declarator', leaf('field_identifier', 'area')), node('parameter_list'))),
        token(';')
      );

      expect(caps.fieldNames(data)).toEqual(['radius']);
      expect(caps.fieldNames(pointer)).toEqual(['next']);
      expect(caps.fieldNames(declaration)).toEqual([]);
    });

    it('should name C++ methods through their declarators', () => {
      const caps = getLanguageCapabilities('cpp');
      const definition = node(
        'function_definition',
        f('type', leaf('primitive_type', 'double')),
        f('declarator', node('function_declarator', f('declarator', leaf('field_identifier', 'area')), node('parameter_list'))),
        f('body', node('compound_statement'))
      );
      const outOfLine = node(
        'function_definition',
        f('declarator', node('function_declarator', f('declarator', textNode('qualified_identifier', 'Circle::area')), node('parameter_list'))),
        f('body', node('compound_statement'))
      );

      expect(caps.methodName(definition)).toBe('area');
      expect(caps.methodName(outOfLine)).toBe('Circle::area');
    });

    it('should treat function-valued class fields as methods', () => {
      const caps = getLanguageCapabilities('typescript');
      const handler = node(
        'public_field_definition',
        f('name', leaf('property_identifier', 'onClick')),
        token('='),
        f('value', node('arrow_function', node('formal_parameters'), token('=>'), node('statement_block')))
      );
      const state = node(
        'public_field_definition',
        f('name', leaf('property_identifier', 'count')),
        token('='),
        f('value', leaf('number', '0'))
      );

      expect(caps.methodName(handler)).toBe('onClick');
      expect(caps.fieldNames(handler)).toEqual([]);
      expect(caps.methodName(state)).toBe('');
      expect(caps.fieldNames(state)).toEqual(['count']);
    });

    it('should read JavaScript field names from the property field', () => {
      const caps = getLanguageCapabilities('javascript');
      const field = node('field_definition', f('property', leaf('property_identifier', 'size')));
      expect(caps.fieldNames(field)).toEqual(['size']);
    });

    it('should use instance variables as Ruby fields', () => {
      const caps = getLanguageCapabilities('ruby');
      const ivar = leaf('instance_variable', '@balance');
      expect(caps.fieldNames(ivar)).toEqual(['@balance']);
      expect(caps.fieldAccess(ivar)).toBe('@balance');
    });
  });

  describe('getClasses', () => {
    it('should find top-level classes with 1-based lines', () => {
      const root = node(
        'program',
        at(node('class_declaration', token('class'), f('name', leaf('identifier', 'Shape')), f('body', node('class_body'))), 2, 10),
        at(node('class_declaration', token('class'), f('name', leaf('identifier', 'Circle')), f('body', node('class_body'))), 12, 20)
      );

      const classes = getClasses(root, 'java');

      expect(classes.map((c) => [c.name, c.startLine, c.endLine])).toEqual([
        ['Shape', 3, 11],
        ['Circle', 13, 21],
      ]);
    });

    it('should not descend into class bodies', () => {
      const inner = node('class_declaration', token('class'), f('name', leaf('identifier', 'Inner')));
      const outer = node(
        'class_declaration',
        token('class'),
        f('name', leaf('identifier', 'Outer')),
        f('body', node('class_body', inner))
      );

      expect(getClasses(node('program', outer), 'java').map((c) => c.name)).toEqual(['Outer']);
    });

    it('should skip classes without a name', () => {
      const anonymous = node('class', token('class'), node('class_body'));
      const named = node('class_declaration', token('class'), f('name', leaf('identifier', 'Named')));
      const root = node('program', node('lexical_declaration', anonymous), named);

      expect(getClasses(root, 'javascript').map((c) => c.name)).toEqual(['Named']);
    });

    it('should find nothing for languages without classes', () => {
      const root = node('source_file', node('type_declaration', f('name', leaf('type_identifier', 'Server'))));
      expect(getClasses(root, 'go')).toEqual([]);
    });
  });

  describe('extractParentNames', () => {
    it('should read Java superclass and interfaces in source order', () => {
      const cls = node(
        'class_declaration',
        token('class'),
        f('name', leaf('identifier', 'Dog')),
        f('superclass', node('superclass', token('extends'), leaf('type_identifier', 'Animal'))),
        f(
          'interfaces',
          node(
            'super_interfaces',
            token('implements'),
            node(
              'type_list',
              leaf('type_identifier', 'Pet'),
              token(','),
              textNode(
                'generic_type',
                'Comparable<Dog>',
                leaf('type_identifier', 'Comparable'),
                node('type_arguments', token('<'), leaf('type_identifier', 'Dog'), token('>'))
              )
            )
          )
        ),
        f('body', node('class_body'))
      );

      expect(extractParentNames(cls, 'java')).toEqual(['Animal', 'Pet', 'Comparable']);
    });

    it('should reduce qualified Java parents to the simple name', () => {
      const cls = node(
        'class_declaration',
        f('name', leaf('identifier', 'Task')),
        node(
          'superclass',
          token('extends'),
          textNode(
            'scoped_type_identifier',
            'java.util.TimerTask',
            leaf('type_identifier', 'java'),
            leaf('type_identifier', 'TimerTask')
          )
        )
      );

      expect(extractParentNames(cls, 'java')).toEqual(['TimerTask']);
    });

    it('should read Python bases and skip keyword arguments', () => {
      const cls = node(
        'class_definition',
        token('class'),
        f('name', leaf('identifier', 'Model')),
        f(
          'superclasses',
          node(
            'argument_list',
            token('('),
            textNode('attribute', 'models.Base', leaf('identifier', 'models'), token('.'), leaf('identifier', 'Base')),
            token(','),
            leaf('identifier', 'Mixin'),
            token(','),
            node('keyword_argument', f('name', leaf('identifier', 'metaclass')), token('='), f('value', leaf('identifier', 'ABCMeta'))),
            token(')')
          )
        )
      );

      expect(extractParentNames(cls, 'python')).toEqual(['Base', 'Mixin']);
    });

    it('should drop primitive parents', () => {
      const cls = node(
        'class_definition',
        f('name', leaf('identifier', 'Legacy')),
        node('argument_list', leaf('identifier', 'object'))
      );

      expect(extractParentNames(cls, 'python')).toEqual([]);
    });

    it('should read C++ base classes', () => {
      const cls = node(
        'class_specifier',
        token('class'),
        f('name', leaf('type_identifier', 'Circle')),
        node(
          'base_class_clause',
          token(':'),
          leaf('access_specifier', 'public'),
          textNode('qualified_identifier', 'geo::Shape', leaf('namespace_identifier', 'geo'), token('::'), leaf('type_identifier', 'Shape')),
          token(','),
          leaf('access_specifier', 'private'),
          leaf('type_identifier', 'Printable')
        )
      );

      expect(extractParentNames(cls, 'cpp')).toEqual(['Shape', 'Printable']);
    });

    it('should read TypeScript extends and implements clauses', () => {
      const cls = node(
        'class_declaration',
        f('name', leaf('type_identifier', 'Button')),
        node(
          'class_heritage',
          node('extends_clause', token('extends'), f('value', leaf('identifier', 'Widget'))),
          node('implements_clause', token('implements'), leaf('type_identifier', 'Clickable'))
        )
      );

      expect(extractParentNames(cls, 'typescript')).toEqual(['Widget', 'Clickable']);
    });

    it('should read Ruby superclasses', () => {
      const cls = node(
        'class',
        token('class'),
        f('name', leaf('constant', 'Admin')),
        f('superclass', node('superclass', token('<'), textNode('scope_resolution', 'Accounts::User', leaf('constant', 'Accounts'), token('::'), leaf('constant', 'User'))))
      );

      expect(extractParentNames(cls, 'ruby')).toEqual(['User']);
    });

    it('should ignore heritage clauses that are not direct children', () => {
      const cls = node(
        'class_declaration',
        f('name', leaf('identifier', 'Outer')),
        node('class_body', node('superclass', leaf('type_identifier', 'Hidden')))
      );

      expect(extractParentNames(cls, 'java')).toEqual([]);
    });

    it('should return nothing for a class without heritage', () => {
      const cls = node('class_declaration', f('name', leaf('identifier', 'Root')), node('class_body'));
      expect(extractParentNames(cls, 'java')).toEqual([]);
    });
  });
});
