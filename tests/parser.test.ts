/**
 * navex Parser Tests
 * AST shapes and syntax errors
 */

import { parse, ParseError, type ExprNode } from '../src/index.js';
import { describe, expect, it } from 'vitest';

/** Compact rendering of an AST for structural assertions */
function show(node: ExprNode): string {
  switch (node.type) {
    case 'Literal':
      return JSON.stringify(node.value);
    case 'Ident':
      return node.name;
    case 'Select':
      return `${show(node.operand)}.${node.field}`;
    case 'Index':
      return `${show(node.operand)}[${show(node.index)}]`;
    case 'Call': {
      const args = node.args.map(show).join(', ');
      return node.target === null
        ? `${node.name}(${args})`
        : `${show(node.target)}.${node.name}(${args})`;
    }
    case 'List':
      return `[${node.elements.map(show).join(', ')}]`;
    case 'Map':
      return `{${node.entries.map((e) => `${show(e.key)}: ${show(e.value)}`).join(', ')}}`;
    case 'Unary':
      return `(${node.op}${show(node.operand)})`;
    case 'Binary':
      return `(${show(node.left)} ${node.op} ${show(node.right)})`;
    case 'Conditional':
      return `(${show(node.condition)} ? ${show(node.thenBranch)} : ${show(node.elseBranch)})`;
  }
}

describe('navex Parser', () => {
  describe('precedence', () => {
    it('binds multiplication tighter than addition', () => {
      expect(show(parse('_.a + 1 * 2'))).toBe('(_.a + (1 * 2))');
    });

    it('binds && tighter than ||', () => {
      expect(show(parse('a || b && c'))).toBe('(a || (b && c))');
    });

    it('parses relations below arithmetic', () => {
      expect(show(parse('a + 1 < b'))).toBe('((a + 1) < b)');
    });

    it('parses in as a relation', () => {
      expect(show(parse('"x" in _.tags'))).toBe('("x" in _.tags)');
    });

    it('nests conditionals to the right', () => {
      expect(show(parse('a ? b : c ? d : e'))).toBe('(a ? b : (c ? d : e))');
    });

    it('honors parentheses', () => {
      expect(show(parse('(1 + 2) * 3'))).toBe('((1 + 2) * 3)');
    });
  });

  describe('unary', () => {
    it('folds negative number literals', () => {
      const ast = parse('-1');
      expect(ast.type).toBe('Literal');
      expect(show(ast)).toBe('-1');
    });

    it('keeps negation of non-literals', () => {
      expect(show(parse('-_.x'))).toBe('(-_.x)');
      expect(show(parse('!_.ok'))).toBe('(!_.ok)');
    });
  });

  describe('postfix', () => {
    it('treats a numeric step as an index', () => {
      expect(show(parse('items.0.id'))).toBe('items[0].id');
    });

    it('parses method calls on a receiver', () => {
      expect(show(parse('x.f(1)'))).toBe('x.f(1)');
    });

    it('parses namespaced calls as method calls on an identifier', () => {
      expect(show(parse('math.abs(x)'))).toBe('math.abs(x)');
    });

    it('parses macros with expression arguments', () => {
      expect(show(parse('_.items.filter(x, x > 1)'))).toBe('_.items.filter(x, (x > 1))');
    });

    it('spans calls through the closing parenthesis', () => {
      const ast = parse('size(_.a)');
      expect(ast.span.end.offset).toBe(9);
    });
  });

  describe('literals', () => {
    it('allows trailing commas in lists and maps', () => {
      expect(show(parse('[1, 2,]'))).toBe('[1, 2]');
      expect(show(parse('{"a": 1,}'))).toBe('{"a": 1}');
    });

    it('builds bytes literals as Uint8Array', () => {
      const ast = parse('b"hi"');
      expect(ast.type).toBe('Literal');
      if (ast.type === 'Literal') {
        expect(ast.value).toEqual(new Uint8Array([104, 105]));
      }
    });

    it('records numeric kinds', () => {
      const ast = parse('7u');
      expect(ast.type === 'Literal' && ast.numericKind).toBe('uint');
    });
  });

  describe('errors', () => {
    it('rejects trailing tokens', () => {
      expect(() => parse('1 2')).toThrow("Unexpected token '2'");
    });

    it('rejects a dangling dot', () => {
      expect(() => parse('a.')).toThrow("Expected field name after '.'");
    });

    it('hints at unclosed parentheses', () => {
      expect(() => parse('(1 + 2')).toThrow("Expected ')'. Hint: Check for unclosed parenthesis");
    });

    it('hints at likely keyword typos', () => {
      expect(() => parse('(1 tru')).toThrow("Did you mean 'true'?");
    });

    it('reports the error location', () => {
      try {
        parse('a +');
        expect.fail('expected ParseError');
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.location.offset).toBe(3);
        }
      }
    });
  });
});
