import { describe, it, expect } from 'vitest';
import { tokenize, parse, serialize, headOf, findChild, atomValues } from './sexpr';
import type { SNode } from './types';
import { StructuralError, EmptyInputError } from '../errors';

const atom = (value: string): SNode => ({ type: 'atom', value });
const str = (value: string): SNode => ({ type: 'string', value });
const list = (...items: SNode[]): SNode => ({ type: 'list', items });

describe('tokenize', () => {
  it('splits parens, strings and atoms with offsets', () => {
    expect(tokenize('(at 1.5 "x")')).toEqual([
      { type: 'open', offset: 0 },
      { type: 'atom', value: 'at', offset: 1 },
      { type: 'atom', value: '1.5', offset: 4 },
      { type: 'string', value: 'x', offset: 8 },
      { type: 'close', offset: 11 },
    ]);
  });

  it('decodes escapes inside strings', () => {
    const tokens = tokenize('"a\\"b" "c\\\\d" "e\\nf"');
    expect(tokens.map(t => (t.type === 'string' ? t.value : null))).toEqual(['a"b', 'c\\d', 'enf']);
  });

  it('reads a quote with no closing quote as an atom', () => {
    expect(tokenize('(a "bc)')).toEqual([
      { type: 'open', offset: 0 },
      { type: 'atom', value: 'a', offset: 1 },
      { type: 'atom', value: '"bc', offset: 3 },
      { type: 'close', offset: 6 },
    ]);
    expect(parse('(a "b)')).toEqual(list(atom('a'), atom('"b')));
  });
});

describe('parse', () => {
  it('builds a tagged tree in document order', () => {
    expect(parse('(kicad_sch (version 1) "x")')).toEqual(
      list(atom('kicad_sch'), list(atom('version'), atom('1')), str('x')),
    );
  });

  it('keeps parentheses inside strings out of the nesting', () => {
    expect(parse('(t "has (a) paren" (x 1))')).toEqual(
      list(atom('t'), str('has (a) paren'), list(atom('x'), atom('1'))),
    );
  });

  it('fails on an extra closing parenthesis', () => {
    expect(() => parse('(a))')).toThrow('Unmatched closing parenthesis at line 1, column 4');
  });

  it('fails on a missing closing parenthesis', () => {
    expect(() => parse('(a (b)')).toThrow(StructuralError);
    expect(() => parse('(a (b)')).toThrow('Unclosed parenthesis at line 1, column 1');
  });

  it('reports line and column across newlines', () => {
    const err = (() => {
      try {
        parse('(a\n  ))');
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(StructuralError);
    expect(err instanceof StructuralError ? err.position : null).toEqual({ offset: 6, line: 2, column: 4 });
  });

  it('fails on empty input', () => {
    expect(() => parse('')).toThrow(EmptyInputError);
    expect(() => parse('  \n\t ')).toThrow(EmptyInputError);
  });

  it('fails on a second top-level expression', () => {
    expect(() => parse('(a) (b)')).toThrow('Unexpected expression after document root at line 1, column 5');
  });

  it('accepts a bare atom as the whole document', () => {
    expect(parse('  hello ')).toEqual(atom('hello'));
  });
});

describe('serialize', () => {
  it('writes canonical spacing and escapes strings', () => {
    expect(serialize(parse('(a  "x\\"y"\n (b))'))).toBe('(a "x\\"y" (b))');
  });

  it('round-trips to an equal tree', () => {
    const tree = list(
      atom('kicad_sch'),
      list(atom('text_box'), str('quote " and \\ slash'), list(atom('at'), atom('1'), atom('2'))),
      str(''),
      list(),
    );
    expect(parse(serialize(tree))).toEqual(tree);
  });
});

describe('query helpers', () => {
  const root = parse('(text_box "x" (at 1 2) (effects (justify left top)))');

  it('reads the head atom', () => {
    expect(headOf(root)).toBe('text_box');
    expect(headOf(atom('x'))).toBeUndefined();
    expect(headOf(list(str('x')))).toBeUndefined();
  });

  it('finds child lists by head', () => {
    if (root.type !== 'list') throw new Error('expected list');
    const effects = findChild(root, 'effects');
    expect(effects).toBeDefined();
    const justify = effects ? findChild(effects, 'justify') : undefined;
    expect(justify ? atomValues(justify) : []).toEqual(['left', 'top']);
    expect(findChild(root, 'size')).toBeUndefined();
  });
});
