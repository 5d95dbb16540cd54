import { describe, it, expect } from 'vitest';
import {
  block,
  bind,
  ref,
  int,
  float,
  str,
  atom,
  nil,
  call,
  remote,
  ifThen,
  caseOf,
  clause,
  lambda,
  def,
  pipe,
  binary,
  field,
  list,
  interp,
  opaque,
  forExpr,
  generator,
  filter,
  pTagged,
  pPin,
  pAlias,
  pCons,
  pVar,
  returning,
  clearMeta,
} from '../src/builders.js';
import { children, mapChildren, transformBottomUp, findAll, someNode } from '../src/traversal.js';
import { dump, dumpPattern } from '../src/dump.js';
import { decodeTree, parseTree, encodeTree, IRDecodeError } from '../src/codec.js';
import type { IRNode } from '../src/types.js';
import * as ir from '../src/index.js';

describe('IR Builders', () => {
  it('should map the string "_" to a wildcard pattern', () => {
    const node = lambda(['_', 'x'], ref('x'));
    expect(node.clauses[0].patterns).toEqual([{ kind: 'wildcard' }, { kind: 'var', name: 'x' }]);
  });

  it('should leave the else branch off when not given', () => {
    expect('else' in ifThen(ref('c'), int(1))).toBe(false);
  });

  it('should clear a meta flag and drop empty meta', () => {
    const marked = returning(int(1));
    expect(marked.meta).toEqual({ fromEarlyReturn: true });
    expect(clearMeta(marked, 'fromEarlyReturn').meta).toBeUndefined();
  });

  it('should keep the node when the flag is absent', () => {
    const plain = int(1);
    expect(clearMeta(plain, 'sentinel')).toBe(plain);
  });
});

describe('IR Traversal', () => {
  it('should export the bottom-up transform only', () => {
    expect(Object.keys(ir).filter((name) => name.startsWith('transform'))).toEqual(['transformBottomUp']);
  });

  it('should enumerate children in evaluation order', () => {
    const node = ifThen(ref('c'), ref('a'), ref('b'));
    expect(children(node).map(dump)).toEqual(['c', 'a', 'b']);
  });

  it('should return the same object when nothing changes', () => {
    const tree = block(bind('x', int(1)), call('f', ref('x')));
    expect(mapChildren(tree, (child) => child)).toBe(tree);
    expect(transformBottomUp(tree, (node) => node)).toBe(tree);
  });

  it('should share untouched subtrees after a rewrite', () => {
    const untouched = call('g', ref('y'));
    const tree = block(bind('x', int(1)), untouched);
    const next = transformBottomUp(tree, (node) =>
      node.kind === 'literal' && node.literal.type === 'integer' ? int(2) : node
    );
    expect(next).not.toBe(tree);
    expect(next.kind === 'block' && next.body[1]).toBe(untouched);
  });

  it('should find nodes through clause bodies', () => {
    const tree = caseOf(ref('r'), [
      clause([pTagged('ok', 'v')], call('use', ref('v'))),
      clause([pTagged('error', '_')], nil()),
    ]);
    expect(findAll(tree, (n) => n.kind === 'call')).toHaveLength(1);
    expect(someNode(tree, (n) => n.kind === 'var' && n.name === 'v')).toBe(true);
  });
});

describe('IR Dump', () => {
  it('should render blocks and binds', () => {
    expect(dump(block(bind('x', int(1)), ref('x')))).toBe('(block (= x 1) x)');
  });

  it('should render literals by type', () => {
    expect(dump(float(2))).toBe('2.0');
    expect(dump(str('a"b'))).toBe('"a\\"b"');
    expect(dump(atom('ok'))).toBe(':ok');
    expect(dump(nil())).toBe('nil');
  });

  it('should render calls, pipes and operators', () => {
    const node = pipe(ref('xs'), remote('Enum', 'map', lambda(['x'], binary('*', ref('x'), int(2)))));
    expect(dump(node)).toBe('(|> xs (Enum.map (fn (-> (x) (* x 2)))))');
  });

  it('should render case clauses with guards', () => {
    const node = caseOf(ref('r'), [clause([pTagged('ok', 'v')], ref('v'), binary('>', ref('v'), int(0)))]);
    expect(dump(node)).toBe('(case r (-> ((tuple :ok v)) (when (> v 0)) v))');
  });

  it('should render definitions and comprehensions', () => {
    expect(dump(def('run', ['a'], field(ref('a'), 'id'), { private: true }))).toBe('(defp run (a) (field a id))');
    expect(dump(forExpr([generator('x', ref('xs')), filter(ref('x'))], ref('x'), list()))).toBe(
      '(for ((<- x xs) (filter x)) (into (list)) x)'
    );
  });

  it('should render patterns', () => {
    expect(dumpPattern(pPin('x'))).toBe('^x');
    expect(dumpPattern(pAlias('all', pCons('h', '_')))).toBe('(as all (cons h _))');
  });

  it('should render interpolation and opaque text', () => {
    expect(dump(interp('id: ', ref('id')))).toBe('(interp "id: " id)');
    expect(dump(opaque('x + 1'))).toBe('(opaque "x + 1")');
  });
});

describe('IR Codec', () => {
  it('should decode a tree that was encoded', () => {
    const tree: IRNode = def('f', [pVar('x', 'scalar')], block(bind('y', binary('+', ref('x'), int(1))), ref('y')));
    expect(parseTree(encodeTree(tree))).toEqual(tree);
  });

  it('should keep integers beyond the safe range exact', () => {
    const big = int(12345678901234567891n);
    const text = encodeTree(big, 0);
    expect(text).toBe('{"kind":"literal","literal":{"type":"integer","value":"12345678901234567891"}}');
    expect(dump(parseTree(text))).toBe('12345678901234567891');
  });

  it('should encode safe integers as JSON numbers', () => {
    expect(encodeTree(int(-7), 0)).toBe('{"kind":"literal","literal":{"type":"integer","value":-7}}');
    expect(decodeTree({ kind: 'literal', literal: { type: 'integer', value: -7 } })).toEqual(int(-7));
  });

  it('should reject an unsafe integer given as a JSON number', () => {
    expect(() => decodeTree({ kind: 'literal', literal: { type: 'integer', value: 2 ** 53 } })).toThrow(IRDecodeError);
  });

  it('should reject an unknown node kind with its path', () => {
    const input = { kind: 'block', body: [{ kind: 'var', name: 'x' }, { kind: 'goto', label: 'l' }] };
    expect(() => decodeTree(input)).toThrow(IRDecodeError);
    try {
      decodeTree(input);
    } catch (error) {
      expect(error instanceof IRDecodeError && error.path).toEqual(['body', 1, 'kind']);
    }
  });

  it('should reject a pattern variable without a name', () => {
    const input = { kind: 'bind', pattern: { kind: 'var', name: '' }, value: { kind: 'literal', literal: { type: 'nil' } } };
    expect(() => decodeTree(input)).toThrow(IRDecodeError);
  });

  it('should report invalid JSON', () => {
    expect(() => parseTree('{')).toThrow(/^Invalid JSON/);
  });
});
