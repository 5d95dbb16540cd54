import { describe, it, expect } from 'vitest';
import {
  block,
  bind,
  ref,
  int,
  call,
  caseOf,
  clause,
  lambda,
  def,
  field,
  interp,
  opaque,
  forExpr,
  generator,
  withExpr,
  pTuple,
  pAtom,
  pAlias,
  pPin,
  pCons,
  pMap,
  pStruct,
  pBinary,
  pVar,
  pWild,
} from '@reshape/ir';
import {
  boundNames,
  patternReads,
  declaredInSubtree,
  referencedNames,
  freeVariables,
} from '../src/scope.js';

const sorted = (names: Set<string>): string[] => [...names].sort();

describe('boundNames', () => {
  it('should collect through every pattern variant', () => {
    const pattern = pTuple(
      pAlias('whole', pCons('head', 'tail')),
      pMap([[{ type: 'atom', value: 'id' }, 'id']]),
      pStruct('User', { name: 'name' }),
      pBinary({ pattern: pVar('size') }, { pattern: pVar('rest'), size: ref('size') })
    );
    expect(sorted(boundNames(pattern))).toEqual(['head', 'id', 'name', 'rest', 'size', 'tail', 'whole']);
  });

  it('should exclude pins and wildcards', () => {
    expect(sorted(boundNames(pTuple(pPin('expected'), pWild(), pVar('got'))))).toEqual(['got']);
  });

  it('should report pins and segment sizes as reads', () => {
    const pattern = pTuple(pPin('expected'), pBinary({ pattern: pVar('body'), size: ref('len') }));
    expect(sorted(patternReads(pattern))).toEqual(['expected', 'len']);
  });
});

describe('declaredInSubtree', () => {
  it('should collect binders of binds and clauses but not call arguments', () => {
    const node = block(
      bind('a', call('f', ref('x'))),
      caseOf(ref('a'), [clause([pTuple(pAtom('ok'), 'v')], ref('v'))]),
      call('g', lambda(['item'], ref('item')))
    );
    expect(sorted(declaredInSubtree(node))).toEqual(['a', 'item', 'v']);
  });
});

describe('referencedNames', () => {
  it('should include interpolation parts and opaque tokens', () => {
    const node = block(interp('id=', ref('id')), opaque('Logger.info(message <> suffix)'));
    expect(sorted(referencedNames(node))).toEqual(['id', 'message', 'suffix']);
  });

  it('should not count call names or fields as reads', () => {
    expect(sorted(referencedNames(call('process', field(ref('user'), 'name'))))).toEqual(['user']);
  });
});

describe('freeVariables', () => {
  it('should make block bindings visible to later statements only', () => {
    const node = block(call('use', ref('x')), bind('x', int(1)), ref('x'));
    expect(sorted(freeVariables(node))).toEqual(['x']);
    expect(sorted(freeVariables(block(bind('x', int(1)), ref('x'))))).toEqual([]);
  });

  it('should not leak clause bindings', () => {
    const node = block(caseOf(ref('r'), [clause([pTuple(pAtom('ok'), 'v')], ref('v'))]), ref('v'));
    expect(sorted(freeVariables(node))).toEqual(['r', 'v']);
  });

  it('should give a def its parameters only', () => {
    const node = block(bind('outer', int(1)), def('f', ['a'], call('g', ref('a'), ref('outer'))));
    expect(sorted(freeVariables(node))).toEqual(['outer']);
  });

  it('should scope comprehension and with bindings sequentially', () => {
    const comprehension = forExpr([generator('x', ref('xs')), generator('y', ref('x'))], ref('y'));
    expect(sorted(freeVariables(comprehension))).toEqual(['xs']);

    const chain = withExpr(
      [{ pattern: pTuple(pAtom('ok'), 'user'), value: call('fetch', ref('id')) }],
      ref('user'),
      [clause([pVar('err')], ref('user'))]
    );
    expect(sorted(freeVariables(chain))).toEqual(['id', 'user']);
  });

  it('should honour names bound around the node', () => {
    expect(sorted(freeVariables(call('f', ref('a'), ref('b')), new Set(['a'])))).toEqual(['b']);
  });
});
