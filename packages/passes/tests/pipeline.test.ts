import { describe, it, expect } from 'vitest';
import {
  module,
  def,
  block,
  bind,
  ref,
  int,
  str,
  nil,
  call,
  remote,
  field,
  binary,
  atom,
  ifThen,
  lambda,
  caseOf,
  clause,
  pTagged,
  pWild,
  returning,
  dump,
} from '@reshape/ir';
import type { IRNode } from '@reshape/ir';
import { normalize } from '../src/index.js';

/** Lowered the way a naive translation of an imperative method would be */
function shopModule(): IRNode {
  return module(
    'Shop',
    def(
      'total',
      ['order'],
      block(
        bind('sum', nil()),
        bind(
          'sum',
          remote(
            'Enum',
            'sum',
            remote('Enum', 'map', field(ref('order'), 'items'), lambda(['i'], field(ref('item'), 'price')))
          )
        ),
        bind('label', binary('<>', str('Total: '), call('to_string', ref('sum')))),
        call('log', ref('label')),
        int(0),
        ref('sum')
      )
    )
  );
}

const SHOP_NORMALIZED =
  '(module Shop (def total (order) (block ' +
  '(= sum (|> (|> (field order items) (Enum.map (fn (-> (item) (field item price))))) (Enum.sum))) ' +
  '(= label (interp "Total: " sum)) ' +
  '(log label) ' +
  'sum)))';

/** Name, lowered tree, expected normalized dump */
const FIXTURES: Array<[string, () => IRNode, string]> = [
  ['a naively lowered method', shopModule, SHOP_NORMALIZED],
  [
    'a binding whose value returns early',
    () =>
      def(
        'load',
        ['id'],
        block(
          bind(
            'x',
            caseOf(call('fetch', ref('id')), [
              clause([pTagged('error', 'e')], returning(ref('e'))),
              clause([pTagged('ok', 'v')], ref('v')),
            ])
          ),
          call('use', ref('x'))
        )
      ),
    '(def load (id) (case (fetch id) (-> ((tuple :error e)) e) (-> ((tuple :ok v)) (block (= x v) (use x)))))',
  ],
  [
    'a chain of guard clauses',
    () =>
      def(
        'check',
        ['n'],
        block(
          ifThen(binary('<', ref('n'), int(0)), returning(atom('negative'))),
          ifThen(binary('==', ref('n'), int(0)), returning(atom('zero'))),
          atom('positive')
        )
      ),
    '(def check (n) (if (< n 0) :negative (if (== n 0) :zero :positive)))',
  ],
  [
    'a rebinding inside a nested conditional',
    () =>
      def(
        'f',
        ['a', 'b'],
        block(
          bind('x', call('init')),
          ifThen(ref('a'), block(call('log'), ifThen(ref('b'), bind('x', call('next'))))),
          call('use', ref('x'))
        )
      ),
    '(def f (a b) (block (= x (init)) (= x (if a (block (log) (if b (next) x)) x)) (use x)))',
  ],
  [
    'mismatched payload binders',
    () =>
      def(
        'show',
        ['r'],
        caseOf(ref('r'), [
          clause([pTagged('ok', '_value')], call('render', ref('value'))),
          clause([pTagged('error', 'reason')], call('fail')),
        ])
      ),
    '(def show (r) (case r (-> ((tuple :ok value)) (render value)) (-> ((tuple :error _reason)) (fail))))',
  ],
  [
    'a binding overwritten before any read',
    () => def('f', [], block(bind('x', call('a')), bind('x', call('b')), call('use', ref('x')))),
    '(def f () (block (= _x (a)) (= x (b)) (use x)))',
  ],
];

describe('normalize fixtures', () => {
  it.each(FIXTURES)('should normalize %s without diagnostics', (_name, build, expected) => {
    const { tree, diagnostics } = normalize(build(), { verify: true });
    expect(dump(tree)).toBe(expected);
    expect(diagnostics).toEqual([]);
  });

  it.each(FIXTURES)('should leave %s unchanged on a second run', (_name, build) => {
    const once = normalize(build()).tree;
    const twice = normalize(once, { verify: true });
    expect(dump(twice.tree)).toBe(dump(once));
    expect(twice.diagnostics).toEqual([]);
  });

  it('should keep and flag an early return whose clause would capture later reads', () => {
    const tree = def(
      'f',
      ['s'],
      block(
        bind('x', call('init')),
        caseOf(ref('s'), [clause([pTagged('ok', 'x')], call('log', ref('x'))), clause([pWild()], returning(nil()))]),
        call('g', ref('x'))
      )
    );
    const { tree: result, diagnostics } = normalize(tree, { verify: true });
    expect(dump(result)).toBe('(def f (s) (block (= x (init)) (case s (-> ((tuple :ok x)) (log x)) (-> (_) nil)) (g x)))');
    expect(diagnostics.map((d) => [d.severity, d.code, d.pass])).toEqual([
      ['warning', 'unresolved-early-return', 'early-return'],
      ['error', 'unresolved-early-return', undefined],
    ]);
  });
});

describe('normalize', () => {
  it('should repair a naively lowered function', () => {
    const { tree, diagnostics } = normalize(shopModule(), { verify: true });
    expect(dump(tree)).toBe(SHOP_NORMALIZED);
    expect(diagnostics).toEqual([]);
  });

  it('should reconstruct early returns end to end', () => {
    const tree = def('f', ['cond'], block(ifThen(ref('cond'), returning(call('a'))), call('b'), call('c')));
    expect(dump(normalize(tree).tree)).toBe('(def f (cond) (if cond (a) (block (b) (c))))');
  });

  it('should leave no unbound reference behind a misnamed parameter', () => {
    const tree = def('greet', ['u'], call('send', field(ref('user'), 'email')));
    const { tree: result, diagnostics } = normalize(tree, { verify: true });
    expect(dump(result)).toBe('(def greet (user) (send (field user email)))');
    expect(diagnostics).toEqual([]);
  });

  it('should preserve the terminal value of a block', () => {
    const tree = def('f', [], block(call('a'), int(0)));
    expect(dump(normalize(tree).tree)).toBe('(def f () (block (a) 0))');
  });

  it('should rename reserved words in binders and references only', () => {
    const tree = def('f', ['x'], block(bind('case', call('g', ref('x'))), call('h', ref('case'))));
    expect(dump(normalize(tree).tree)).toBe('(def f (x) (block (= case_ (g x)) (h case_)))');
  });
});
