import { describe, it, expect } from 'vitest';
import { block, bind, ref, int, call, def, ifThen, returning } from '@reshape/ir';
import { DiagnosticCollector } from '@reshape/analysis';
import { checkInvariants } from '../src/invariants.js';

describe('checkInvariants', () => {
  it('should warn about a binding overwritten before any read', () => {
    const collector = new DiagnosticCollector();
    const tree = def('f', [], block(bind('x', call('a')), bind('x', call('b')), call('use', ref('x'))));
    expect(checkInvariants(tree, collector)).toBe(0);
    expect(collector.diagnostics).toEqual([
      { severity: 'warning', code: 'unused-binding', message: 'Variable x is bound but never read' },
    ]);
  });

  it('should accept a rebinding that reads the previous value', () => {
    const collector = new DiagnosticCollector();
    const tree = def('f', [], block(bind('x', call('a')), bind('x', call('b', ref('x'))), call('use', ref('x'))));
    expect(checkInvariants(tree, collector)).toBe(0);
    expect(collector.diagnostics).toEqual([]);
  });

  it('should report an early return that is still flagged', () => {
    const collector = new DiagnosticCollector();
    const tree = def('f', ['c'], block(ifThen(ref('c'), returning(int(1))), call('g')));
    expect(checkInvariants(tree, collector)).toBe(1);
    expect(collector.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'unresolved-early-return',
        message: 'Early return still flagged; its branch does not end the function',
      },
    ]);
  });
});
