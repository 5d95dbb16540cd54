import { describe, it, expect, vi, afterEach } from 'vitest';
import { block, ref, int, str, call, binary, returning, dump } from '@reshape/ir';
import { DiagnosticCollector } from '@reshape/analysis';
import { createPipeline, PipelineConfigError, PipelineError } from '../src/scheduler.js';
import { defaultPasses } from '../src/registry.js';
import { flattenBlocks } from '../src/structural/flatten-blocks.js';
import { earlyReturn } from '../src/structural/early-return.js';
import { selfRebindRemoval } from '../src/cleanup/self-rebind-removal.js';
import type { Pass } from '../src/pass.js';

describe('createPipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should accept the default pass list', () => {
    expect(createPipeline(defaultPasses()).passes).toHaveLength(21);
  });

  it('should reject a pass whose dependency is not scheduled before it', () => {
    expect(() => createPipeline([earlyReturn])).toThrow(PipelineConfigError);
    expect(() => createPipeline([earlyReturn])).toThrow(
      'Pass early-return must run after flatten-blocks, which is not scheduled before it'
    );
  });

  it('should reject passes that go back to an earlier tier', () => {
    expect(() => createPipeline([selfRebindRemoval, flattenBlocks])).toThrow(
      'Pass flatten-blocks (structural) is scheduled after a cleanup pass'
    );
  });

  it('should reject duplicate names', () => {
    expect(() => createPipeline([flattenBlocks, flattenBlocks])).toThrow('Pass flatten-blocks is registered twice');
  });

  it('should reject disabling a pass that is not in the list', () => {
    expect(() => createPipeline([flattenBlocks], { disabledPasses: ['nope'] })).toThrow(
      'Cannot disable unknown pass nope'
    );
  });

  it('should wrap a failing pass with its name', () => {
    const failing: Pass = {
      name: 'boom',
      tier: 'cleanup',
      description: 'always throws',
      run() {
        throw new Error('bad tree');
      },
    };
    const pipeline = createPipeline([failing]);
    expect(() => pipeline.run(int(1))).toThrow(PipelineError);
    expect(() => pipeline.run(int(1))).toThrow('Pass boom failed: bad tree');
  });

  it('should skip disabled passes', () => {
    const tree = binary('<>', str('a'), ref('x'));
    const { tree: result } = createPipeline(defaultPasses(), { disabledPasses: ['string-interpolation'] }).run(tree);
    expect(dump(result)).toBe('(<> "a" x)');
  });

  it('should tag diagnostics with the pass name and forward them to the sink', () => {
    const sink = new DiagnosticCollector();
    const tree = block(returning(int(1)), call('a'));
    const { diagnostics } = createPipeline([flattenBlocks, earlyReturn]).run(tree, sink);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].pass).toBe('early-return');
    expect(sink.diagnostics).toEqual(diagnostics);
  });

  it('should log one line per pass when tracing', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    createPipeline([flattenBlocks], { trace: true }).run(int(1));
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatch(/^\[reshape\] structural\/flatten-blocks \d+\.\d{2}ms$/);
  });

  it('should report invariant violations when verifying', () => {
    const { diagnostics } = createPipeline([flattenBlocks], { verify: true }).run(block(int(1), ref('y')));
    expect(diagnostics.map((d) => [d.severity, d.code])).toEqual([
      ['error', 'unbound-reference'],
      ['error', 'unused-literal'],
    ]);
  });
});
