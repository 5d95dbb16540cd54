import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { def, block, bind, call, ref, field, int, dump, parseTree } from '@reshape/ir';
import { run } from '../src/index.js';
import { Collector, makeTempDir, writeConfig, writeTree } from './helpers.js';

describe('reshape cli', () => {
  let cwd: string;
  let stdout: Collector;
  let stderr: Collector;

  const reshape = (...args: string[]): Promise<number> => run(args, { cwd, stdout, stderr });

  beforeEach(() => {
    cwd = makeTempDir();
    stdout = new Collector();
    stderr = new Collector();
    writeTree(cwd, 'greet.json', def('greet', ['u'], call('send', field(ref('user'), 'email'))));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  describe('normalize', () => {
    it('should print the normalized tree as JSON', async () => {
      expect(await reshape('normalize', 'greet.json')).toBe(0);
      expect(dump(parseTree(stdout.text))).toBe('(def greet (user) (send (field user email)))');
      expect(stderr.text).toBe('');
    });

    it('should print an S-expression with --dump', async () => {
      expect(await reshape('normalize', 'greet.json', '--dump')).toBe(0);
      expect(stdout.text).toBe('(def greet (user) (send (field user email)))\n');
    });

    it('should write to the output file', async () => {
      expect(await reshape('normalize', 'greet.json', '-o', 'out.json')).toBe(0);
      expect(stdout.text).toBe('');
      const written = readFileSync(join(cwd, 'out.json'), 'utf8');
      expect(dump(parseTree(written))).toBe('(def greet (user) (send (field user email)))');
    });

    it('should fail --check when a reference stays unbound', async () => {
      writeTree(cwd, 'unbound.json', def('f', [], call('g', ref('y'))));
      expect(await reshape('normalize', 'unbound.json', '--dump', '--check')).toBe(1);
      expect(stdout.text).toBe('(def f () (g y))\n');
      expect(stderr.text).toBe('error unbound-reference: Reference to unbound name y\n');
    });

    it('should report but not fail without --check when verify is configured', async () => {
      writeConfig(cwd, { verify: true });
      writeTree(cwd, 'unbound.json', def('f', [], call('g', ref('y'))));
      expect(await reshape('normalize', 'unbound.json', '--dump')).toBe(0);
      expect(stderr.text).toBe('error unbound-reference: Reference to unbound name y\n');
    });

    it('should apply reshape.json from the working directory', async () => {
      writeConfig(cwd, { reservedSuffix: '0' });
      writeTree(cwd, 'reserved.json', def('f', ['x'], block(bind('case', call('g', ref('x'))), call('h', ref('case')))));
      expect(await reshape('normalize', 'reserved.json', '--dump')).toBe(0);
      expect(stdout.text).toBe('(def f (x) (block (= case0 (g x)) (h case0)))\n');
    });

    it('should take an explicit config path', async () => {
      writeConfig(cwd, { reservedSuffix: '1' }, 'custom.json');
      writeTree(cwd, 'reserved.json', def('f', ['x'], block(bind('case', call('g', ref('x'))), call('h', ref('case')))));
      expect(await reshape('normalize', 'reserved.json', '--dump', '-c', 'custom.json')).toBe(0);
      expect(stdout.text).toBe('(def f (x) (block (= case1 (g x)) (h case1)))\n');
    });

    it('should reject an invalid config', async () => {
      writeConfig(cwd, { pipelineMinDepth: 1 });
      expect(await reshape('normalize', 'greet.json')).toBe(1);
      expect(stdout.text).toBe('');
      expect(stderr.text).toMatch(/^Invalid reshape\.json: pipelineMinDepth: /);
    });

    it('should reject input that is not JSON', async () => {
      writeFileSync(join(cwd, 'broken.json'), '{ nope');
      expect(await reshape('normalize', 'broken.json')).toBe(1);
      expect(stderr.text).toMatch(/^Invalid JSON: /);
    });
  });

  describe('check', () => {
    it('should accept a clean tree', async () => {
      writeTree(cwd, 'clean.json', def('f', ['x'], call('g', ref('x'))));
      expect(await reshape('check', 'clean.json')).toBe(0);
      expect(stdout.text).toBe('clean.json: no invariant violations\n');
      expect(stderr.text).toBe('');
    });

    it('should flag a bare literal in statement position', async () => {
      writeTree(cwd, 'literal.json', def('f', [], block(int(1), call('g'))));
      expect(await reshape('check', 'literal.json')).toBe(1);
      expect(stdout.text).toBe('');
      expect(stderr.text).toBe('error unused-literal: Unused literal in statement position 0\n');
    });
  });

  describe('passes', () => {
    it('should list every pass in pipeline order', async () => {
      expect(await reshape('passes')).toBe(0);
      const lines = stdout.text.trimEnd().split('\n');
      expect(lines).toHaveLength(21);
      expect(lines[0]).toMatch(/^structural flatten-blocks {18}\S/);
      expect(lines[20]).toMatch(/^cleanup {4}reserved-word-sanitization {6}\S/);
    });

    it('should mark disabled passes', async () => {
      writeConfig(cwd, { disabledPasses: ['string-interpolation'] });
      expect(await reshape('passes')).toBe(0);
      const marked = stdout.text.split('\n').filter((line) => line.includes('(disabled)'));
      expect(marked).toHaveLength(1);
      expect(marked[0]).toMatch(/^cleanup {4}string-interpolation \(disabled\) /);
    });

    it('should keep the columns aligned when disabled passes are dimmed', async () => {
      writeConfig(cwd, { disabledPasses: ['string-interpolation'] });
      expect(await run(['passes'], { cwd, stdout, stderr, color: true })).toBe(0);
      const marked = stdout.text.split('\n').filter((line) => line.includes('(disabled)'));
      expect(marked).toEqual([
        'cleanup    \u001b[2mstring-interpolation (disabled) \u001b[22m' +
          'Rewrite `<>` concatenations of strings and values as interpolation',
      ]);
    });

    it('should fail on an unknown disabled pass', async () => {
      writeConfig(cwd, { disabledPasses: ['nope'] });
      expect(await reshape('passes')).toBe(1);
      expect(stderr.text).toBe('Cannot disable unknown pass nope\n');
    });
  });

  it('should print the version', async () => {
    expect(await reshape('--version')).toBe(0);
    expect(stdout.text).toBe('0.1.0\n');
  });

  it('should exit with 1 on an unknown command', async () => {
    expect(await reshape('frobnicate')).toBe(1);
    expect(stderr.text).toContain("unknown command 'frobnicate'");
  });
});
