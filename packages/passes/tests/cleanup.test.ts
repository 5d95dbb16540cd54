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
  interp,
  call,
  remote,
  binary,
  unary,
  ifThen,
  lambda,
  def,
  pWild,
  sentinel,
} from '@reshape/ir';
import { selfRebindRemoval } from '../src/cleanup/self-rebind-removal.js';
import { deadPureBinding } from '../src/cleanup/dead-pure-binding.js';
import { pureStatementElimination } from '../src/cleanup/pure-statement-elimination.js';
import { deadSentinelElimination } from '../src/cleanup/dead-sentinel-elimination.js';
import { tempVariableInline } from '../src/cleanup/temp-variable-inline.js';
import { redundantElseNil } from '../src/cleanup/redundant-else-nil.js';
import { stringInterpolation } from '../src/cleanup/string-interpolation.js';
import { pipelineFormation } from '../src/cleanup/pipeline-formation.js';
import { blockUnwrap } from '../src/cleanup/block-unwrap.js';
import { reservedWordSanitization } from '../src/cleanup/reserved-word-sanitization.js';
import { runPass } from './helpers.js';

describe('self-rebind-removal', () => {
  it('should drop a self rebind in the middle of a block', () => {
    expect(runPass(selfRebindRemoval, block(bind('x', ref('x')), call('f', ref('x')))).text).toBe('(block (f x))');
  });

  it('should keep the value of a trailing self rebind', () => {
    expect(runPass(selfRebindRemoval, block(call('f'), bind('x', ref('x')))).text).toBe('(block (f) x)');
  });
});

describe('dead-pure-binding', () => {
  it('should drop an unread binding of a pure value', () => {
    const tree = def('f', ['a'], block(bind('t', binary('==', ref('a'), int(1))), call('g', ref('a'))));
    expect(runPass(deadPureBinding, tree).text).toBe('(def f (a) (block (g a)))');
  });

  it('should keep arithmetic, which raises on a non-number', () => {
    const tree = def('f', ['a'], block(bind('t', binary('+', ref('a'), int(1))), call('g', ref('a'))));
    expect(runPass(deadPureBinding, tree).tree).toBe(tree);
  });

  it('should keep a strict boolean operator and a negation', () => {
    const strict = def('f', ['a'], block(bind('t', binary('and', ref('a'), ref('a'))), call('g', ref('a'))));
    expect(runPass(deadPureBinding, strict).tree).toBe(strict);
    const negated = def('f', ['a'], block(bind('t', unary('-', ref('a'))), call('g', ref('a'))));
    expect(runPass(deadPureBinding, negated).tree).toBe(negated);
  });

  it('should keep a division, which can raise', () => {
    const tree = def('f', ['a'], block(bind('t', binary('/', ref('a'), int(2))), call('g', ref('a'))));
    expect(runPass(deadPureBinding, tree).tree).toBe(tree);
  });

  it('should drop a pure value bound to the wildcard', () => {
    const tree = def('f', ['a'], block(bind(pWild(), ref('a')), call('g')));
    expect(runPass(deadPureBinding, tree).text).toBe('(def f (a) (block (g)))');
  });

  it('should keep a binding that is read', () => {
    const tree = def('f', [], block(bind('t', int(1)), call('g', ref('t'))));
    expect(runPass(deadPureBinding, tree).tree).toBe(tree);
  });
});

describe('pure-statement-elimination', () => {
  it('should drop side-effect-free statements but not the last one', () => {
    const tree = block(ref('x'), str('s'), call('f'), int(0), lambda(['y'], ref('y')), ref('z'));
    expect(runPass(pureStatementElimination, tree).text).toBe('(block (f) 0 z)');
  });
});

describe('dead-sentinel-elimination', () => {
  it('should drop numeric, nil and sentinel literals before the last statement', () => {
    const tree = block(int(0), call('f'), nil(), sentinel(atom('undefined')), atom('ok'), float(1), int(2));
    expect(runPass(deadSentinelElimination, tree).text).toBe('(block (f) :ok 2)');
  });

  it('should keep a terminal literal', () => {
    const tree = block(call('f'), nil());
    expect(runPass(deadSentinelElimination, tree).tree).toBe(tree);
  });
});

describe('temp-variable-inline', () => {
  it('should return the expression instead of the temporary', () => {
    expect(runPass(tempVariableInline, block(call('a'), bind('t', call('b')), ref('t'))).text).toBe('(block (a) (b))');
  });

  it('should repeat through chains of temporaries', () => {
    const tree = block(bind('u', call('b')), bind('t', ref('u')), ref('t'));
    expect(runPass(tempVariableInline, tree).text).toBe('(block (b))');
  });
});

describe('redundant-else-nil', () => {
  it('should drop an else branch that is nil', () => {
    const { tree, text } = runPass(redundantElseNil, ifThen(ref('c'), call('a'), nil()));
    expect(text).toBe('(if c (a))');
    expect('else' in tree).toBe(false);
  });
});

describe('string-interpolation', () => {
  it('should rewrite a concatenation chain as interpolation', () => {
    const tree = binary('<>', binary('<>', str('Hello '), ref('name')), str('!'));
    expect(runPass(stringInterpolation, tree).text).toBe('(interp "Hello " name "!")');
  });

  it('should unwrap to_string operands', () => {
    expect(runPass(stringInterpolation, binary('<>', str('n='), call('to_string', ref('n')))).text).toBe(
      '(interp "n=" n)'
    );
    expect(runPass(stringInterpolation, binary('<>', str('n='), remote('Kernel', 'to_string', ref('n')))).text).toBe(
      '(interp "n=" n)'
    );
  });

  it('should splice interpolations and merge adjacent text', () => {
    expect(runPass(stringInterpolation, binary('<>', interp('a', ref('x')), str('b'))).text).toBe('(interp "a" x "b")');
    const merged = binary('<>', binary('<>', str('a'), str('b')), ref('x'));
    expect(runPass(stringInterpolation, merged).text).toBe('(interp "ab" x)');
  });

  it('should leave literal-only and string-free concatenations alone', () => {
    const literals = binary('<>', str('a'), str('b'));
    const values = binary('<>', ref('a'), ref('b'));
    expect(runPass(stringInterpolation, literals).tree).toBe(literals);
    expect(runPass(stringInterpolation, values).tree).toBe(values);
  });
});

describe('pipeline-formation', () => {
  const nested = remote('Enum', 'sum', remote('Enum', 'map', ref('xs'), ref('f')));

  it('should turn nested first-argument calls into a pipeline', () => {
    expect(runPass(pipelineFormation, nested).text).toBe('(|> (|> xs (Enum.map f)) (Enum.sum))');
  });

  it('should keep the remaining arguments in order', () => {
    const tree = remote('Enum', 'map', remote('Enum', 'filter', ref('xs'), ref('p')), ref('f'));
    expect(runPass(pipelineFormation, tree).text).toBe('(|> (|> xs (Enum.filter p)) (Enum.map f))');
  });

  it('should respect the configured minimum depth', () => {
    expect(runPass(pipelineFormation, nested, { pipelineMinDepth: 3 }).tree).toBe(nested);
    const single = remote('Enum', 'sum', ref('xs'));
    expect(runPass(pipelineFormation, single).tree).toBe(single);
  });

  it('should leave an existing pipeline as it is', () => {
    const once = runPass(pipelineFormation, nested).tree;
    expect(runPass(pipelineFormation, once).tree).toBe(once);
  });
});

describe('block-unwrap', () => {
  it('should unwrap single statements and replace empty blocks with nil', () => {
    expect(runPass(blockUnwrap, ifThen(ref('c'), block(call('a')), block())).text).toBe('(if c (a) nil)');
  });
});

describe('reserved-word-sanitization', () => {
  it('should suffix a reserved binder and its references, not atoms', () => {
    const tree = def('f', ['case'], call('g', ref('case'), atom('case')));
    expect(runPass(reservedWordSanitization, tree).text).toBe('(def f (case_) (g case_ :case))');
  });

  it('should extend the suffix past names already in use', () => {
    const tree = block(bind('case', int(1)), bind('case_', int(2)), call('g', ref('case'), ref('case_')));
    expect(runPass(reservedWordSanitization, tree).text).toBe('(block (= case__ 1) (= case_ 2) (g case__ case_))');
  });

  it('should extend the suffix past reserved results', () => {
    const tree = block(bind('do', int(1)), ref('do'));
    expect(runPass(reservedWordSanitization, tree, { reservedWords: ['do', 'do_'] }).text).toBe(
      '(block (= do__ 1) do__)'
    );
  });
});
