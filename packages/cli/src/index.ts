/**
 * @reshape/cli - run the normalization pipeline over IR trees in JSON
 *
 *   reshape normalize tree.json --dump
 *   reshape check tree.json
 *   reshape passes
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { Command, CommanderError } from 'commander';
import type { ChalkInstance } from 'chalk';
import { dump, encodeTree, parseTree, type IRNode } from '@reshape/ir';
import { DiagnosticCollector, type Diagnostic } from '@reshape/analysis';
import { checkInvariants, createPipeline, defaultPasses, normalize } from '@reshape/passes';
import { loadConfig } from './config.js';
import { createPainter, formatDiagnostic } from './report.js';

export { loadConfig, configSchema, ConfigError, DEFAULT_CONFIG_NAME, type ReshapeConfig } from './config.js';
export { createPainter, formatDiagnostic } from './report.js';

const VERSION = '0.1.0';

/** Anything with a write method: process streams, or a collector in tests */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliOptions {
  cwd?: string;
  stdout?: OutputStream;
  stderr?: OutputStream;
  color?: boolean;
}

interface NormalizeCommandOptions {
  output?: string;
  dump?: boolean;
  check?: boolean;
  config?: string;
}

interface ConfigOption {
  config?: string;
}

interface Io {
  cwd: string;
  stdout: OutputStream;
  stderr: OutputStream;
  chalk: ChalkInstance;
}

function readTree(file: string, io: Io): IRNode {
  return parseTree(readFileSync(resolve(io.cwd, file), 'utf8'));
}

function report(diagnostics: readonly Diagnostic[], io: Io): void {
  for (const diagnostic of diagnostics) {
    io.stderr.write(`${formatDiagnostic(diagnostic, io.chalk)}\n`);
  }
}

function normalizeCommand(file: string, opts: NormalizeCommandOptions, io: Io): number {
  const config = loadConfig(io.cwd, opts.config);
  const { tree, diagnostics } = normalize(readTree(file, io), {
    ...config,
    verify: config.verify === true || opts.check === true,
  });

  const output = opts.dump ? `${dump(tree)}\n` : `${encodeTree(tree)}\n`;
  if (opts.output) {
    writeFileSync(resolve(io.cwd, opts.output), output);
  } else {
    io.stdout.write(output);
  }

  report(diagnostics, io);
  return opts.check && diagnostics.some((d) => d.severity === 'error') ? 1 : 0;
}

function checkCommand(file: string, opts: ConfigOption, io: Io): number {
  // validates the config even though only the tree is inspected
  loadConfig(io.cwd, opts.config);
  const collector = new DiagnosticCollector();
  const errors = checkInvariants(readTree(file, io), collector);

  report(collector.diagnostics, io);
  if (errors > 0) return 1;
  io.stdout.write(`${file}: no invariant violations\n`);
  return 0;
}

function passesCommand(opts: ConfigOption, io: Io): number {
  const pipeline = createPipeline(defaultPasses(), loadConfig(io.cwd, opts.config));
  const disabled = new Set(pipeline.options.disabledPasses);

  for (const pass of pipeline.passes) {
    // pad before painting: escape codes count towards the width
    const off = disabled.has(pass.name);
    const name = (off ? `${pass.name} (disabled)` : pass.name).padEnd(32);
    io.stdout.write(`${pass.tier.padEnd(11)}${off ? io.chalk.dim(name) : name}${pass.description}\n`);
  }
  return 0;
}

export async function run(args: string[], options: CliOptions = {}): Promise<number> {
  const io: Io = {
    cwd: options.cwd ?? process.cwd(),
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    chalk: createPainter(options.color ?? false),
  };
  let exitCode = 0;

  const program = new Command();

  program
    .name('reshape')
    .version(VERSION)
    .description('Normalize lowered IR trees into idiomatic, compilable form')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });

  program
    .command('normalize <file>')
    .description('Run the pass pipeline over an IR tree')
    .option('-o, --output <path>', 'Write the tree to a file instead of stdout')
    .option('--dump', 'Print the tree as an S-expression instead of JSON')
    .option('--check', 'Check output invariants and exit with 1 on violations')
    .option('-c, --config <path>', 'Path to a reshape.json config file')
    .action((file: string, opts: NormalizeCommandOptions) => {
      exitCode = normalizeCommand(file, opts, io);
    });

  program
    .command('check <file>')
    .description('Report invariant violations in an IR tree without rewriting it')
    .option('-c, --config <path>', 'Path to a reshape.json config file')
    .action((file: string, opts: ConfigOption) => {
      exitCode = checkCommand(file, opts, io);
    });

  program
    .command('passes')
    .description('List the configured passes in pipeline order')
    .option('-c, --config <path>', 'Path to a reshape.json config file')
    .action((opts: ConfigOption) => {
      exitCode = passesCommand(opts, io);
    });

  try {
    await program.parseAsync(args, { from: 'user' });
    return exitCode;
  } catch (error) {
    // commander has already printed its own message
    if (error instanceof CommanderError) return error.exitCode;
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
