import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { encodeTree, type IRNode } from '@reshape/ir';
import type { OutputStream } from '../src/index.js';

export class Collector implements OutputStream {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'reshape-cli-'));
}

export function writeTree(dir: string, name: string, tree: IRNode): void {
  writeFileSync(join(dir, name), encodeTree(tree));
}

export function writeConfig(dir: string, config: unknown, name = 'reshape.json'): void {
  writeFileSync(join(dir, name), JSON.stringify(config));
}
