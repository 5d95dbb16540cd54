/**
 * Usage Index - "is name X read in statements[i..n)" for a statement sequence
 *
 * Built with one backward scan. Per name it keeps the ascending positions of
 * the statements that read it and of the statement-level bindings that write
 * it; every query is a lookup or a binary search over those lists.
 */

import type { IRNode } from '@reshape/ir';
import { boundNames, referencedNames } from './scope.js';

/**
 * Names read after a statement sequence ends
 */
export interface LiveSet {
  has(name: string): boolean;
}

export const NOTHING_LIVE: LiveSet = { has: () => false };

export interface UsageIndexOptions {
  liveOut?: LiveSet;
  /** Called once for every node the scan visits */
  onVisit?: (node: IRNode) => void;
}

export class UsageIndex {
  private constructor(
    readonly length: number,
    private readonly reads: Map<string, number[]>,
    private readonly writes: Map<string, number[]>,
    readonly liveOut: LiveSet
  ) {}

  static build(statements: readonly IRNode[], options: UsageIndexOptions = {}): UsageIndex {
    const reads = new Map<string, number[]>();
    const writes = new Map<string, number[]>();

    for (let i = statements.length - 1; i >= 0; i--) {
      const statement = statements[i];
      for (const name of referencedNames(statement, options.onVisit)) {
        append(reads, name, i);
      }
      if (statement.kind === 'bind') {
        for (const name of boundNames(statement.pattern)) append(writes, name, i);
      }
    }

    // positions were pushed in descending order
    reads.forEach((positions) => positions.reverse());
    writes.forEach((positions) => positions.reverse());

    return new UsageIndex(statements.length, reads, writes, options.liveOut ?? NOTHING_LIVE);
  }

  /**
   * Read in statements[i..n), or live after the sequence
   */
  usedFrom(i: number, name: string): boolean {
    const positions = this.reads.get(name);
    if (positions && positions[positions.length - 1] >= i) return true;
    return this.liveOut.has(name);
  }

  /**
   * Like usedFrom, but a statement-level rebinding of the name ends the
   * search: the value bound before it can no longer be observed.
   */
  readBeforeRebind(i: number, name: string): boolean {
    const read = this.nextRead(i, name);
    const write = this.nextWrite(i, name);
    if (read !== undefined) return write === undefined || read <= write;
    return write === undefined && this.liveOut.has(name);
  }

  nextRead(i: number, name: string): number | undefined {
    return firstAtOrAfter(this.reads.get(name), i);
  }

  nextWrite(i: number, name: string): number | undefined {
    return firstAtOrAfter(this.writes.get(name), i);
  }

  /**
   * Names read in statements[i..n); the live-out set is not enumerable
   */
  namesFrom(i: number): Set<string> {
    const names = new Set<string>();
    this.reads.forEach((positions, name) => {
      if (positions[positions.length - 1] >= i) names.add(name);
    });
    return names;
  }

  /**
   * Live set seen from inside statement i: everything read after it
   */
  liveAfter(i: number): LiveSet {
    return { has: (name) => this.usedFrom(i + 1, name) };
  }
}

/**
 * Whether `name` is read in statements[i..n) or after the sequence
 */
export function usedLater(index: UsageIndex, i: number, name: string): boolean {
  return index.usedFrom(i, name);
}

function append(map: Map<string, number[]>, name: string, position: number): void {
  const positions = map.get(name);
  if (positions) {
    if (positions[positions.length - 1] !== position) positions.push(position);
  } else {
    map.set(name, [position]);
  }
}

function firstAtOrAfter(positions: number[] | undefined, i: number): number | undefined {
  if (!positions) return undefined;
  let lo = 0;
  let hi = positions.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (positions[mid] < i) lo = mid + 1;
    else hi = mid;
  }
  return lo < positions.length ? positions[lo] : undefined;
}
