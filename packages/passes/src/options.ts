/**
 * Pipeline configuration
 */

export interface NormalizeOptions {
  /** Preferred names when several undefined names could take a payload binder */
  tieBreakPriority?: readonly string[];
  /** Binder names the target language rejects */
  reservedWords?: readonly string[];
  /** Appended (repeatedly, until unique) to a reserved binder name */
  reservedSuffix?: string;
  /** Modules whose calls are sequence/aggregation operations */
  collectionModules?: readonly string[];
  /** Binder for values kept only for their side effect */
  discardName?: string;
  /** Minimum nesting of first-argument remote calls turned into a pipeline */
  pipelineMinDepth?: number;
  disabledPasses?: readonly string[];
  /** Check output invariants and report violations as error diagnostics */
  verify?: boolean;
  /** Log one line per pass with its duration */
  trace?: boolean;
}

export type ResolvedOptions = Required<NormalizeOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  tieBreakPriority: ['id', 'key', 'value', 'result', 'data', 'item', 'reason', 'error'],
  reservedWords: [
    'after', 'and', 'case', 'catch', 'cond', 'def', 'defp', 'defmodule', 'do', 'else',
    'end', 'false', 'fn', 'for', 'if', 'in', 'nil', 'not', 'or', 'receive', 'rescue',
    'true', 'try', 'unless', 'when', 'with',
  ],
  reservedSuffix: '_',
  collectionModules: ['Enum', 'Stream', 'Map', 'List', 'Keyword', 'MapSet'],
  discardName: '_',
  pipelineMinDepth: 2,
  disabledPasses: [],
  verify: false,
  trace: false,
};

export function resolveOptions(options?: NormalizeOptions): ResolvedOptions {
  return { ...DEFAULT_OPTIONS, ...options };
}
