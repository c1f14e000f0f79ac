import type { GenerationMode } from '../config.js';
import type { GapRecord } from '../coverage/gap-mapper.js';
import { type SymbolIndex, getSymbol, symbolKey } from '../indexer/symbol-indexer.js';
import type { CodeSymbol, Route } from '../parser/front-end.js';

export interface GenerationTarget {
  symbol: CodeSymbol;
  /** Empty when targets were selected without coverage data. */
  uncoveredLines: number[];
  route?: Route;
}

export interface Shard {
  index: number;
  targets: GenerationTarget[];
  /** Files containing the shard's targets, in first-seen order. */
  files: string[];
}

function unitCandidates(index: SymbolIndex): GenerationTarget[] {
  // Methods and nested functions are exercised through their top-level owner
  return index.symbols
    .filter((s) => (s.kind === 'function' || s.kind === 'class') && s.parent === undefined)
    .map((symbol) => ({ symbol, uncoveredLines: [] }));
}

function e2eCandidates(index: SymbolIndex): GenerationTarget[] {
  const seen = new Set<string>();
  const targets: GenerationTarget[] = [];
  for (const route of index.routes) {
    const symbol = getSymbol(index, route.file, route.symbolName);
    if (!symbol) continue;
    const key = symbolKey(symbol);
    if (seen.has(key)) continue;
    seen.add(key);
    targets.push({ symbol, uncoveredLines: [], route });
  }
  return targets;
}

/**
 * Pick generation targets for `mode` in discovery order. With `gaps`, only
 * symbols that have uncovered lines are kept.
 */
export function selectTargets(index: SymbolIndex, mode: GenerationMode, gaps?: GapRecord[]): GenerationTarget[] {
  const candidates = mode === 'e2e' ? e2eCandidates(index) : unitCandidates(index);
  if (!gaps) return candidates;

  const gapLines = new Map(gaps.map((gap) => [symbolKey(gap.symbol), gap.uncoveredLines]));
  const selected: GenerationTarget[] = [];
  for (const target of candidates) {
    const lines = gapLines.get(symbolKey(target.symbol));
    if (lines) selected.push({ ...target, uncoveredLines: lines });
  }
  return selected;
}

/**
 * Split targets into `max(1, ceil(n / batchSize))` contiguous shards.
 * Zero targets still yield one (empty) shard.
 */
export function shardTargets(targets: GenerationTarget[], batchSize: number): Shard[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const count = Math.max(1, Math.ceil(targets.length / batchSize));
  const shards: Shard[] = [];
  for (let i = 0; i < count; i++) {
    const slice = targets.slice(i * batchSize, (i + 1) * batchSize);
    shards.push({ index: i, targets: slice, files: [...new Set(slice.map((t) => t.symbol.file))] });
  }
  return shards;
}
