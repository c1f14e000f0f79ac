import { symbolRange } from '../indexer/symbol-indexer.js';
import type { CodeSymbol } from '../parser/front-end.js';
import { calculatePercentage } from '../utils/helpers.js';
import type { CoverageMap } from './coverage-report.js';

export interface GapRecord {
  symbol: CodeSymbol;
  /** Ascending, each inside the symbol's range. */
  uncoveredLines: number[];
}

export interface CoverageSummaryRow {
  file: string;
  covered: number;
  total: number;
  percentage: number;
}

export interface CoverageSummary {
  files: CoverageSummaryRow[];
  covered: number;
  total: number;
  percentage: number;
}

/**
 * Intersect every symbol's line range with its file's uncovered lines.
 * Nested symbols are checked on their own, so a line uncovered inside a
 * method also counts toward its class.
 */
export function mapCoverageGaps(symbols: CodeSymbol[], coverage: CoverageMap): GapRecord[] {
  const gaps: GapRecord[] = [];
  for (const symbol of symbols) {
    const fileCoverage = coverage.get(symbol.file);
    if (!fileCoverage || fileCoverage.uncovered.size === 0) continue;

    const uncoveredLines = symbolRange(symbol).intersectLines(fileCoverage.uncovered);
    if (uncoveredLines.length > 0) {
      gaps.push({ symbol, uncoveredLines });
    }
  }
  return gaps;
}

export function summarizeCoverage(coverage: CoverageMap): CoverageSummary {
  const files = [...coverage.values()]
    .map((entry) => {
      const total = entry.covered.size + entry.uncovered.size;
      return {
        file: entry.file,
        covered: entry.covered.size,
        total,
        percentage: calculatePercentage(entry.covered.size, total),
      };
    })
    .sort((a, b) => a.file.localeCompare(b.file));

  const covered = files.reduce((sum, row) => sum + row.covered, 0);
  const total = files.reduce((sum, row) => sum + row.total, 0);
  return { files, covered, total, percentage: calculatePercentage(covered, total) };
}
