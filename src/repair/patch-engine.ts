import fs from 'node:fs';
import path from 'node:path';
import { stripParameters } from '../context/repair-context.js';
import { extractCodeBlock } from '../llm/response-parsing.js';
import { getFrontEnd } from '../parser/front-ends.js';
import { getErrorMessage } from '../utils/helpers.js';
import type { LineRange } from '../utils/line-range.js';

export type PatchReason =
  | 'patched'
  | 'unreadable file'
  | 'unsupported file'
  | 'original does not parse'
  | 'empty replacement'
  | 'unit not found'
  | 'write failed'
  | 'patched file does not parse'
  | 'verification failed'
  | 'test still fails';

export interface PatchOutcome {
  targetSymbol: string;
  file: string;
  /** The file was written at least once. */
  applied: boolean;
  /** The patched file parsed (and, when verified, the test passed) and was kept. */
  validated: boolean;
  reason: PatchReason;
  detail?: string;
}

export interface VerificationResult {
  passed: boolean;
  output: string;
}

export interface PatchRequest {
  rootDir: string;
  /** Root-relative path of the file to patch. */
  file: string;
  unitName: string;
  /** Enclosing class or describe block. */
  container?: string;
  /** Replacement unit, optionally wrapped in a code fence. */
  replacement: string;
  /** Re-run the patched test; null means it cannot be run on its own. */
  verify?: () => Promise<VerificationResult | null>;
}

/**
 * Re-indent `code` so its least-indented line starts with `indent`.
 * Leading and trailing blank lines are dropped, inner blank lines emptied.
 */
export function normalizeIndentation(code: string, indent: string): string[] {
  const lines = code.replace(/\r\n/g, '\n').split('\n');
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();

  const widths = lines.filter((line) => line.trim() !== '').map((line) => /^[ \t]*/.exec(line)?.[0].length ?? 0);
  const common = widths.length > 0 ? Math.min(...widths) : 0;

  return lines.map((line) => (line.trim() === '' ? '' : indent + line.slice(common)));
}

/** Replace the lines of `range` (1-based, half-open) with `replacement`. */
export function spliceLines(lines: string[], range: LineRange, replacement: string[]): string[] {
  return [...lines.slice(0, range.start - 1), ...replacement, ...lines.slice(range.end - 1)];
}

/**
 * Replace one unit of a source file and keep the result only if it still
 * parses (and, with `verify`, the test passes). Otherwise the original bytes
 * are written back.
 */
export async function applyPatch(request: PatchRequest): Promise<PatchOutcome> {
  const { rootDir, file, unitName, container, replacement, verify } = request;
  const absolute = path.join(rootDir, file);
  const outcome = (applied: boolean, validated: boolean, reason: PatchReason, detail?: string): PatchOutcome => ({
    targetSymbol: unitName,
    file,
    applied,
    validated,
    reason,
    ...(detail !== undefined && { detail }),
  });

  const frontEnd = getFrontEnd(file);
  if (!frontEnd) return outcome(false, false, 'unsupported file');

  let original: Buffer;
  try {
    original = fs.readFileSync(absolute);
  } catch (error) {
    return outcome(false, false, 'unreadable file', getErrorMessage(error));
  }

  const text = original.toString('utf-8');
  const parsed = frontEnd.parseFile(text, file);
  if (parsed.syntaxError) {
    return outcome(false, false, 'original does not parse', `line ${parsed.syntaxError.line}`);
  }

  const code = extractCodeBlock(replacement, [frontEnd.fenceLanguage, frontEnd.language]);
  if (code.trim() === '') return outcome(false, false, 'empty replacement');

  const unit = frontEnd.locateUnit(parsed.root, stripParameters(unitName), container);
  if (!unit) return outcome(false, false, 'unit not found');

  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const lines = text.split(/\r?\n/);
  const indent = /^[ \t]*/.exec(lines[unit.range.start - 1] ?? '')?.[0] ?? '';
  const patched = spliceLines(lines, unit.range, normalizeIndentation(code, indent)).join(eol);

  const restore = (): void => fs.writeFileSync(absolute, original);

  try {
    fs.writeFileSync(absolute, patched, 'utf-8');
  } catch (error) {
    restore();
    return outcome(false, false, 'write failed', getErrorMessage(error));
  }

  const check = frontEnd.parseFile(fs.readFileSync(absolute, 'utf-8'), file);
  if (check.syntaxError) {
    restore();
    return outcome(true, false, 'patched file does not parse', `line ${check.syntaxError.line}`);
  }

  if (verify) {
    let verification: VerificationResult | null;
    try {
      verification = await verify();
    } catch (error) {
      restore();
      return outcome(true, false, 'verification failed', getErrorMessage(error));
    }
    if (verification && !verification.passed) {
      restore();
      return outcome(true, false, 'test still fails', verification.output);
    }
  }

  return outcome(true, true, 'patched');
}
