import fs from 'node:fs';
import path from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { toRelativePath } from '../utils/file-scanner.js';

/**
 * Executable lines of one file, split into a partition: a line is in exactly
 * one of `covered` and `uncovered`, and non-executable lines are in neither.
 */
export interface FileCoverage {
  file: string;
  covered: Set<number>;
  uncovered: Set<number>;
}

export type CoverageMap = Map<string, FileCoverage>;

export type CoverageFormat = 'cobertura' | 'istanbul';

// fast-xml-parser turns an empty element such as `<lines/>` into ''
const emptyElement = <T extends z.ZodTypeAny>(schema: T) => z.preprocess((v) => (v === '' ? {} : v), schema);

const CoberturaLineSchema = z.object({
  number: z.coerce.number().int().positive(),
  hits: z.coerce.number().int().min(0),
});

const CoberturaClassSchema = z.object({
  filename: z.coerce.string(),
  lines: emptyElement(z.object({ line: z.array(CoberturaLineSchema).default([]) })).default({}),
});

const CoberturaSchema = z.object({
  coverage: z.object({
    sources: emptyElement(z.object({ source: z.array(z.coerce.string()).default([]) })).optional(),
    packages: emptyElement(
      z.object({
        package: z
          .array(z.object({ classes: emptyElement(z.object({ class: z.array(CoberturaClassSchema).default([]) })).default({}) }))
          .default([]),
      })
    ).default({}),
  }),
});

const IstanbulFileSchema = z.object({
  path: z.string().optional(),
  statementMap: z.record(z.object({ start: z.object({ line: z.number().int() }) })),
  s: z.record(z.number()),
});

const IstanbulSchema = z.record(IstanbulFileSchema);

const ARRAY_TAGS = new Set(['package', 'class', 'line', 'source']);

function firstIssue(error: z.ZodError): string {
  const issue = error.errors[0];
  return issue ? `${issue.path.join('.') || '/'}: ${issue.message}` : 'unknown error';
}

/**
 * Collapse raw per-line hit counts into the covered/uncovered partition.
 * A line reported more than once is covered if any report hit it.
 */
function addHits(map: CoverageMap, file: string, hits: Iterable<[number, number]>): void {
  const entry = map.get(file) ?? { file, covered: new Set<number>(), uncovered: new Set<number>() };
  for (const [line, count] of hits) {
    if (count > 0) {
      entry.covered.add(line);
      entry.uncovered.delete(line);
    } else if (!entry.covered.has(line)) {
      entry.uncovered.add(line);
    }
  }
  map.set(file, entry);
}

function normalizeReportedPath(filename: string, sources: string[], rootDir: string): string {
  if (path.isAbsolute(filename)) return toRelativePath(rootDir, filename);
  for (const source of sources) {
    const candidate = toRelativePath(rootDir, path.resolve(rootDir, source, filename));
    if (!candidate.startsWith('..')) return candidate;
  }
  return filename.split(path.sep).join('/');
}

/**
 * Parse a Cobertura XML report (coverage.py `coverage xml`, c8/istanbul
 * `cobertura` reporter). Paths are made root-relative through `<sources>`.
 */
export function parseCoberturaXml(xml: string, rootDir: string): CoverageMap {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(name),
  });

  const result = CoberturaSchema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new Error(`Invalid Cobertura report (${firstIssue(result.error)})`);
  }

  const { coverage } = result.data;
  const sources = coverage.sources?.source ?? [];
  const map: CoverageMap = new Map();

  for (const pkg of coverage.packages.package) {
    for (const cls of pkg.classes.class) {
      const file = normalizeReportedPath(cls.filename, sources, rootDir);
      addHits(
        map,
        file,
        cls.lines.line.map((l): [number, number] => [l.number, l.hits])
      );
    }
  }
  return map;
}

/**
 * Parse an Istanbul `coverage-final.json`. Hits are taken per statement
 * start line, keeping the highest count when statements share a line.
 */
export function parseIstanbulJson(data: unknown, rootDir: string): CoverageMap {
  const result = IstanbulSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid Istanbul report (${firstIssue(result.error)})`);
  }

  const map: CoverageMap = new Map();
  for (const [key, entry] of Object.entries(result.data)) {
    const file = normalizeReportedPath(entry.path ?? key, [], rootDir);
    const lineHits = new Map<number, number>();
    for (const [id, location] of Object.entries(entry.statementMap)) {
      const count = entry.s[id] ?? 0;
      const line = location.start.line;
      lineHits.set(line, Math.max(lineHits.get(line) ?? 0, count));
    }
    addHits(map, file, lineHits);
  }
  return map;
}

export function detectCoverageFormat(reportPath: string, content: string): CoverageFormat {
  if (reportPath.endsWith('.json') || content.trimStart().startsWith('{')) return 'istanbul';
  return 'cobertura';
}

export function readCoverageReport(reportPath: string, rootDir: string): CoverageMap {
  const content = fs.readFileSync(reportPath, 'utf-8');
  if (detectCoverageFormat(reportPath, content) === 'istanbul') {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Coverage report ${reportPath} is not valid JSON`, { cause: error });
    }
    return parseIstanbulJson(data, rootDir);
  }
  return parseCoberturaXml(content, rootDir);
}
