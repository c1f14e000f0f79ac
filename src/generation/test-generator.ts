import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import type { GenerationMode } from '../config.js';
import { buildContextBundle, renderContextBundle } from '../context/generation-context.js';
import type { ModelCall } from '../llm/llm-utils.js';
import { buildGenerationSystemPrompt, buildGenerationUserPrompt } from '../llm/generation-prompts.js';
import { extractCodeBlock } from '../llm/response-parsing.js';
import type { LanguageFrontEnd } from '../parser/front-end.js';
import { frontEndFor } from '../parser/front-ends.js';
import { type SourceLanguage, collectKnownFiles, getLanguageFromExtension, toRelativePath } from '../utils/file-scanner.js';
import { getErrorMessage, groupBy } from '../utils/helpers.js';
import { type LogSink, silentSink } from '../utils/log-sink.js';
import { type GenerationTarget, type Shard, shardTargets } from './target-sharder.js';

export const DEFAULT_FRAMEWORK: Record<SourceLanguage, string> = {
  python: 'pytest',
  typescript: 'vitest',
  javascript: 'vitest',
};

export type ShardStatus = 'written' | 'dry-run' | 'rejected';

export interface ShardOutcome {
  language: SourceLanguage;
  shardIndex: number;
  /** `file::qualifiedName` of every target in the shard. */
  targets: string[];
  /** Root-relative path of the test file (planned, for dry runs and rejections). */
  testFile: string;
  status: ShardStatus;
  reason?: string;
  /** Source files left out of the prompt to respect the context budget. */
  omittedFiles: string[];
}

export interface GenerationReport {
  mode: GenerationMode;
  totalTargets: number;
  written: number;
  rejected: number;
  shards: ShardOutcome[];
}

export interface GenerationOptions {
  rootDir: string;
  mode: GenerationMode;
  targets: GenerationTarget[];
  batchSize: number;
  modelCall: ModelCall;
  maxContextChars: number;
  /** Root-relative output directory; each language's default when absent. */
  outDir?: string;
  /** Test framework name per language, overriding DEFAULT_FRAMEWORK. */
  frameworks?: Partial<Record<SourceLanguage, string>>;
  dryRun?: boolean;
  log?: LogSink;
  verbose?: boolean;
  /** Root-relative files imports may resolve to; scanned once when absent. */
  knownFiles?: ReadonlySet<string>;
}

interface ShardJob {
  language: SourceLanguage;
  frontEnd: LanguageFrontEnd;
  shard: Shard;
  testFile: string;
}

class TestFileNamer {
  private readonly next = new Map<SourceLanguage, number>();

  constructor(
    private readonly rootDir: string,
    private readonly mode: GenerationMode,
    private readonly outDir: string | undefined
  ) {}

  /** First unused generated-file path for `language`, never reused within a run. */
  claim(frontEnd: LanguageFrontEnd): string {
    const dir = this.outDir ?? frontEnd.generatedTestDir;
    let n = this.next.get(frontEnd.language) ?? 0;
    let candidate = path.posix.join(dir, frontEnd.generatedTestFileName(this.mode, n));
    while (fs.existsSync(path.resolve(this.rootDir, candidate))) {
      n++;
      candidate = path.posix.join(dir, frontEnd.generatedTestFileName(this.mode, n));
    }
    this.next.set(frontEnd.language, n + 1);
    return toRelativePath(this.rootDir, candidate);
  }
}

function targetLabel(target: GenerationTarget): string {
  return `${target.symbol.file}::${target.symbol.qualifiedName}`;
}

function planJobs(options: GenerationOptions): ShardJob[] {
  const namer = new TestFileNamer(options.rootDir, options.mode, options.outDir);
  const byLanguage = groupBy(options.targets, (t) => getLanguageFromExtension(t.symbol.file));
  const jobs: ShardJob[] = [];

  for (const [language, targets] of byLanguage) {
    if (!language) continue;
    const frontEnd = frontEndFor(language);
    for (const shard of shardTargets(targets, options.batchSize)) {
      if (shard.targets.length === 0) continue;
      jobs.push({ language, frontEnd, shard, testFile: namer.claim(frontEnd) });
    }
  }
  return jobs;
}

async function runShard(job: ShardJob, options: GenerationOptions, knownFiles: ReadonlySet<string>): Promise<ShardOutcome> {
  const { language, frontEnd, shard, testFile } = job;
  const base = {
    language,
    shardIndex: shard.index,
    targets: shard.targets.map(targetLabel),
    testFile,
  };

  const bundle = buildContextBundle(options.rootDir, shard.targets.map((t) => t.symbol), knownFiles);
  const rendered = renderContextBundle(bundle, options.maxContextChars);
  if (rendered.omittedFiles.length > 0) {
    options.log?.warn(`Shard ${shard.index + 1}: ${rendered.omittedFiles.length} file(s) left out of the prompt`);
  }

  const framework = options.frameworks?.[language] ?? DEFAULT_FRAMEWORK[language];
  const promptInput = {
    mode: options.mode,
    fenceLanguage: frontEnd.fenceLanguage,
    framework,
    testFilePath: testFile,
    targets: shard.targets,
    renderedContext: rendered.text,
  };

  let response: string;
  try {
    response = await options.modelCall(buildGenerationSystemPrompt(promptInput), buildGenerationUserPrompt(promptInput));
  } catch (error) {
    return { ...base, status: 'rejected', reason: `Model call failed: ${getErrorMessage(error)}`, omittedFiles: rendered.omittedFiles };
  }

  const code = extractCodeBlock(response, [frontEnd.fenceLanguage, language]);
  if (code.trim() === '') {
    return { ...base, status: 'rejected', reason: 'Model returned no code', omittedFiles: rendered.omittedFiles };
  }

  const parsed = frontEnd.parseFile(code, testFile);
  if (parsed.syntaxError) {
    return {
      ...base,
      status: 'rejected',
      reason: `Generated file does not parse (line ${parsed.syntaxError.line})`,
      omittedFiles: rendered.omittedFiles,
    };
  }

  if (options.dryRun) {
    return { ...base, status: 'dry-run', omittedFiles: rendered.omittedFiles };
  }

  const absolute = path.join(options.rootDir, testFile);
  fs.mkdirSync(path.dirname(absolute), { recursive: true });
  fs.writeFileSync(absolute, code.endsWith('\n') ? code : `${code}\n`, 'utf-8');
  return { ...base, status: 'written', omittedFiles: rendered.omittedFiles };
}

/**
 * Shard the targets per language and ask the model for one test file per
 * shard. Output that does not parse is rejected and never written.
 */
export async function runGeneration(options: GenerationOptions): Promise<GenerationReport> {
  const log = options.log ?? silentSink;
  const jobs = planJobs(options);
  const knownFiles = options.knownFiles ?? (await collectKnownFiles(options.rootDir));
  const shards: ShardOutcome[] = [];

  for (const [i, job] of jobs.entries()) {
    log.log(`[${i + 1}/${jobs.length}] ${job.testFile} (${job.shard.targets.length} target(s))`);
    if (options.verbose) {
      for (const target of job.shard.targets) log.log(chalk.gray(`    ${targetLabel(target)}`));
    }

    const outcome = await runShard(job, { ...options, log }, knownFiles);
    shards.push(outcome);

    if (outcome.status === 'rejected') {
      log.log(chalk.yellow(`  ✗ rejected: ${outcome.reason}`));
    } else {
      log.log(chalk.green(`  ✓ ${outcome.status === 'dry-run' ? 'valid (not written)' : 'written'}`));
    }
  }

  return {
    mode: options.mode,
    totalTargets: options.targets.length,
    written: shards.filter((s) => s.status === 'written').length,
    rejected: shards.filter((s) => s.status === 'rejected').length,
    shards,
  };
}
