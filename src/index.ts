export { DEFAULT_CONFIG, DEFAULT_MODEL, type GenerationMode, type PipelineConfig, resolveModelName } from './config.js';

export type {
  CodeSymbol,
  ImportBinding,
  LanguageFrontEnd,
  ModuleResolution,
  Route,
  SymbolKind,
} from './parser/front-end.js';
export { frontEndFor, getFrontEnd } from './parser/front-ends.js';
export { LineRange } from './utils/line-range.js';
export type { LogSink } from './utils/log-sink.js';

export {
  type SymbolIndex,
  buildSymbolIndex,
  indexSources,
  resolveTargetNames,
  symbolKey,
} from './indexer/symbol-indexer.js';

export { type CoverageMap, parseCoberturaXml, parseIstanbulJson, readCoverageReport } from './coverage/coverage-report.js';
export { type GapRecord, mapCoverageGaps, summarizeCoverage } from './coverage/gap-mapper.js';

export { type GenerationTarget, type Shard, selectTargets, shardTargets } from './generation/target-sharder.js';
export { type GenerationReport, runGeneration } from './generation/test-generator.js';

export { type ContextBundle, buildContextBundle, renderContextBundle } from './context/generation-context.js';
export { type RepairContext, extractRepairContext, renderRepairContext } from './context/repair-context.js';

export {
  type TestFailure,
  type TestRunReport,
  detectNonFixableRun,
  extractFailures,
  parseTestRunReport,
} from './failures/test-report.js';
export { RULE_TABLE, classifyByRules } from './failures/rule-classifier.js';
export { type ClassificationResult, classifyFailure } from './failures/failure-classifier.js';

export { type ModelCall, createModelCall } from './llm/llm-utils.js';

export { type PatchOutcome, applyPatch } from './repair/patch-engine.js';
export { requestFix } from './repair/fix-requester.js';
export { type TestRunner, runRepairLoop } from './repair/repair-loop.js';
export { type IterationReport, toReportDocument, writeIterationReport } from './repair/iteration-report.js';
export { CommandTestRunner } from './runner/command-runner.js';
