export type GenerationMode = 'unit' | 'e2e';

export interface PipelineConfig {
  /** Hard cap on repair rounds. */
  maxIterations: number;
  /** Fix requests per test mistake, on top of any fix the classifier proposed. */
  fixAttempts: number;
  unitBatchSize: number;
  e2eBatchSize: number;
  /** Upper bound on the rendered context placed in one prompt. */
  maxContextChars: number;
  model: string;
}

export const DEFAULT_MODEL = 'openrouter:google/gemini-2.5-flash';

export const DEFAULT_CONFIG: PipelineConfig = {
  maxIterations: 3,
  fixAttempts: 1,
  unitBatchSize: 50,
  e2eBatchSize: 20,
  maxContextChars: 60_000,
  model: DEFAULT_MODEL,
};

/**
 * Model alias priority: explicit flag > TESTMEND_MODEL env var > default.
 */
export function resolveModelName(flagValue?: string): string {
  if (flagValue) return flagValue;
  const envModel = process.env.TESTMEND_MODEL;
  if (envModel && envModel.trim().length > 0) return envModel.trim();
  return DEFAULT_MODEL;
}

export function defaultBatchSize(mode: GenerationMode): number {
  return mode === 'e2e' ? DEFAULT_CONFIG.e2eBatchSize : DEFAULT_CONFIG.unitBatchSize;
}
