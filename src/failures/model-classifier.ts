import { z } from 'zod';
import { type RepairContext, renderRepairContext } from '../context/repair-context.js';
import type { ModelCall } from '../llm/llm-utils.js';
import { buildClassificationSystemPrompt, buildClassificationUserPrompt } from '../llm/prompts.js';
import { extractJsonObject } from '../llm/response-parsing.js';
import { getFrontEnd } from '../parser/front-ends.js';
import { getErrorMessage } from '../utils/helpers.js';
import type { TestFailure } from './test-report.js';

export type ModelVerdict =
  | { kind: 'test_mistake'; reason: string; confidence: number; fixedCode?: string }
  | { kind: 'code_defect'; reason: string; confidence: number }
  | { kind: 'unknown'; reason: string; confidence: number };

// Applied when part of the test's imports could not be followed into the project
export const UNRESOLVED_CONFIDENCE_FACTOR = 0.8;
const DEFAULT_MODEL_CONFIDENCE = 0.5;

export const ModelResponseSchema = z.object({
  classification: z.enum(['test_mistake', 'code_defect', 'code_bug']),
  reason: z.string().default(''),
  fixed_code: z.string().nullish(),
  confidence: z.number().optional(),
});

export type ModelResponse = z.infer<typeof ModelResponseSchema>;

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Validate a raw model response into a verdict. Anything that is not the
 * expected JSON shape is `unknown`.
 */
export function parseModelVerdict(response: string): ModelVerdict {
  const result = ModelResponseSchema.safeParse(extractJsonObject(response));
  if (!result.success) {
    return { kind: 'unknown', reason: 'Malformed model response', confidence: 0 };
  }

  const { classification, reason, fixed_code, confidence } = result.data;
  const score = clamp(confidence ?? DEFAULT_MODEL_CONFIDENCE);
  if (classification === 'test_mistake') {
    const fixedCode = fixed_code?.trim();
    return { kind: 'test_mistake', reason, confidence: score, ...(fixedCode ? { fixedCode } : {}) };
  }
  return { kind: 'code_defect', reason, confidence: score };
}

export interface ModelClassifierOptions {
  modelCall: ModelCall;
  maxContextChars: number;
}

export async function classifyWithModel(
  failure: TestFailure,
  context: RepairContext,
  options: ModelClassifierOptions
): Promise<ModelVerdict> {
  const fenceLanguage = getFrontEnd(context.testFile)?.fenceLanguage ?? '';
  const userPrompt = buildClassificationUserPrompt({
    failure,
    context,
    renderedContext: renderRepairContext(context, options.maxContextChars),
    fenceLanguage,
  });

  let response: string;
  try {
    response = await options.modelCall(buildClassificationSystemPrompt(), userPrompt);
  } catch (error) {
    return { kind: 'unknown', reason: `Model call failed: ${getErrorMessage(error)}`, confidence: 0 };
  }

  const verdict = parseModelVerdict(response);
  if (verdict.kind !== 'unknown' && context.unresolvedModules.length > 0) {
    return { ...verdict, confidence: verdict.confidence * UNRESOLVED_CONFIDENCE_FACTOR };
  }
  return verdict;
}
