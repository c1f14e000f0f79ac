import { type RepairContext, renderRepairContext } from '../context/repair-context.js';
import type { TestFailure } from '../failures/test-report.js';
import type { ModelCall } from '../llm/llm-utils.js';
import { type FixFeedback, buildFixSystemPrompt, buildFixUserPrompt } from '../llm/prompts.js';
import { extractCodeBlock } from '../llm/response-parsing.js';
import { getFrontEnd } from '../parser/front-ends.js';
import { getErrorMessage } from '../utils/helpers.js';

export type FixProposal = { ok: true; code: string } | { ok: false; reason: string };

export interface FixRequestOptions {
  modelCall: ModelCall;
  maxContextChars: number;
  /** The previous rejected attempt, for retries. */
  feedback?: FixFeedback;
}

/**
 * Ask the model for a replacement of the failing test unit.
 */
export async function requestFix(
  failure: TestFailure,
  context: RepairContext,
  options: FixRequestOptions
): Promise<FixProposal> {
  const frontEnd = getFrontEnd(context.testFile);
  const fenceLanguage = frontEnd?.fenceLanguage ?? '';
  const input = {
    failure,
    context,
    renderedContext: renderRepairContext(context, options.maxContextChars),
    fenceLanguage,
  };

  let response: string;
  try {
    response = await options.modelCall(buildFixSystemPrompt(fenceLanguage), buildFixUserPrompt(input, options.feedback));
  } catch (error) {
    return { ok: false, reason: `Model call failed: ${getErrorMessage(error)}` };
  }

  const code = extractCodeBlock(response, [fenceLanguage, frontEnd?.language ?? '']);
  if (code.trim() === '') {
    return { ok: false, reason: 'Model returned no code' };
  }
  return { ok: true, code };
}
