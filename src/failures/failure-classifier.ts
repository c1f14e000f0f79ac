import type { RepairContext } from '../context/repair-context.js';
import type { ModelCall } from '../llm/llm-utils.js';
import { classifyWithModel } from './model-classifier.js';
import { type FailureRule, RULE_TABLE, classifyByRules } from './rule-classifier.js';
import type { TestFailure } from './test-report.js';

export type FailureKind = 'test_mistake' | 'code_defect' | 'unknown';
export type ClassificationStage = 'rule' | 'model';

export interface ClassificationResult {
  kind: FailureKind;
  reason: string;
  /** In [0, 1]. */
  confidence: number;
  /** Replacement for the failing unit, when the model supplied one. */
  suggestedFix?: string;
  stage: ClassificationStage;
}

export interface ClassifierDeps {
  modelCall: ModelCall;
  maxContextChars: number;
  rules?: readonly FailureRule[];
}

type ClassifierState =
  | { state: 'received' }
  | { state: 'rule-checked' }
  | { state: 'model-checked'; result: ClassificationResult }
  | { state: 'done'; result: ClassificationResult };

/**
 * `received → rule-checked → (done | model-checked) → done`.
 * A rule match ends classification without a model call.
 */
export async function classifyFailure(
  failure: TestFailure,
  context: RepairContext,
  deps: ClassifierDeps
): Promise<ClassificationResult> {
  let current: ClassifierState = { state: 'received' };

  for (;;) {
    switch (current.state) {
      case 'received': {
        const verdict = classifyByRules(failure, deps.rules ?? RULE_TABLE);
        current =
          verdict.kind === 'test_mistake'
            ? {
                state: 'done',
                result: { kind: 'test_mistake', reason: verdict.reason, confidence: verdict.confidence, stage: 'rule' },
              }
            : { state: 'rule-checked' };
        break;
      }

      case 'rule-checked': {
        const verdict = await classifyWithModel(failure, context, {
          modelCall: deps.modelCall,
          maxContextChars: deps.maxContextChars,
        });
        const result: ClassificationResult = {
          kind: verdict.kind,
          reason: verdict.reason,
          confidence: verdict.confidence,
          stage: 'model',
          ...(verdict.kind === 'test_mistake' && verdict.fixedCode !== undefined && { suggestedFix: verdict.fixedCode }),
        };
        current = { state: 'model-checked', result };
        break;
      }

      case 'model-checked':
        current = { state: 'done', result: current.result };
        break;

      case 'done':
        return current.result;
    }
  }
}
