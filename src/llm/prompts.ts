/**
 * Prompt templates for failure classification and test repair.
 */

import type { RepairContext } from '../context/repair-context.js';
import type { TestFailure } from '../failures/test-report.js';

export interface FailurePromptInput {
  failure: TestFailure;
  context: RepairContext;
  /** Dependency snippets already rendered to fit the context budget. */
  renderedContext: string;
  fenceLanguage: string;
}

export interface FixFeedback {
  previousFix: string;
  rejection: string;
}

export function buildClassificationSystemPrompt(): string {
  return `You are a senior engineer triaging failing automated tests.

## Your Task
Decide whether a failure is caused by the test itself or by the code under test:
- **test_mistake**: the test is wrong (bad import, wrong fixture, wrong mock setup, wrong arguments, wrong expectation about documented behaviour, missing await).
- **code_defect**: the code under test is wrong and the test correctly exposes it.

## Output Format
Respond with **only** a JSON object:
{"classification": "test_mistake" | "code_defect", "reason": "<one sentence>", "fixed_code": "<complete fixed test unit, or null>", "confidence": <0.0-1.0>}

## Rules
- Only provide fixed_code for a test_mistake. It must replace the whole failing test unit, decorators included.
- Never change what the test checks just to make it pass; if the code is wrong, answer code_defect.
- No prose before or after the JSON.`;
}

function failureHeader(failure: TestFailure): string {
  return `## Failing Test
**File:** ${failure.testFile}
**Test Name:** ${failure.testName}
**Line:** ${failure.lineNumber ?? 'unknown'}

## Error
**Exception Type:** ${failure.exceptionKind}
**Message:** ${failure.message}

## Traceback
\`\`\`
${failure.rawTrace}
\`\`\``;
}

function testSection(input: FailurePromptInput): string {
  const { context, fenceLanguage } = input;
  const unit = context.testUnit ?? context.testSource;
  const imports = context.testImports.length > 0 ? context.testImports.join('\n') : '(none)';
  return `## Test Imports
\`\`\`${fenceLanguage}
${imports}
\`\`\`

## Test Code
\`\`\`${fenceLanguage}
${unit}
\`\`\``;
}

function sourceSection(input: FailurePromptInput): string {
  const body = input.renderedContext.trim() || '(no project definitions resolved)';
  return `## Code Under Test
\`\`\`${input.fenceLanguage}
${body}
\`\`\``;
}

export function buildClassificationUserPrompt(input: FailurePromptInput): string {
  return `# Test Failure Analysis

${failureHeader(input.failure)}

${testSection(input)}

${sourceSection(input)}

Respond with the JSON object only.`;
}

export function buildFixSystemPrompt(fenceLanguage: string): string {
  return `You are an expert at repairing failing ${fenceLanguage} tests.

## Your Task
Rewrite the failing test unit so that it is correct. The failure has already been judged a mistake in the test, not in the code under test.

## Output Format
Respond with **only** one fenced \`\`\`${fenceLanguage} code block containing the complete replacement for the failing test unit, decorators included. When the fix needs a name that the test file does not import yet, begin the block with the missing import lines. Do not include other tests.

## Rules
- Keep the unit's name so the runner still finds it.
- Keep the intent of the test; fix how it checks, not what it checks.
- Use only names that the test file imports, that the code under test defines, or that your added import lines bring in.`;
}

export function buildFixUserPrompt(input: FailurePromptInput, feedback?: FixFeedback): string {
  let prompt = `# Fix This Failing Test

${failureHeader(input.failure)}

${testSection(input)}

${sourceSection(input)}`;

  if (feedback) {
    prompt += `

## Previous Attempt (rejected)
\`\`\`${input.fenceLanguage}
${feedback.previousFix}
\`\`\`
**Why it was rejected:** ${feedback.rejection}

Produce a different fix that avoids this problem.`;
  }

  return `${prompt}\n`;
}
