/**
 * Prompt templates for test generation.
 */

import type { GenerationMode } from '../config.js';
import type { GenerationTarget } from '../generation/target-sharder.js';

export interface GenerationPromptInput {
  mode: GenerationMode;
  fenceLanguage: string;
  framework: string;
  /** Root-relative path the generated file will be written to. */
  testFilePath: string;
  targets: GenerationTarget[];
  renderedContext: string;
}

const MODE_GUIDANCE: Record<GenerationMode, string> = {
  unit: `Write focused unit tests. Call each target directly, cover its branches and error paths, and replace I/O, network and time with mocks or fakes.`,
  e2e: `Write end-to-end tests that exercise each HTTP route through the framework's test client. Check status codes and response bodies, including invalid input.`,
};

export function buildGenerationSystemPrompt(input: Pick<GenerationPromptInput, 'mode' | 'fenceLanguage' | 'framework'>): string {
  return `You are an expert test engineer writing ${input.framework} tests in ${input.fenceLanguage}.

## Your Task
${MODE_GUIDANCE[input.mode]}

## Output Format
Respond with **only** one fenced \`\`\`${input.fenceLanguage} code block containing a complete, self-contained test file.

## Rules
- Import the code under test with paths that are valid from the test file's location.
- Prioritise the uncovered lines listed for each target.
- Tests must be deterministic: no real network, no sleeps, no reliance on test order.
- Do not modify or redefine the code under test.`;
}

function describeTarget(target: GenerationTarget): string {
  const { symbol, route, uncoveredLines } = target;
  const head = route
    ? `- ${route.method} ${route.path} → ${symbol.file}::${symbol.qualifiedName}`
    : `- ${symbol.file}::${symbol.qualifiedName} (${symbol.kind}${symbol.isAsync ? ', async' : ''}, lines ${symbol.startLine}-${symbol.endLine})`;
  return uncoveredLines.length > 0 ? `${head}\n  uncovered lines: ${uncoveredLines.join(', ')}` : head;
}

export function buildGenerationUserPrompt(input: GenerationPromptInput): string {
  return `# Generate Tests

## Test File
${input.testFilePath}

## Targets
${input.targets.map(describeTarget).join('\n')}

## Source Files
\`\`\`${input.fenceLanguage}
${input.renderedContext}
\`\`\`
`;
}
