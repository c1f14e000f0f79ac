import { Flags } from '@oclif/core';
import { DEFAULT_CONFIG } from '../../config.js';

/**
 * Shared flag definitions for consistent CLI experience across commands.
 */
export const LlmFlags = {
  model: Flags.string({
    char: 'm',
    description: 'LLM model alias (default: $TESTMEND_MODEL, then openrouter:google/gemini-2.5-flash)',
  }),
  'max-context': Flags.integer({
    description: 'Maximum characters of source context per prompt',
    default: DEFAULT_CONFIG.maxContextChars,
    min: 1,
  }),
  verbose: Flags.boolean({ description: 'Show detailed progress', default: false }),
  'show-llm-requests': Flags.boolean({ description: 'Show full LLM request prompts', default: false }),
  'show-llm-responses': Flags.boolean({ description: 'Show full LLM responses', default: false }),
};

export const SharedFlags = {
  json: Flags.boolean({
    description: 'Output as JSON',
    default: false,
  }),

  exclude: Flags.string({
    char: 'x',
    description: 'Extra glob pattern to ignore (repeatable)',
    multiple: true,
  }),
};
