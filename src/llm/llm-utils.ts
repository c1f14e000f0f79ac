/**
 * Model-call plumbing shared by the classifier, the fix requester and the
 * test generator. Everything above this layer sees a plain `ModelCall`.
 */

import chalk from 'chalk';
import { type LLMMessage, LLMist, type TokenUsage, resolveModel } from 'llmist';
import type { LogSink } from '../utils/log-sink.js';

/** `(systemPrompt, userPrompt) → response text`. */
export type ModelCall = (systemPrompt: string, userPrompt: string) => Promise<string>;

export interface LlmLogOptions {
  showRequests: boolean;
  showResponses: boolean;
  isJson: boolean;
}

export function logLlmRequest(
  log: LogSink,
  methodName: string,
  systemPrompt: string,
  userPrompt: string,
  options: LlmLogOptions
): void {
  if (options.isJson || !options.showRequests) return;

  log.log('');
  log.log(chalk.bold.cyan('═'.repeat(60)));
  log.log(chalk.bold.cyan(`LLM REQUEST - ${methodName}`));
  log.log(chalk.bold.cyan('═'.repeat(60)));
  log.log('');
  log.log(chalk.cyan('System Prompt:'));
  log.log(chalk.gray(systemPrompt));
  log.log('');
  log.log(chalk.cyan('User Prompt:'));
  log.log(chalk.gray(userPrompt));
  log.log('');
}

export function logLlmResponse(log: LogSink, methodName: string, response: string, options: LlmLogOptions): void {
  if (options.isJson || !options.showResponses) return;

  log.log('');
  log.log(chalk.bold.green('═'.repeat(60)));
  log.log(chalk.bold.green(`LLM RESPONSE - ${methodName}`));
  log.log(chalk.bold.green('═'.repeat(60)));
  log.log('');
  log.log(chalk.gray(response));
  log.log('');
}

// ---------------------------------------------------------------------------
// completeWithLogging – wraps every model call with one-line before/after logs
// ---------------------------------------------------------------------------

let _client: LLMist | null = null;
function getClient(): LLMist {
  if (!_client) _client = new LLMist();
  return _client;
}

export interface CompleteWithLoggingOptions {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  log: LogSink;
  isJson: boolean;
  label?: string;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatCost(cost: number): string {
  if (cost < 0.01) return `$${cost.toFixed(4)}`;
  return `$${cost.toFixed(2)}`;
}

export async function completeWithLogging(options: CompleteWithLoggingOptions): Promise<string> {
  const { model, systemPrompt, userPrompt, temperature, maxTokens, log, isJson, label } = options;

  const estTokens = Math.round((systemPrompt.length + userPrompt.length) / 4);
  const labelTag = label ? `  [${label}]` : '';

  if (!isJson) {
    log.log(chalk.gray(`  → LLM  ${model}  ~${formatNumber(estTokens)} tok${labelTag}`));
  }

  const resolvedModel = resolveModel(model);
  const messages: LLMMessage[] = [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];

  const client = getClient();
  const startTime = Date.now();
  let text = '';
  let usage: TokenUsage | undefined;

  const stream = client.stream({
    model: resolvedModel,
    messages,
    ...(temperature !== undefined && { temperature }),
    ...(maxTokens !== undefined && { maxTokens }),
  });

  for await (const chunk of stream) {
    text += chunk.text;
    if (chunk.usage) {
      usage = chunk.usage;
    }
  }

  const duration = Date.now() - startTime;

  if (!isJson) {
    const inputTokens = usage?.inputTokens ?? 0;
    const outputTokens = usage?.outputTokens ?? 0;
    const cachedTokens = usage?.cachedInputTokens ?? 0;

    const costEstimate = client.modelRegistry.estimateCost(resolvedModel, inputTokens, outputTokens, cachedTokens);
    const costStr = costEstimate ? formatCost(costEstimate.totalCost) : '?';

    const parts = [
      `  ← LLM  ${formatDuration(duration)}`,
      `in: ${formatNumber(inputTokens)}`,
      `out: ${formatNumber(outputTokens)}`,
      `cached: ${formatNumber(cachedTokens)}`,
      costStr,
    ];

    log.log(chalk.gray(parts.join('  ') + labelTag));
  }

  return text.trim();
}

export interface ModelCallOptions {
  model: string;
  log: LogSink;
  isJson?: boolean;
  llmLog?: Omit<LlmLogOptions, 'isJson'>;
  temperature?: number;
  maxTokens?: number;
  /** Shown in the request/response banners and the one-line log. */
  label?: string;
}

/**
 * Bind model, logging and sampling settings into a `ModelCall`.
 */
export function createModelCall(options: ModelCallOptions): ModelCall {
  const isJson = options.isJson ?? false;
  const logOptions: LlmLogOptions = {
    showRequests: options.llmLog?.showRequests ?? false,
    showResponses: options.llmLog?.showResponses ?? false,
    isJson,
  };
  const methodName = options.label ?? 'model call';

  return async (systemPrompt, userPrompt) => {
    logLlmRequest(options.log, methodName, systemPrompt, userPrompt, logOptions);
    const response = await completeWithLogging({
      model: options.model,
      systemPrompt,
      userPrompt,
      log: options.log,
      isJson,
      ...(options.temperature !== undefined && { temperature: options.temperature }),
      ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
      ...(options.label !== undefined && { label: options.label }),
    });
    logLlmResponse(options.log, methodName, response, logOptions);
    return response;
  };
}
