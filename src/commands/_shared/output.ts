import type { Command } from '@oclif/core';
import chalk from 'chalk';

/**
 * Output data as JSON or plain text based on the json flag.
 * @param command The command instance (for this.log)
 * @param json Whether to output as JSON
 * @param data The data to output (for JSON mode)
 * @param plainFn Function to call for plain text output
 */
export function outputJsonOrPlain<T>(command: Command, json: boolean, data: T, plainFn: () => void): void {
  if (json) {
    command.log(JSON.stringify(data, null, 2));
  } else {
    plainFn();
  }
}

export function sectionHeader(title: string): string {
  const line = '─'.repeat(Math.max(1, 48 - title.length - 4));
  return chalk.bold(`── ${title} ${line}`);
}

/**
 * Collapse sorted line numbers into ranges: `[3,4,5,9]` → `3-5, 9`.
 */
export function formatLineRanges(lines: number[]): string {
  const parts: string[] = [];
  let start = lines[0];
  let prev = lines[0];
  for (const line of lines.slice(1)) {
    if (line === prev + 1) {
      prev = line;
      continue;
    }
    parts.push(start === prev ? `${start}` : `${start}-${prev}`);
    start = line;
    prev = line;
  }
  if (lines.length > 0) parts.push(start === prev ? `${start}` : `${start}-${prev}`);
  return parts.join(', ');
}

export function colorPercentage(percentage: number): string {
  const text = `${percentage.toFixed(1)}%`;
  if (percentage >= 80) return chalk.green(text);
  if (percentage >= 50) return chalk.yellow(text);
  return chalk.red(text);
}
