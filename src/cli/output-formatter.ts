/**
 * Renders failure diagnostics. Everything goes to stderr: stdout is the child command's.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput): string {
  const lines = [chalk.red(`❌ ${output.message}`)];

  for (const detail of output.details ?? []) {
    if (lines.length === 1) lines.push('');
    lines.push(chalk.white(`  • ${detail}`));
  }

  if (output.suggestions?.length) {
    lines.push('', chalk.gray('💡 Suggestions:'));
    lines.push(...output.suggestions.map((suggestion) => chalk.gray(`  • ${suggestion}`)));
  }

  return lines.join('\n');
}

export function printResult(result: CliResult): void {
  if (result.kind === 'failure') {
    console.error(formatOutput(result.output));
  }
}
