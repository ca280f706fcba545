import { ScanError } from '../../core/errors.js';
import type { ContextBundle } from '../../types/context.js';

/**
 * Error payload printed by every command under --json.
 */
export interface JsonError {
  error: string;
  code: 'SCAN_ERROR' | 'NOT_FOUND' | 'VALIDATION_ERROR' | 'COMMAND_ERROR';
  /** ScanError code, when the scan root was the problem */
  reason?: string;
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function formatErrorJson(error: Error): JsonError {
  if (error instanceof ScanError) {
    return { error: error.message, code: 'SCAN_ERROR', reason: error.code };
  }

  const message = error.message.toLowerCase();
  if (message.includes('not found')) {
    return { error: error.message, code: 'NOT_FOUND' };
  }
  if (message.includes('unknown') || message.includes('invalid')) {
    return { error: error.message, code: 'VALIDATION_ERROR' };
  }
  return { error: error.message, code: 'COMMAND_ERROR' };
}

/**
 * Serialize command output. Errors become a `JsonError`, anything else is
 * wrapped with the command name.
 */
export function formatAsJson(command: string, data: unknown): string {
  if (command === 'error') {
    return JSON.stringify(formatErrorJson(toError(data)));
  }
  return JSON.stringify({ command, data }, null, 2);
}

/**
 * A backtick fence longer than any backtick run inside the content.
 */
function fenceFor(content: string): string {
  const runs = content.match(/`+/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
  return '`'.repeat(Math.max(3, longest + 1));
}

/**
 * Format a context bundle as a Markdown report.
 */
export function formatContextMarkdown(bundle: ContextBundle, task: string): string {
  let output = `# Context for: ${task}\n\n`;
  output += `**Files:** ${bundle.files.length} of ${bundle.filesDiscoveredCount} scanned\n`;
  output += `**Tokens:** ${bundle.totalTokensEstimated}\n`;
  output += `**Tree version:** ${bundle.treeVersion}\n`;
  output += `**Timestamp:** ${bundle.createdAt}\n`;
  if (bundle.partial) {
    output += `**Partial:** yes (stopped early)\n`;
  }
  output += '\n';

  if (bundle.files.length > 0) {
    output += `## Relevant Files\n\n`;
    for (const file of bundle.files) {
      const note = file.truncated ? ', truncated' : '';
      output += `### ${file.path} (${file.language}, score ${file.score.toFixed(2)}, ~${file.estimatedTokens} tokens${note})\n\n`;
      const fence = fenceFor(file.content);
      output += `${fence}${file.language === 'unknown' ? '' : file.language}\n${file.content}`;
      output += file.content.endsWith('\n') ? `${fence}\n\n` : `\n${fence}\n\n`;
    }
  }

  if (bundle.configFiles.length > 0) {
    output += `## Configuration Files\n\n`;
    for (const excerpt of bundle.configFiles) {
      const note = excerpt.truncated ? ', truncated' : '';
      output += `### ${excerpt.path} (~${excerpt.estimatedTokens} tokens${note})\n\n`;
      const fence = fenceFor(excerpt.content);
      output += `${fence}\n${excerpt.content}`;
      output += excerpt.content.endsWith('\n') ? `${fence}\n\n` : `\n${fence}\n\n`;
    }
  }

  if (bundle.skipped.length > 0) {
    output += `## Skipped\n\n`;
    for (const skipped of bundle.skipped) {
      output += `- ${skipped.path} (${skipped.reason})\n`;
    }
    output += '\n';
  }

  return output;
}
