import chalk from 'chalk';
import type { Diagnostic, PipelineRunResult } from '../orchestrator/data-flow';
import type { StageCompleteEvent, StageStartEvent } from '../orchestrator/events';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Stage progress ──────────────────────────────────────────────────────

const STAGE_LABELS: Record<string, string> = {
  research: 'Searching the web...',
  draft_answer: 'Drafting answer...',
  review_answer: 'Reviewing draft...',
  refine_answer: 'Refining answer...',
};

export function formatStageStart(event: StageStartEvent): string {
  const label = STAGE_LABELS[event.stage] ?? event.stage;
  return formatStep(`[${event.index + 1}] ${label}`);
}

export function formatStageComplete(event: StageCompleteEvent): string {
  const seconds = (event.durationMs / 1000).toFixed(1);
  switch (event.status) {
    case 'failed':
      return formatError(`${event.stage} failed after ${seconds}s: ${event.error ?? 'unknown error'}`);
    case 'skipped':
      return formatWarning(`${event.stage} skipped`);
    default:
      return formatSuccess(`${event.stage} done in ${seconds}s`);
  }
}

// ── Verbose interim output ──────────────────────────────────────────────

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

// ── Final result ────────────────────────────────────────────────────────

export function formatFinalAnswer(answer: string): string {
  return `\n${chalk.bold('=== Final Answer ===')}\n\n${answer}`;
}

export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  const lines = [formatWarning(`${diagnostics.length} stage(s) reported errors:`)];
  for (const d of diagnostics) {
    lines.push(formatWarning(`- ${d.stage}: ${d.message}`));
  }
  return lines.join('\n');
}

export function formatRunSummary<S>(result: PipelineRunResult<S>): string {
  const lines = [formatInfo(`Run ID:    ${result.runId}`), formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`)];
  for (const stage of result.stages) {
    lines.push(formatInfo(`${stage.stage.padEnd(14)} ${stage.status}`));
  }
  return lines.join('\n');
}
