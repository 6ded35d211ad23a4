import crypto from 'crypto';
import { Command } from 'commander';
import { loadConfig, type DeepPartial } from '../../config/loader';
import { ConfigValidationError, type Config } from '../../config/validator';
import { createResearchAdapters, createResearchPipeline, type ResearchAdapters } from '../../orchestrator/register-stages';
import type { PipelineRunResult, ResearchState } from '../../orchestrator/data-flow';
import type { PipelineLogger } from '../../orchestrator/logger';
import { formatDiagnostics, formatError, formatFinalAnswer, formatInfo, formatRunSummary, formatStageComplete, formatStageStart, formatVerboseSection, formatWarning } from '../formatters';
import { parseMaxResults, parseQuery, parseSearchDepth, ValidationError } from '../validators';

// ── Types ───────────────────────────────────────────────────────────────

export type AskCommandOptions = {
  json?: boolean;
  model?: string;
  maxResults?: string;
  searchDepth?: string;
  verbose?: boolean;
};

/** Pre-built collaborators; anything omitted is created from configuration */
export type AskRuntime = {
  config?: Config;
  adapters?: ResearchAdapters;
  runId?: string;
};

// ── Verbose-aware logger ────────────────────────────────────────────────

/**
 * Writes pipeline logs to stderr so stdout carries only the answer.
 * Warnings and errors always show; info and debug lines need --verbose and
 * are tagged with the short run id.
 */
export class CLIPipelineLogger implements PipelineLogger {
  private tag: string;

  constructor(
    runId: string,
    private verbose: boolean,
  ) {
    this.tag = `[${runId.slice(0, 8)}]`;
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) console.error(formatInfo(`${this.tag} ${withData(message, data)}`));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.error(formatWarning(withData(message, data)));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(withData(message, data)));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) console.error(formatInfo(`${this.tag} debug: ${withData(message, data)}`));
  }
}

function withData(message: string, data?: Record<string, unknown>): string {
  return data ? `${message} ${JSON.stringify(data)}` : message;
}

// ── Command registration ────────────────────────────────────────────────

export function registerAskCommand(program: Command): void {
  program
    .command('ask', { isDefault: true })
    .description('Research a question on the web and print a reviewed, refined answer')
    .argument('[query...]', 'Question to research')
    .option('--json', 'Print the full state record and diagnostics as JSON', false)
    .option('--model <id>', 'Groq model to use for drafting, review and refinement')
    .option('--max-results <n>', 'Number of search results to retrieve (1-20)')
    .option('--search-depth <depth>', 'Tavily search depth: basic or advanced')
    .option('--verbose', 'Show stage progress and request details')
    .action(async (query: string[], options: AskCommandOptions) => {
      await executeAskCommand(query, options, {}, program.opts().verbose === true);
    });
}

// ── Main execution ──────────────────────────────────────────────────────

/**
 * Executes the `research-agent ask` command.
 *
 * The final answer goes to stdout; progress, logs and stage errors go to
 * stderr so the answer can be piped. Resolves with the run result, or
 * undefined when the command could not start.
 */
export async function executeAskCommand(
  queryWords: string[] | string | undefined,
  options: AskCommandOptions,
  runtime: AskRuntime = {},
  globalVerbose = false,
): Promise<PipelineRunResult<ResearchState> | undefined> {
  try {
    const query = parseQuery(queryWords);
    const verbose = globalVerbose || Boolean(options.verbose);
    const runId = runtime.runId ?? crypto.randomUUID();
    const logger = new CLIPipelineLogger(runId, verbose);

    const config = runtime.config ?? loadConfig(buildOverrides(options));
    const adapters = runtime.adapters ?? createResearchAdapters(config, logger);
    const pipeline = createResearchPipeline({ ...adapters, logger });

    if (verbose) {
      pipeline.events.onStageStart((event) => console.error(formatStageStart(event)));
      pipeline.events.onStageComplete((event) => console.error(formatStageComplete(event)));
    }

    const result = await pipeline.run({ query }, { runId, logger });

    if (options.json) {
      console.log(JSON.stringify({ ...result.state, diagnostics: result.diagnostics }, null, 2));
      return result;
    }

    console.log(formatFinalAnswer(result.state.final_answer ?? ''));

    if (result.diagnostics.length > 0) {
      console.error(formatDiagnostics(result.diagnostics));
    }
    if (verbose) {
      printInterimResults(result.state);
      console.error(formatRunSummary(result));
    }

    return result;
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(formatError('Configuration is invalid:'));
      err.issues.forEach((issue) => console.error(formatError(`- ${issue}`)));
    } else {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(formatError(msg));
    }
    process.exitCode = 1;
    return undefined;
  }
}

function printInterimResults(state: ResearchState): void {
  const sources = (state.research_data ?? []).map((r, i) => `[${i + 1}] ${r.title} - ${r.url}`);
  console.error(formatVerboseSection('Research sources', sources.length > 0 ? sources.join('\n') : '(none)'));
  console.error(formatVerboseSection('Draft', state.answer ?? ''));
  console.error(formatVerboseSection('Review feedback', state.feedback ?? ''));
}

function buildOverrides(options: AskCommandOptions): DeepPartial<Config> {
  const overrides: DeepPartial<Config> = {};
  if (options.maxResults !== undefined || options.searchDepth !== undefined) {
    overrides.tavily = {
      max_results: options.maxResults !== undefined ? parseMaxResults(options.maxResults) : undefined,
      search_depth: options.searchDepth !== undefined ? parseSearchDepth(options.searchDepth) : undefined,
    };
  }
  if (options.model !== undefined) {
    if (!options.model.trim()) throw new ValidationError('--model must not be empty');
    overrides.groq = { model: options.model.trim() };
  }
  return overrides;
}
