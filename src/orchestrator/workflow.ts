import crypto from 'crypto';
import { merge, type Diagnostic, type PipelineRunResult, type StageReport, type StateRecord } from './data-flow';
import { PipelineEvents } from './events';
import { silentLogger, type PipelineLogger } from './logger';
import { describeError, failed, toPartial, type Stage, type StageOutcome } from './stage';

// ── Options ─────────────────────────────────────────────────────────────

/** Configuration shared by every run of a compiled pipeline */
export interface PipelineOptions {
  /** Logger implementation (defaults to a silent logger) */
  logger?: PipelineLogger;
}

/** Per-run overrides */
export interface RunOptions {
  /** Unique identifier for this run (auto-generated if omitted) */
  runId?: string;
  logger?: PipelineLogger;
}

export interface CompiledStage<S extends StateRecord> {
  name: string;
  stage: Stage<S>;
}

// ── Executor ────────────────────────────────────────────────────────────

/**
 * Pipeline runs a validated chain of stages over one state record.
 *
 *  - Stages run strictly in chain order, one at a time
 *  - Each stage's outcome is merged into the record before the next starts
 *  - A failed stage never stops the chain; its error travels as data
 *
 * Instances hold no per-run state and may be shared by concurrent runs,
 * as long as each run is given its own initial record.
 */
export class Pipeline<S extends StateRecord> {
  public events = new PipelineEvents();
  private steps: ReadonlyArray<CompiledStage<S>>;
  private logger: PipelineLogger;

  constructor(steps: ReadonlyArray<CompiledStage<S>>, options: PipelineOptions = {}) {
    this.steps = [...steps];
    this.logger = options.logger ?? silentLogger;
  }

  /** Stage names in execution order */
  getStageOrder(): string[] {
    return this.steps.map((step) => step.name);
  }

  /** Run the chain and return only the final state record */
  async invoke(initial: S, options: RunOptions = {}): Promise<S> {
    const result = await this.run(initial, options);
    return result.state;
  }

  /** Run the chain and return the final record with a per-stage report */
  async run(initial: S, options: RunOptions = {}): Promise<PipelineRunResult<S>> {
    const runId = options.runId ?? crypto.randomUUID();
    const logger = options.logger ?? this.logger;
    const startTime = Date.now();
    const stages: StageReport[] = [];
    let current = initial;

    logger.info('Starting pipeline', { runId, stages: this.getStageOrder() });

    for (const [index, { name, stage }] of this.steps.entries()) {
      this.emitSafely(name, logger, () => this.events.emitStageStart({ runId, stage: name, index, timestamp: new Date().toISOString() }));
      logger.info(`Executing: ${name}`);
      const stageStart = Date.now();

      const outcome = await this.executeStage(name, stage, current, logger);
      current = merge(current, toPartial(outcome));

      const report = this.buildReport(name, outcome, Date.now() - stageStart);
      stages.push(report);
      this.logReport(report, logger);

      this.emitSafely(name, logger, () =>
        this.events.emitStageComplete({
          runId,
          stage: name,
          index,
          timestamp: new Date().toISOString(),
          status: report.status,
          durationMs: report.durationMs,
          error: report.error,
        }),
      );
    }

    const diagnostics: Diagnostic[] = stages.flatMap((r) => (r.status === 'failed' ? [{ stage: r.stage, message: r.error ?? 'Unknown error' }] : []));
    const result: PipelineRunResult<S> = {
      runId,
      status: 'completed',
      state: current,
      stages,
      diagnostics,
      durationMs: Date.now() - startTime,
    };

    logger.info('Pipeline result', { status: result.status, failedStages: diagnostics.length, durationMs: result.durationMs });

    return result;
  }

  // ── Stage Execution ─────────────────────────────────────────────────

  private async executeStage(name: string, stage: Stage<S>, state: S, logger: PipelineLogger): Promise<StageOutcome<S>> {
    try {
      return await stage.run(state);
    } catch (error) {
      // Stages are expected to resolve with a failed outcome instead of throwing
      const message = describeError(error);
      logger.error(`Stage ${name} threw instead of reporting a failure`, { error: message });
      return failed<S>({}, message);
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  /** Listeners run synchronously inside emit; one that throws must not end the run */
  private emitSafely(stage: string, logger: PipelineLogger, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      logger.warn(`Event listener failed during ${stage}`, { error: describeError(error) });
    }
  }

  private buildReport(name: string, outcome: StageOutcome<S>, durationMs: number): StageReport {
    switch (outcome.status) {
      case 'failed':
        return { stage: name, status: 'failed', durationMs, error: outcome.error };
      case 'skipped':
        return { stage: name, status: 'skipped', durationMs, reason: outcome.reason };
      default:
        return { stage: name, status: 'ok', durationMs };
    }
  }

  private logReport(report: StageReport, logger: PipelineLogger): void {
    switch (report.status) {
      case 'failed':
        logger.warn(`Failed: ${report.stage} (${report.durationMs}ms)`, { error: report.error });
        break;
      case 'skipped':
        logger.info(`Skipped: ${report.stage} (${report.durationMs}ms)`, { reason: report.reason });
        break;
      default:
        logger.info(`Completed: ${report.stage} (${report.durationMs}ms)`);
    }
  }
}
