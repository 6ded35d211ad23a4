import { REVIEW_SENTINELS, type ResearchState } from '../orchestrator/data-flow';
import { silentLogger, type PipelineLogger } from '../orchestrator/logger';
import { describeError, failed, ok, skipped, type Stage, type StageOutcome } from '../orchestrator/stage';
import { buildRefinePrompt, REFINE_SYSTEM_PROMPT } from './prompts/answer-refinement';
import type { TextGenerator } from './types';

/** Revises the reviewed answer against the feedback. Always sets `final_answer`. */
export class RefineAgent implements Stage<ResearchState> {
  constructor(
    private generator: TextGenerator,
    private logger: PipelineLogger = silentLogger,
  ) {}

  async run(state: Readonly<ResearchState>): Promise<StageOutcome<ResearchState>> {
    const answer = state.reviewed_answer ?? '';
    const feedback = state.feedback ?? '';
    if (!feedback.trim() || REVIEW_SENTINELS.includes(feedback)) {
      return skipped({ final_answer: answer }, 'No usable feedback');
    }

    try {
      const refined = await this.generator.complete(REFINE_SYSTEM_PROMPT, buildRefinePrompt({ answer, feedback }));
      return ok({ final_answer: refined });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error during refinement: ${message}`);
      return failed({ final_answer: answer }, message);
    }
  }
}
