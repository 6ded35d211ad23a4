import { DRAFT_SENTINELS, NO_ANSWER_TO_REVIEW, REVIEW_FAILED, type ResearchState } from '../orchestrator/data-flow';
import { silentLogger, type PipelineLogger } from '../orchestrator/logger';
import { describeError, failed, ok, skipped, type Stage, type StageOutcome } from '../orchestrator/stage';
import { buildReviewPrompt, REVIEW_SYSTEM_PROMPT } from './prompts/answer-review';
import type { TextGenerator } from './types';

/** Critiques the drafted answer; the draft itself is passed on unchanged as `reviewed_answer` */
export class ReviewAgent implements Stage<ResearchState> {
  constructor(
    private generator: TextGenerator,
    private logger: PipelineLogger = silentLogger,
  ) {}

  async run(state: Readonly<ResearchState>): Promise<StageOutcome<ResearchState>> {
    const answer = state.answer ?? '';
    if (!answer.trim() || DRAFT_SENTINELS.includes(answer)) {
      return skipped({ reviewed_answer: answer, feedback: NO_ANSWER_TO_REVIEW }, 'No drafted answer');
    }

    try {
      const feedback = await this.generator.complete(REVIEW_SYSTEM_PROMPT, buildReviewPrompt(answer));
      return ok({ reviewed_answer: answer, feedback });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error during review: ${message}`);
      return failed({ reviewed_answer: answer, feedback: REVIEW_FAILED }, message);
    }
  }
}
