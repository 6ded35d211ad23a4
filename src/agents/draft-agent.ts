import { DRAFT_FAILED, NO_RESEARCH_DATA, type ResearchState } from '../orchestrator/data-flow';
import { silentLogger, type PipelineLogger } from '../orchestrator/logger';
import { describeError, failed, ok, skipped, type Stage, type StageOutcome } from '../orchestrator/stage';
import { buildDraftPrompt, DRAFT_SYSTEM_PROMPT } from './prompts/answer-drafting';
import type { TextGenerator } from './types';

/**
 * Drafts an answer grounded in the research results.
 * Without results the generator is not called and `answer` holds the no-data sentinel.
 */
export class DraftAgent implements Stage<ResearchState> {
  constructor(
    private generator: TextGenerator,
    private logger: PipelineLogger = silentLogger,
  ) {}

  async run(state: Readonly<ResearchState>): Promise<StageOutcome<ResearchState>> {
    const researchData = state.research_data;
    if (!researchData || researchData.length === 0) {
      return skipped({ answer: NO_RESEARCH_DATA }, 'No research data');
    }

    try {
      const answer = await this.generator.complete(DRAFT_SYSTEM_PROMPT, buildDraftPrompt(researchData));
      return ok({ answer });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error during answer drafting: ${message}`);
      return failed({ answer: DRAFT_FAILED }, message);
    }
  }
}
