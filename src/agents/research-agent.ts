import type { ResearchState } from '../orchestrator/data-flow';
import { silentLogger, type PipelineLogger } from '../orchestrator/logger';
import { describeError, failed, ok, type Stage, type StageOutcome } from '../orchestrator/stage';
import type { SearchAdapter } from './types';

/** Fetches search results for the query */
export class ResearchAgent implements Stage<ResearchState> {
  constructor(
    private searchAdapter: SearchAdapter,
    private logger: PipelineLogger = silentLogger,
  ) {}

  async run(state: Readonly<ResearchState>): Promise<StageOutcome<ResearchState>> {
    try {
      const results = await this.searchAdapter.search(state.query);
      this.logger.debug('Research results', { count: results.length, urls: results.map((r) => r.url) });
      return ok({ research_data: results });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error during research: ${message}`);
      return failed({ research_data: null }, message);
    }
  }
}
