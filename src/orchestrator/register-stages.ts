import type { Config } from '../config/validator';
import { TavilyClient } from '../tavily/client';
import { GroqClient } from '../groq/client';
import type { SearchAdapter, TextGenerator } from '../agents/types';
import { ResearchAgent } from '../agents/research-agent';
import { DraftAgent } from '../agents/draft-agent';
import { ReviewAgent } from '../agents/review-agent';
import { RefineAgent } from '../agents/refine-agent';
import { RESEARCH_CHAIN, type ResearchState } from './data-flow';
import { silentLogger, type PipelineLogger } from './logger';
import { PipelineDefinition } from './pipeline';
import type { Pipeline } from './workflow';

export type ResearchAdapters = {
  search: SearchAdapter;
  generator: TextGenerator;
};

/** Build the search and text-generation clients once per process */
export function createResearchAdapters(config: Config, logger?: PipelineLogger): ResearchAdapters {
  return {
    search: new TavilyClient({
      apiKey: config.tavily.api_key,
      maxResults: config.tavily.max_results,
      searchDepth: config.tavily.search_depth,
      timeout: config.tavily.timeout_ms,
      logger,
    }),
    generator: new GroqClient({
      apiKey: config.groq.api_key,
      model: config.groq.model,
      temperature: config.groq.temperature,
      timeout: config.groq.timeout_ms,
      logger,
    }),
  };
}

/** Define and compile research -> draft_answer -> review_answer -> refine_answer */
export function createResearchPipeline(params: ResearchAdapters & { logger?: PipelineLogger }): Pipeline<ResearchState> {
  const logger = params.logger ?? silentLogger;

  return new PipelineDefinition<ResearchState>()
    .addStage('research', new ResearchAgent(params.search, logger))
    .addStage('draft_answer', new DraftAgent(params.generator, logger))
    .addStage('review_answer', new ReviewAgent(params.generator, logger))
    .addStage('refine_answer', new RefineAgent(params.generator, logger))
    .setEntryPoint('research')
    .chain(...RESEARCH_CHAIN)
    .setFinishPoint('refine_answer')
    .compile({ logger });
}
