/* eslint-disable @typescript-eslint/unbound-method */
/* eslint-disable @typescript-eslint/require-await */
/**
 * Integration tests for the research pipeline.
 *
 * The real stages and executor run end-to-end; only the search and
 * text-generation backends are replaced by in-process fakes.
 */
import { createResearchPipeline } from '../../../src/orchestrator/register-stages';
import type { SearchAdapter, SearchResult, TextGenerator } from '../../../src/agents/types';
import { DRAFT_SYSTEM_PROMPT } from '../../../src/agents/prompts/answer-drafting';
import { REVIEW_SYSTEM_PROMPT } from '../../../src/agents/prompts/answer-review';
import { REFINE_SYSTEM_PROMPT } from '../../../src/agents/prompts/answer-refinement';
import { DRAFT_FAILED, NO_ANSWER_TO_REVIEW, NO_RESEARCH_DATA, REVIEW_FAILED } from '../../../src/orchestrator/data-flow';

// ── Fakes ───────────────────────────────────────────────────────────────

type Reply = string | Error;

function fakeSearch(reply: SearchResult[] | Error): jest.Mocked<SearchAdapter> {
  const adapter: jest.Mocked<SearchAdapter> = { search: jest.fn() };
  if (reply instanceof Error) adapter.search.mockRejectedValue(reply);
  else adapter.search.mockResolvedValue(reply);
  return adapter;
}

/** Answers each stage according to its system prompt */
function fakeGenerator(replies: { draft?: Reply; review?: Reply; refine?: Reply }): jest.Mocked<TextGenerator> {
  const bySystemPrompt = new Map<string, Reply | undefined>([
    [DRAFT_SYSTEM_PROMPT, replies.draft],
    [REVIEW_SYSTEM_PROMPT, replies.review],
    [REFINE_SYSTEM_PROMPT, replies.refine],
  ]);
  const generator: jest.Mocked<TextGenerator> = { complete: jest.fn() };
  generator.complete.mockImplementation(async (systemPrompt) => {
    const reply = bySystemPrompt.get(systemPrompt);
    if (reply === undefined) throw new Error(`unexpected call for ${systemPrompt}`);
    if (reply instanceof Error) throw reply;
    return reply;
  });
  return generator;
}

function systemPromptsCalled(generator: jest.Mocked<TextGenerator>): string[] {
  return generator.complete.mock.calls.map(([systemPrompt]) => systemPrompt);
}

const DOCS: SearchResult[] = [{ title: 'a', url: 'https://example.com/a', content: 'a' }];

// ═══════════════════════════════════════════════════════════════════════

describe('Research pipeline (integration)', () => {
  it('should run research, draft, review and refine in that order', async () => {
    const pipeline = createResearchPipeline({ search: fakeSearch(DOCS), generator: fakeGenerator({ draft: 'd', review: 'r', refine: 'f' }) });

    const result = await pipeline.run({ query: 'X' });

    expect(pipeline.getStageOrder()).toEqual(['research', 'draft_answer', 'review_answer', 'refine_answer']);
    expect(result.stages.map((s) => s.stage)).toEqual(['research', 'draft_answer', 'review_answer', 'refine_answer']);
  });

  it('should use the refined text as the final answer when every call succeeds', async () => {
    const search = fakeSearch(DOCS);
    const generator = fakeGenerator({ draft: 'Draft about X', review: 'Needs a conclusion.', refine: 'Refined answer about X' });

    const result = await createResearchPipeline({ search, generator }).run({ query: 'X' });

    expect(search.search).toHaveBeenCalledWith('X');
    expect(systemPromptsCalled(generator)).toEqual([DRAFT_SYSTEM_PROMPT, REVIEW_SYSTEM_PROMPT, REFINE_SYSTEM_PROMPT]);
    expect(result.state).toEqual({
      query: 'X',
      research_data: DOCS,
      answer: 'Draft about X',
      reviewed_answer: 'Draft about X',
      feedback: 'Needs a conclusion.',
      final_answer: 'Refined answer about X',
    });
    expect(result.state).not.toHaveProperty('error');
    expect(result.diagnostics).toEqual([]);
  });

  it('should degrade a failed search through every sentinel without calling the generator', async () => {
    const generator = fakeGenerator({ draft: 'unused', review: 'unused', refine: 'unused' });

    const result = await createResearchPipeline({ search: fakeSearch(new Error('search service unavailable')), generator }).run({ query: 'X' });

    expect(generator.complete).not.toHaveBeenCalled();
    expect(result.state).toEqual({
      query: 'X',
      research_data: null,
      error: 'search service unavailable',
      answer: NO_RESEARCH_DATA,
      reviewed_answer: NO_RESEARCH_DATA,
      feedback: NO_ANSWER_TO_REVIEW,
      final_answer: NO_RESEARCH_DATA,
    });
    expect(result.stages.map((s) => s.status)).toEqual(['failed', 'skipped', 'skipped', 'skipped']);
    expect(result.diagnostics).toEqual([{ stage: 'research', message: 'search service unavailable' }]);
  });

  it('should end a run whose draft call fails with the failed-draft sentinel', async () => {
    const generator = fakeGenerator({ draft: new Error('model overloaded'), review: 'unused', refine: 'unused' });

    const result = await createResearchPipeline({ search: fakeSearch(DOCS), generator }).run({ query: 'X' });

    expect(systemPromptsCalled(generator)).toEqual([DRAFT_SYSTEM_PROMPT]);
    expect(result.state.answer).toBe(DRAFT_FAILED);
    expect(result.state.feedback).toBe(NO_ANSWER_TO_REVIEW);
    expect(result.state.final_answer).toBe(DRAFT_FAILED);
    expect(result.state.error).toBe('model overloaded');
  });

  it('should keep the draft as the final answer when the review call fails', async () => {
    const generator = fakeGenerator({ draft: 'Draft about X', review: new Error('quota exceeded'), refine: 'unused' });

    const result = await createResearchPipeline({ search: fakeSearch(DOCS), generator }).run({ query: 'X' });

    expect(systemPromptsCalled(generator)).toEqual([DRAFT_SYSTEM_PROMPT, REVIEW_SYSTEM_PROMPT]);
    expect(result.state.feedback).toBe(REVIEW_FAILED);
    expect(result.state.final_answer).toBe('Draft about X');
    expect(result.state.error).toBe('quota exceeded');
  });

  it('should keep the draft as the final answer when the refine call fails', async () => {
    const generator = fakeGenerator({ draft: 'Draft about X', review: 'Needs a conclusion.', refine: new Error('timeout of 60000ms exceeded') });

    const result = await createResearchPipeline({ search: fakeSearch(DOCS), generator }).run({ query: 'X' });

    expect(result.state.final_answer).toBe('Draft about X');
    expect(result.diagnostics).toEqual([{ stage: 'refine_answer', message: 'timeout of 60000ms exceeded' }]);
  });

  it('should treat an empty result list like missing research data', async () => {
    const generator = fakeGenerator({});

    const state = await createResearchPipeline({ search: fakeSearch([]), generator }).invoke({ query: 'X' });

    expect(generator.complete).not.toHaveBeenCalled();
    expect(state.research_data).toEqual([]);
    expect(state.final_answer).toBe(NO_RESEARCH_DATA);
  });

  it('should always produce a string final answer, whatever the adapters do', async () => {
    const searchOutcomes: Array<SearchResult[] | Error> = [DOCS, new Error('search down')];
    const replyOptions: Reply[] = ['text', new Error('gen down')];

    for (const searchOutcome of searchOutcomes) {
      for (const draft of replyOptions) {
        for (const review of replyOptions) {
          for (const refine of replyOptions) {
            const pipeline = createResearchPipeline({ search: fakeSearch(searchOutcome), generator: fakeGenerator({ draft, review, refine }) });
            const state = await pipeline.invoke({ query: 'X' });
            expect(typeof state.final_answer).toBe('string');
            expect(state.final_answer).not.toBe('');
          }
        }
      }
    }
  });

  it('should route stage diagnostics through the supplied logger', async () => {
    const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };

    await createResearchPipeline({ search: fakeSearch(new Error('search down')), generator: fakeGenerator({}), logger }).run({ query: 'X' });

    expect(logger.error).toHaveBeenCalledWith('Error during research: search down');
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^Failed: research \(\d+ms\)$/), { error: 'search down' });
  });
});
