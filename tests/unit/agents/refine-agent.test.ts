/* eslint-disable @typescript-eslint/unbound-method */
import { RefineAgent } from '../../../src/agents/refine-agent';
import { REFINE_SYSTEM_PROMPT } from '../../../src/agents/prompts/answer-refinement';
import type { TextGenerator } from '../../../src/agents/types';
import { NO_ANSWER_TO_REVIEW, REVIEW_FAILED } from '../../../src/orchestrator/data-flow';

describe('RefineAgent', () => {
  let generator: jest.Mocked<TextGenerator>;

  beforeEach(() => {
    generator = { complete: jest.fn() };
  });

  it.each([
    ['the review-failure sentinel', REVIEW_FAILED],
    ['the no-answer sentinel', NO_ANSWER_TO_REVIEW],
    ['empty feedback', ''],
  ])('should keep the reviewed answer on %s', async (_label, feedback) => {
    const outcome = await new RefineAgent(generator).run({ query: 'q', reviewed_answer: 'Draft text', feedback });

    expect(generator.complete).not.toHaveBeenCalled();
    expect(outcome).toEqual({ status: 'skipped', update: { final_answer: 'Draft text' }, reason: 'No usable feedback' });
  });

  it('should still set final_answer when nothing upstream was set', async () => {
    const outcome = await new RefineAgent(generator).run({ query: 'q' });
    expect(outcome.update).toEqual({ final_answer: '' });
  });

  it('should revise the answer using the feedback', async () => {
    generator.complete.mockResolvedValue('Refined text');

    const outcome = await new RefineAgent(generator).run({ query: 'q', reviewed_answer: 'Draft text', feedback: 'Shorten it.' });

    expect(outcome).toEqual({ status: 'ok', update: { final_answer: 'Refined text' } });
    const [systemPrompt, userPrompt] = generator.complete.mock.calls[0] ?? [];
    expect(systemPrompt).toBe(REFINE_SYSTEM_PROMPT);
    expect(userPrompt).toContain('### ANSWER\nDraft text\n');
    expect(userPrompt).toContain('### FEEDBACK\nShorten it.\n');
    expect(userPrompt).toContain('addresses all points in the feedback');
  });

  it('should fall back to the reviewed answer and report the error when generation fails', async () => {
    generator.complete.mockRejectedValue(new Error('context length exceeded'));

    const outcome = await new RefineAgent(generator).run({ query: 'q', reviewed_answer: 'Draft text', feedback: 'Shorten it.' });

    expect(outcome).toEqual({ status: 'failed', update: { final_answer: 'Draft text' }, error: 'context length exceeded' });
  });
});
