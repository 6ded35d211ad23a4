/* eslint-disable @typescript-eslint/unbound-method */
import { DraftAgent } from '../../../src/agents/draft-agent';
import { DRAFT_SYSTEM_PROMPT } from '../../../src/agents/prompts/answer-drafting';
import type { TextGenerator } from '../../../src/agents/types';
import { DRAFT_FAILED, NO_RESEARCH_DATA } from '../../../src/orchestrator/data-flow';

describe('DraftAgent', () => {
  let generator: jest.Mocked<TextGenerator>;

  beforeEach(() => {
    generator = { complete: jest.fn() };
  });

  it('should short-circuit without calling the generator when research data is null', async () => {
    const outcome = await new DraftAgent(generator).run({ query: 'q', research_data: null });

    expect(generator.complete).not.toHaveBeenCalled();
    expect(outcome).toEqual({ status: 'skipped', update: { answer: NO_RESEARCH_DATA }, reason: 'No research data' });
  });

  it('should short-circuit when research data is absent or empty', async () => {
    const agent = new DraftAgent(generator);

    await expect(agent.run({ query: 'q' })).resolves.toEqual(expect.objectContaining({ update: { answer: NO_RESEARCH_DATA } }));
    await expect(agent.run({ query: 'q', research_data: [] })).resolves.toEqual(expect.objectContaining({ update: { answer: NO_RESEARCH_DATA } }));
    expect(generator.complete).not.toHaveBeenCalled();
  });

  it('should draft an answer from a prompt that embeds the research data', async () => {
    generator.complete.mockResolvedValue('## Tides\nThe moon is responsible.');

    const outcome = await new DraftAgent(generator).run({
      query: 'q',
      research_data: [{ title: 'Tides', url: 'https://example.com/tides', content: 'The moon pulls the oceans.' }],
    });

    expect(outcome).toEqual({ status: 'ok', update: { answer: '## Tides\nThe moon is responsible.' } });
    const [systemPrompt, userPrompt] = generator.complete.mock.calls[0] ?? [];
    expect(systemPrompt).toBe(DRAFT_SYSTEM_PROMPT);
    expect(userPrompt).toContain('[1] Tides\nSource: https://example.com/tides\nThe moon pulls the oceans.');
    expect(userPrompt).toContain('- Supported by evidence from the research data');
  });

  it('should return the draft-failure sentinel and the error when generation fails', async () => {
    generator.complete.mockRejectedValue(new Error('model overloaded'));

    const outcome = await new DraftAgent(generator).run({ query: 'q', research_data: [{ title: '', url: '', content: 'c' }] });

    expect(outcome).toEqual({ status: 'failed', update: { answer: DRAFT_FAILED }, error: 'model overloaded' });
  });
});
