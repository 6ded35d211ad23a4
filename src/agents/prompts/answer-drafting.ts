import type { SearchResult } from '../types';

export const DRAFT_SYSTEM_PROMPT = 'You are an AI research assistant.';

/** Render search results as numbered sources the model can cite */
export function formatResearchData(results: SearchResult[]): string {
  return results
    .map((result, index) => {
      const heading = result.title ? `[${index + 1}] ${result.title}` : `[${index + 1}]`;
      const source = result.url ? `\nSource: ${result.url}` : '';
      return `${heading}${source}\n${result.content.trim()}`;
    })
    .join('\n\n');
}

export function buildDraftPrompt(results: SearchResult[]): string {
  return `Based on the following research data, draft a comprehensive and well-structured response:

### RESEARCH DATA
${formatResearchData(results)}

Please ensure the response is:
- Clear and concise
- Well-organized with headings and bullet points where appropriate
- Supported by evidence from the research data
- Free of jargon and accessible to a general audience
`;
}
