export const REVIEW_SYSTEM_PROMPT = 'You are an AI reviewer.';

export function buildReviewPrompt(answer: string): string {
  return `Review the following drafted answer and provide feedback for improvement:

### DRAFTED ANSWER
${answer}

Please consider:
- Clarity and coherence
- Accuracy of information
- Logical flow and structure
- Grammar and readability
`;
}
