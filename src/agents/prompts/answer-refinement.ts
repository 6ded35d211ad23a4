export const REFINE_SYSTEM_PROMPT = 'You are an AI refiner.';

export function buildRefinePrompt(input: { answer: string; feedback: string }): string {
  return `Refine the following answer based on the feedback provided:

### ANSWER
${input.answer}

### FEEDBACK
${input.feedback}

Please ensure the refined answer addresses all points in the feedback.
Return only the refined answer.
`;
}
