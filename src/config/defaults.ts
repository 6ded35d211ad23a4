import type { Config } from './validator';

export const defaults: Config = {
  tavily: {
    api_key: '',
    max_results: 5,
    search_depth: 'basic',
    timeout_ms: 30000,
  },
  groq: {
    api_key: '',
    model: 'llama-3.3-70b-versatile',
    temperature: 0.7,
    timeout_ms: 60000,
  },
};
