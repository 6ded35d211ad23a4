/** A single document returned by the search service */
export interface SearchResult {
  title: string;
  url: string;
  content: string;
  score?: number;
}

/** Search backend used by the research stage */
export interface SearchAdapter {
  /** Rejects when the search cannot be performed */
  search(query: string): Promise<SearchResult[]>;
}

/** Chat-completion backend shared by the draft, review and refine stages */
export interface TextGenerator {
  /** Rejects when no text could be generated */
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}
