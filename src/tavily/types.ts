import type { SearchDepth } from '../config/validator';
import type { PipelineLogger } from '../orchestrator/logger';

export interface TavilyClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  maxResults?: number;
  searchDepth?: SearchDepth;
  logger?: PipelineLogger;
}

export interface TavilySearchRequest {
  query: string;
  max_results: number;
  search_depth: SearchDepth;
}

export interface TavilySearchResult {
  title?: string;
  url?: string;
  content?: string;
  score?: number;
}

export interface TavilySearchResponse {
  query?: string;
  results?: TavilySearchResult[];
  response_time?: number;
}
