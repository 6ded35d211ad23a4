import axios, { AxiosInstance, AxiosError } from 'axios';
import type { SearchAdapter, SearchResult } from '../agents/types';
import type { SearchDepth } from '../config/validator';
import { extractErrorDetail } from '../http/errors';
import { retryAfterMs } from '../http/retry-after';
import { TavilyError, TavilyAuthenticationError, TavilyRateLimitError } from './errors';
import type { TavilyClientOptions, TavilySearchRequest, TavilySearchResponse } from './types';

export class TavilyClient implements SearchAdapter {
  private axiosInstance: AxiosInstance;
  private maxResults: number;
  private searchDepth: SearchDepth;

  constructor(private options: TavilyClientOptions) {
    this.maxResults = options.maxResults ?? 5;
    this.searchDepth = options.searchDepth ?? 'basic';
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl || 'https://api.tavily.com',
      timeout: options.timeout || 30000,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    const logger = this.options.logger;
    if (logger) {
      this.axiosInstance.interceptors.request.use((config) => {
        logger.debug(`[Tavily API] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      });
    }

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        const response = error.response;
        if (!response) throw new TavilyError(`Network Error: ${error.message}`, 0, error);

        const detail = extractErrorDetail(response.data);
        switch (response.status) {
          case 401:
          case 403:
            throw new TavilyAuthenticationError(detail);
          case 429:
            throw new TavilyRateLimitError(retryAfterMs(response), detail);
          default:
            throw new TavilyError(detail ?? response.statusText, response.status, error);
        }
      },
    );
  }

  async search(query: string): Promise<SearchResult[]> {
    const payload: TavilySearchRequest = {
      query,
      max_results: this.maxResults,
      search_depth: this.searchDepth,
    };
    const { data } = await this.axiosInstance.post<TavilySearchResponse>('/search', payload);

    if (!Array.isArray(data.results)) {
      throw new TavilyError('Tavily response did not contain a results list');
    }

    return data.results.map((r) => ({
      title: r.title ?? '',
      url: r.url ?? '',
      content: r.content ?? '',
      score: r.score,
    }));
  }
}
