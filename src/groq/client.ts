import axios, { AxiosInstance, AxiosError } from 'axios';
import type { TextGenerator } from '../agents/types';
import { extractErrorDetail } from '../http/errors';
import { retryAfterMs } from '../http/retry-after';
import { GroqError, GroqAuthenticationError, GroqRateLimitError, GroqModelNotFoundError } from './errors';
import type { ChatCompletionRequest, ChatCompletionResponse, GroqClientOptions } from './types';

export class GroqClient implements TextGenerator {
  private axiosInstance: AxiosInstance;

  constructor(private options: GroqClientOptions) {
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl || 'https://api.groq.com/openai/v1',
      timeout: options.timeout || 60000,
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
        logger.debug(`[Groq API] ${config.method?.toUpperCase()} ${config.url}`, { model: this.options.model });
        return config;
      });
    }

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        const response = error.response;
        if (!response) throw new GroqError(`Network Error: ${error.message}`, 0, error);

        const detail = extractErrorDetail(response.data);
        switch (response.status) {
          case 401:
            throw new GroqAuthenticationError(detail);
          case 404:
            throw new GroqModelNotFoundError(this.options.model);
          case 429:
            throw new GroqRateLimitError(retryAfterMs(response), detail);
          default:
            throw new GroqError(detail ?? response.statusText, response.status, error);
        }
      },
    );
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const payload: ChatCompletionRequest = {
      model: this.options.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature: this.options.temperature,
    };
    const { data } = await this.axiosInstance.post<ChatCompletionResponse>('/chat/completions', payload);

    const content = data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new GroqError('Groq API returned empty content');
    }

    return content;
  }
}
