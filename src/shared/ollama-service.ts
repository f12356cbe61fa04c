// Ollama Service - Chat completions from a local Ollama server
// Used by the analyst and report nodes of the stock analysis workflow

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import configManager from './config';
import { safeErrorMessage } from './http-errors';
import logger from './logger';
import { ChatMessage, ChatModel } from './types';

const ChatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

export class LlmRequestError extends Error {
  public readonly model: string;
  constructor(model: string, message: string, options?: ErrorOptions) {
    super(`[${model}] ${message}`, options);
    this.name = 'LlmRequestError';
    this.model = model;
  }
}

export interface OllamaServiceOptions {
  baseUrl: string;
  model: string;
  timeout: number;
  temperature: number;
}

export function parseChatResponse(data: unknown): string {
  return ChatResponseSchema.parse(data).message.content;
}

export class OllamaService implements ChatModel {
  private readonly client: AxiosInstance;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: OllamaServiceOptions = configManager.getSection('ollama'), client?: AxiosInstance) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.client = client ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * Send one non-streaming chat request and return the reply text
   */
  async chat(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const startedAt = Date.now();
    try {
      const response = await this.client.post('/api/chat', {
        model: this.model,
        messages,
        stream: false,
        options: { temperature: this.temperature },
      }, { signal });

      const content = parseChatResponse(response.data);
      logger.debug(`[Ollama] ${this.model} replied with ${content.length} chars in ${Date.now() - startedAt}ms`);
      return content;
    } catch (error) {
      logger.error(`[Ollama] Chat request failed: ${safeErrorMessage(error)}`);
      throw new LlmRequestError(this.model, safeErrorMessage(error), { cause: error });
    }
  }
}

const ollamaService = new OllamaService();
export default ollamaService;
