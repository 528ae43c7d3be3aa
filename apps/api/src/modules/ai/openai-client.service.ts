import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export interface LLMRequest {
  systemPrompt: string;
  userMessage: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json';
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number; totalTokens: number };
  finishReason: string;
}

export class OracleUnavailableError extends Error {
  constructor() {
    super('AI oracle is not configured (set AI_API_KEY)');
    this.name = 'OracleUnavailableError';
  }
}

/**
 * Thin wrapper around the OpenAI SDK. Every call is side-effect free, so the SDK's
 * own retry policy (AI_MAX_RETRIES) and timeout (AI_TIMEOUT_MS) apply as-is.
 */
@Injectable()
export class OpenAIClientService implements OnModuleInit {
  private readonly logger = new Logger(OpenAIClientService.name);
  private client: OpenAI | null = null;
  private model = 'gpt-4o-mini';
  private maxTokens = 1024;

  constructor(private readonly config: ConfigService) {}

  onModuleInit(): void {
    const apiKey = this.config.get<string>('AI_API_KEY');
    const baseURL = this.config.get<string>('AI_BASE_URL');
    this.model = this.config.get<string>('AI_MODEL') ?? this.model;
    this.maxTokens = this.config.get<number>('AI_MAX_TOKENS') ?? this.maxTokens;

    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        ...(baseURL ? { baseURL } : {}),
        timeout: this.config.get<number>('AI_TIMEOUT_MS') ?? 60_000,
        maxRetries: this.config.get<number>('AI_MAX_RETRIES') ?? 2,
      });
      this.logger.log(`OpenAI client initialized (model: ${this.model})`);
    } else {
      this.logger.warn('AI_API_KEY not set, oracle-backed checks will fail');
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    if (!this.client) {
      throw new OracleUnavailableError();
    }

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userMessage },
    ];

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      max_tokens: request.maxTokens ?? this.maxTokens,
      temperature: request.temperature ?? 0,
      ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const choice = completion.choices[0];
    if (!choice) throw new Error('No response from OpenAI');

    return {
      content: choice.message.content ?? '',
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
      finishReason: choice.finish_reason ?? 'unknown',
    };
  }
}
