/**
 * LLM collaborator - thin wrapper around the openai SDK
 *
 * Talks to any OpenAI-compatible chat-completions endpoint (Ollama, Groq,
 * OpenAI). The SDK's own retries are disabled: a failed call fails the
 * request, it is never silently repeated.
 */

import OpenAI from 'openai';
import type { PromptPair } from '../core/types.js';
import { EmptyCompletionError } from './errors.js';

/**
 * Options for one completion call
 */
export interface CompletionOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Anything that turns a system/user prompt pair into free text
 */
export interface LlmCollaborator {
  complete(prompt: PromptPair, options?: CompletionOptions): Promise<string>;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the SDK client this module uses
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionRequest,
        options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number }
      ): Promise<ChatCompletionResponse>;
    };
  };
}

export interface OpenAiCollaboratorOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export class OpenAiCollaborator implements LlmCollaborator {
  private client: ChatCompletionsClient;
  private options: OpenAiCollaboratorOptions;

  constructor(options: OpenAiCollaboratorOptions, client?: ChatCompletionsClient) {
    this.options = options;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  get model(): string {
    return this.options.model;
  }

  async complete(prompt: PromptPair, options: CompletionOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      },
      {
        signal: options.signal,
        timeout: options.timeoutMs ?? this.options.timeoutMs,
        maxRetries: 0,
      }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new EmptyCompletionError('LLM response contained no choices');
    }

    // A null body is treated as empty output; the validator reports the missing sections
    return (choice.message.content ?? '').trim();
  }
}
