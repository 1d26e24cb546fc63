// src/services/generation.ts
// What: Generation gateway contract and a streaming OpenAI-compatible implementation.
// How: Streams chat completion deltas from a local server. Sampling options the OpenAI schema lacks (top_k,
//      repeat_penalty) are passed through as extra body fields, which llama.cpp and Ollama accept.

import OpenAI from 'openai';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources/chat/completions';
import { ModelNotLoadedError, errorMessage } from '../errors.js';
import { createClient, type OpenAICompatibleOptions } from './embeddings.js';

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
  topP: number;
  topK: number;
  repeatPenalty: number;
  stopSequences: string[];
}

export const DEFAULT_GENERATION: GenerationParams = {
  maxTokens: 512,
  temperature: 0.7,
  topP: 0.9,
  topK: 40,
  repeatPenalty: 1.1,
  stopSequences: [],
};

export interface GenerationGateway {
  generate(prompt: string, params: GenerationParams, signal?: AbortSignal): AsyncIterable<string>;
}

type LocalChatParams = ChatCompletionCreateParamsStreaming & {
  top_k?: number;
  repeat_penalty?: number;
};

const SYSTEM_PROMPT =
  'You are a private assistant. Answer using only the provided context. ' +
  'If the context does not contain the answer, say so.';

export class OpenAICompatibleGenerator implements GenerationGateway {
  private readonly client: OpenAI;
  private readonly model: string | undefined;

  constructor(options: OpenAICompatibleOptions) {
    this.client = options.client ?? createClient(options.baseURL, options.apiKey);
    this.model = options.model?.trim() || undefined;
  }

  async *generate(prompt: string, params: GenerationParams, signal?: AbortSignal): AsyncIterable<string> {
    if (!this.model) {
      throw new ModelNotLoadedError('No chat model configured (CHAT_MODEL)');
    }
    const body: LocalChatParams = {
      model: this.model,
      stream: true,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      max_tokens: params.maxTokens,
      temperature: params.temperature,
      top_p: params.topP,
      top_k: params.topK,
      repeat_penalty: params.repeatPenalty,
      ...(params.stopSequences.length > 0 ? { stop: params.stopSequences } : {}),
    };

    let stream: AsyncIterable<ChatCompletionChunk>;
    try {
      stream = await this.client.chat.completions.create(body, { signal });
    } catch (err) {
      if (err instanceof OpenAI.NotFoundError) {
        throw new ModelNotLoadedError(`Chat model ${this.model} is not loaded: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }
    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content;
      if (text) yield text;
    }
  }
}
