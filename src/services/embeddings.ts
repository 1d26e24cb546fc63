// src/services/embeddings.ts
// What: Embedding gateway contract and its OpenAI-compatible implementation.
// How: Uses the openai client pointed at a local server (llama.cpp server, Ollama) so text never leaves the
//      device. A missing model, or a 404 from the server, surfaces as ModelNotLoadedError so pipelines can abort.

import OpenAI from 'openai';
import type { CreateEmbeddingResponse } from 'openai/resources/embeddings';
import { ModelNotLoadedError, errorMessage } from '../errors.js';

export interface EmbeddingGateway {
  embed(text: string): Promise<number[]>;
}

export interface OpenAICompatibleOptions {
  baseURL: string;
  apiKey: string;
  model?: string;
  client?: OpenAI;
}

export function createClient(baseURL: string, apiKey: string): OpenAI {
  return new OpenAI({ baseURL, apiKey, maxRetries: 1 });
}

export class OpenAICompatibleEmbeddings implements EmbeddingGateway {
  private readonly client: OpenAI;
  private readonly model: string | undefined;

  constructor(options: OpenAICompatibleOptions) {
    this.client = options.client ?? createClient(options.baseURL, options.apiKey);
    this.model = options.model?.trim() || undefined;
  }

  async embed(text: string): Promise<number[]> {
    if (!this.model) {
      throw new ModelNotLoadedError('No embedding model configured (EMBED_MODEL)');
    }
    let res: CreateEmbeddingResponse;
    try {
      res = await this.client.embeddings.create({ model: this.model, input: text, encoding_format: 'float' });
    } catch (err) {
      if (err instanceof OpenAI.NotFoundError) {
        throw new ModelNotLoadedError(`Embedding model ${this.model} is not loaded: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      throw err;
    }
    const vec = res.data[0]?.embedding;
    if (!vec || vec.length === 0) {
      throw new Error(`Embedding server returned no vector for model ${this.model}`);
    }
    return vec;
  }
}
