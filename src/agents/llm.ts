import { ChatOpenAI } from '@langchain/openai';
import { Embeddings, EmbeddingsParams } from '@langchain/core/embeddings';
import { CallbackHandler } from '@langfuse/langchain';
import { z } from 'zod';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const CHAT_MODEL = 'openai/gpt-4.1-mini';
const EMBEDDING_MODEL = 'openai/text-embedding-3-small';
export const EMBEDDING_MAX_LENGTH = 8000;

/** OpenRouter attribution headers sent with every request */
function attribution(): Record<string, string> {
  return {
    'HTTP-Referer': process.env.APP_URL || 'http://localhost:3001',
    'X-Title': 'News Highlights',
  };
}

export function isTracingEnabled(): boolean {
  return Boolean(process.env.LANGFUSE_PUBLIC_KEY && process.env.LANGFUSE_SECRET_KEY);
}

/**
 * Langfuse callback for a single model call, or undefined when tracing is off.
 * Spans leave the process through the processor set up in instrumentation.ts.
 */
export function createLangfuseHandler(purpose: string): CallbackHandler | undefined {
  if (!isTracingEnabled()) return undefined;

  return new CallbackHandler({
    tags: ['news-highlights', purpose],
    traceMetadata: { model: CHAT_MODEL, purpose },
  });
}

export interface ChatModelOptions {
  temperature: number;
  maxTokens: number;
}

export function createOpenRouterLLM({ temperature, maxTokens }: ChatModelOptions): ChatOpenAI {
  return new ChatOpenAI({
    model: CHAT_MODEL,
    apiKey: process.env.OPENROUTER_API_KEY,
    configuration: {
      baseURL: OPENROUTER_BASE_URL,
      defaultHeaders: attribution(),
    },
    temperature,
    maxTokens,
    streaming: false,
    maxRetries: 1,
  });
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int(),
  })),
});

export interface OpenRouterEmbeddingsOptions extends EmbeddingsParams {
  model?: string;
  /** Requested output size; omitted from the request when unset */
  dimensions?: number;
}

/**
 * LangChain embeddings over OpenRouter's OpenAI-compatible /embeddings route.
 * The API key is read from OPENROUTER_API_KEY at call time.
 */
export class OpenRouterEmbeddings extends Embeddings {
  private readonly model: string;
  private readonly dimensions?: number;

  constructor({ model = EMBEDDING_MODEL, dimensions, ...params }: OpenRouterEmbeddingsOptions = {}) {
    super(params);
    this.model = model;
    this.dimensions = dimensions;
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    const apiKey = process.env.OPENROUTER_API_KEY;
    if (!apiKey) {
      throw new Error('OPENROUTER_API_KEY is not set');
    }

    const response = await fetch(`${OPENROUTER_BASE_URL}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
        ...attribution(),
      },
      body: JSON.stringify({ model: this.model, input: documents, dimensions: this.dimensions }),
    });

    if (!response.ok) {
      throw new Error(`OpenRouter embedding error: ${response.status} ${response.statusText}`);
    }

    const { data } = EmbeddingResponseSchema.parse(await response.json());
    const ordered = new Array<number[]>(documents.length);
    for (const item of data) {
      ordered[item.index] = item.embedding;
    }
    return ordered;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([query]);
    return vector;
  }
}
