import { EmbeddingUnavailable, errorMessage } from '../utils/errors';
import { normalizeVector } from '../highlights/similarity';
import { EMBEDDING_MAX_LENGTH, OpenRouterEmbeddings } from './llm';
import { debugLogger } from '../utils/debug-logger';

/**
 * Converts text into a fixed-length vector. Implementations reject with
 * EmbeddingUnavailable; callers decide how to degrade.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

const STOPWORDS = new Set([
  'the', 'and', 'for', 'that', 'with', 'this', 'from', 'are', 'was', 'were', 'has', 'have',
  'had', 'its', 'but', 'not', 'you', 'his', 'her', 'they', 'their', 'will', 'would', 'been',
  'into', 'about', 'after', 'over', 'said', 'says', 'than', 'then', 'also', 'which', 'who',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(token => token.length > 2 && !STOPWORDS.has(token));
}

/** 32-bit FNV-1a */
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Local hashed bag-of-words embeddings. Deterministic and offline; used when no
 * remote embedding backend is configured. Empty text maps to the zero vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local-hashing';

  constructor(readonly dimensions = 384) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      const sign = (hash & 0x80000000) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }
    return normalizeVector(vector);
  }
}

/**
 * Remote embeddings through OpenRouter. Any transport or API failure surfaces
 * as EmbeddingUnavailable.
 */
export class OpenRouterEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openrouter';
  private embeddings: OpenRouterEmbeddings;

  constructor(readonly dimensions: number, embeddings?: OpenRouterEmbeddings) {
    this.embeddings = embeddings ?? new OpenRouterEmbeddings({ dimensions });
  }

  async embed(text: string): Promise<number[]> {
    const input = text.length > EMBEDDING_MAX_LENGTH ? text.substring(0, EMBEDDING_MAX_LENGTH) : text;
    let vector: number[] | undefined;
    try {
      vector = await this.embeddings.embedQuery(input);
    } catch (error) {
      debugLogger.warn('EMBED', 'Remote embedding failed', { error: errorMessage(error) });
      throw new EmbeddingUnavailable(`OpenRouter embedding failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!vector || vector.length !== this.dimensions) {
      throw new EmbeddingUnavailable(
        `OpenRouter returned ${vector?.length ?? 0} dimensions, expected ${this.dimensions}`
      );
    }
    return vector;
  }
}

export function createEmbeddingProvider(config: {
  embeddingBackend: 'local' | 'openrouter';
  embeddingDimensions: number;
}): EmbeddingProvider {
  if (config.embeddingBackend === 'openrouter') {
    return new OpenRouterEmbeddingProvider(config.embeddingDimensions);
  }
  return new HashingEmbeddingProvider(config.embeddingDimensions);
}
