import { z } from 'zod';
import { AppError, ErrorCode } from './error-handling';
import { callWithRetry, COLLABORATOR_RETRY, withTimeout, type RetryOptions } from './retry-strategy';
import { trackApiCall } from './monitoring';
import type { EmbeddingProvider } from './ports';

const JINA_API_URL = 'https://api.jina.ai/v1/embeddings';
const DEFAULT_EMBEDDING_MODEL = 'jina-clip-v1';
const DEFAULT_TIMEOUT_MS = 30000;

const jinaResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

type JinaInput = { image: string } | { text: string };

export interface JinaEmbeddingOptions {
  apiKey?: string;
  model?: string;
  apiUrl?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
}

/**
 * Image and text embeddings from the Jina CLIP endpoint. Both modalities land
 * in the same vector space, so text queries can be compared to photo embeddings.
 */
export class JinaEmbeddingProvider implements EmbeddingProvider {
  private readonly model: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryOptions;

  constructor(private readonly options: JinaEmbeddingOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.apiUrl = options.apiUrl ?? JINA_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { ...COLLABORATOR_RETRY.embedding, ...options.retry };
  }

  async embedImage(bytes: Uint8Array): Promise<number[]> {
    const imageData = Buffer.from(bytes).toString('base64');
    return this.embed({ image: `data:image/jpeg;base64,${imageData}` });
  }

  async embedText(text: string): Promise<number[]> {
    return this.embed({ text });
  }

  private async embed(input: JinaInput): Promise<number[]> {
    const key = this.options.apiKey;
    if (!key) {
      throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('JINA_API_KEY is required for embeddings'));
    }

    return trackApiCall('embedding', () =>
      callWithRetry('Jina', () => this.request(key, input), this.retry)
    );
  }

  private async request(key: string, input: JinaInput): Promise<number[]> {
    const response = await withTimeout(
      fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${key}`,
        },
        body: JSON.stringify({ model: this.model, input: [input] }),
      }),
      this.timeoutMs
    );

    if (!response.ok) {
      const errorText = await response.text();
      // Sanitize HTML error pages from response
      const cleanError = errorText.includes('<!DOCTYPE') || errorText.includes('<html')
        ? response.statusText || 'API error'
        : errorText.slice(0, 200);
      // Only an oversized image is the caller's fault; auth, quota and outages are ours
      const code = response.status === 413 ? ErrorCode.INVALID_INPUT : ErrorCode.COLLABORATOR_UNAVAILABLE;
      throw new AppError(code, new Error(`Jina API error: ${response.status} - ${cleanError}`), {
        httpStatus: response.status,
      });
    }

    const parsed = jinaResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('Invalid response from Jina API: missing embedding'));
    }

    return parsed.data.data[0].embedding;
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

export function distanceToSimilarity(distance: number): number {
  return Math.max(0, 1 - distance);
}

/**
 * Finite, not all zero, and as wide as the stored vectors.
 */
export function isUsableEmbedding(embedding: readonly number[], dimensions: number): boolean {
  return (
    embedding.length === dimensions &&
    embedding.every(Number.isFinite) &&
    embedding.some((value) => value !== 0)
  );
}
