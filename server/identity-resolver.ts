import type { Match, ResolveResult } from "@shared/conversation";
import { EMBEDDING_DIMENSIONS } from "@shared/schema";
import { AppError, ErrorCode, withErrorCode } from "./error-handling";
import { isUsableEmbedding } from "./embedding-service";
import type { IStorage } from "./storage";

export interface ResolverOptions {
  imageMatchThreshold: number;
  textMatchThreshold: number;
  textResultLimit: number;
  // how many nearest neighbours to fetch before re-ranking
  candidatePoolSize: number;
  // width of the stored vectors; query embeddings must match it
  dimensions: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  imageMatchThreshold: 0.82,
  textMatchThreshold: 0.25,
  textResultLimit: 5,
  candidatePoolSize: 5,
  dimensions: EMBEDDING_DIMENSIONS,
};

/**
 * Similarity descending, item id ascending on exact ties, threshold applied
 * after ordering so an approximate index cannot leak a weaker match.
 */
export function rankMatches(candidates: readonly Match[], threshold: number, limit: number): Match[] {
  return candidates
    .filter((candidate) => candidate.similarity >= threshold)
    .sort((a, b) => b.similarity - a.similarity || a.itemId - b.itemId)
    .slice(0, limit);
}

export class IdentityResolver {
  private readonly options: ResolverOptions;

  constructor(private readonly storage: IStorage, options: Partial<ResolverOptions> = {}) {
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
  }

  async resolve(queryEmbedding: number[]): Promise<ResolveResult> {
    const candidates = await this.nearest(queryEmbedding, this.options.candidatePoolSize);
    const [best] = rankMatches(candidates, -Infinity, 1);

    if (!best) {
      return { kind: 'no_match', bestSimilarity: null };
    }
    if (best.similarity >= this.options.imageMatchThreshold) {
      return { kind: 'match', itemId: best.itemId, similarity: best.similarity };
    }
    return { kind: 'no_match', bestSimilarity: best.similarity };
  }

  async resolveText(queryEmbedding: number[]): Promise<Match[]> {
    const limit = this.options.textResultLimit;
    const candidates = await this.nearest(queryEmbedding, Math.max(limit, this.options.candidatePoolSize));
    return rankMatches(candidates, this.options.textMatchThreshold, limit);
  }

  private async nearest(queryEmbedding: number[], limit: number): Promise<Match[]> {
    if (!isUsableEmbedding(queryEmbedding, this.options.dimensions)) {
      throw new AppError(
        ErrorCode.COLLABORATOR_UNAVAILABLE,
        new Error(
          `Embedding provider returned an unusable vector (${queryEmbedding.length} dimensions, expected ${this.options.dimensions})`
        ),
        { dimensions: queryEmbedding.length }
      );
    }
    return withErrorCode(ErrorCode.PERSISTENCE_UNAVAILABLE, () =>
      this.storage.findNearestItems(queryEmbedding, limit)
    );
  }
}
