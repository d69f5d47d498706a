/**
 * Document collection search.
 */

import type { RankingMetric } from "./enums.js";

export interface DocumentSearchRequest {
  readonly query: string;
  readonly collection_ids: readonly string[];
  readonly limit?: number;
  readonly ranking_metric?: RankingMetric;
  /** Free-form guidance for the retriever. */
  readonly instructions?: string;
}

export interface SearchMatch {
  readonly file_id: string;
  readonly chunk_id: string;
  readonly content: string;
  readonly score: number;
  readonly collection_ids: readonly string[];
}

export interface DocumentSearchResponse {
  readonly matches: readonly SearchMatch[];
}

export class DocumentSearchRequestBuilder {
  private readonly collectionIds: string[] = [];
  private limit: number | undefined;
  private rankingMetric: RankingMetric | undefined;
  private instructions: string | undefined;

  constructor(private readonly query: string) {}

  addCollection(collection_id: string): this {
    this.collectionIds.push(collection_id);
    return this;
  }

  withLimit(limit: number): this {
    this.limit = limit;
    return this;
  }

  withRankingMetric(metric: RankingMetric): this {
    this.rankingMetric = metric;
    return this;
  }

  withInstructions(instructions: string): this {
    this.instructions = instructions;
    return this;
  }

  build(): DocumentSearchRequest {
    return Object.freeze({
      query: this.query,
      collection_ids: Object.freeze([...this.collectionIds]),
      ...(this.limit !== undefined ? { limit: this.limit } : {}),
      ...(this.rankingMetric !== undefined ? { ranking_metric: this.rankingMetric } : {}),
      ...(this.instructions !== undefined ? { instructions: this.instructions } : {}),
    });
  }
}
