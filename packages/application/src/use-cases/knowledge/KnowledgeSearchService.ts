/**
 * @fileoverview Knowledge Search Service
 *
 * @module application/use-cases/knowledge/KnowledgeSearchService
 */

import { createLogger, generateRecordId, preview } from '@medisync/core';
import type { KnowledgeLookupService } from '@medisync/domain';
import {
  KnowledgeQuerySchema,
  type KnowledgeQueryRecord,
  type KnowledgeSource,
  type LookupConfidence,
  type LookupStage,
} from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import { parseInput } from '../../shared/validation.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { ownerOf, type RequestContext } from '../../shared/ownership.js';

const logger = createLogger({ name: 'KnowledgeSearchService' });

/** Stored answer prefix length */
const ANSWER_PREVIEW_LENGTH = 200;

export interface KnowledgeSearchServiceDeps {
  readonly lookup: KnowledgeLookupService;
  readonly knowledgeQueries: RecordCollection<KnowledgeQueryRecord>;
  readonly clock?: Clock;
}

export interface KnowledgeSearchResponse {
  readonly id: string;
  readonly query: string;
  readonly answer: string;
  readonly sources: readonly KnowledgeSource[];
  readonly confidence: LookupConfidence;
  readonly stage: LookupStage;
  readonly matchedKey: string | null;
  readonly googleSearch: string;
  readonly pubmedSearch: string;
}

function searchTerms(text: string): string {
  return text.split(/\s+/).filter(Boolean).map(encodeURIComponent).join('+');
}

/**
 * External search links for a query
 */
export function knowledgeSearchLinks(query: string): { google: string; pubmed: string } {
  const googleTerms = searchTerms(query.replace(/&/g, 'and'));
  return {
    google: `https://www.google.com/search?q=${googleTerms}+clinical+guidelines+treatment`,
    pubmed: `https://pubmed.ncbi.nlm.nih.gov/?term=${searchTerms(query)}`,
  };
}

export class KnowledgeSearchService {
  private readonly lookup: KnowledgeLookupService;
  private readonly knowledgeQueries: RecordCollection<KnowledgeQueryRecord>;
  private readonly clock: Clock;

  constructor(deps: KnowledgeSearchServiceDeps) {
    this.lookup = deps.lookup;
    this.knowledgeQueries = deps.knowledgeQueries;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Answer a clinical question and record the query
   *
   * @throws ValidationError for an empty or overlong query
   */
  async search(query: string, context: RequestContext = {}): Promise<KnowledgeSearchResponse> {
    const { query: trimmed } = parseInput(KnowledgeQuerySchema, { query }, 'knowledge query');
    const result = this.lookup.lookup(trimmed);
    const id = generateRecordId('rag', 6);

    await this.knowledgeQueries.append({
      id,
      userId: ownerOf(context),
      query: trimmed,
      answerPreview: preview(result.answer, ANSWER_PREVIEW_LENGTH),
      confidence: result.confidence,
      timestamp: this.clock(),
    });

    logger.info(
      { queryId: id, stage: result.stage, confidence: result.confidence },
      'Knowledge query answered'
    );

    const links = knowledgeSearchLinks(trimmed);
    return {
      id,
      query: trimmed,
      answer: result.answer,
      sources: result.sources,
      confidence: result.confidence,
      stage: result.stage,
      matchedKey: result.matchedKey,
      googleSearch: links.google,
      pubmedSearch: links.pubmed,
    };
  }
}
