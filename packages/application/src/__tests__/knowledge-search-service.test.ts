import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@medisync/core';
import { KnowledgeLookupService } from '@medisync/domain';
import {
  KnowledgeSearchService,
  knowledgeSearchLinks,
} from '../use-cases/knowledge/KnowledgeSearchService.js';
import { createFakeStores, fixedClock, type FakeStores } from './helpers/in-memory-stores.js';

const NOW = '2026-03-01T09:00:00.000Z';

describe('KnowledgeSearchService', () => {
  const lookup = new KnowledgeLookupService();
  let stores: FakeStores;
  let service: KnowledgeSearchService;

  beforeEach(() => {
    stores = createFakeStores();
    service = new KnowledgeSearchService({
      lookup,
      knowledgeQueries: stores.knowledgeQueries,
      clock: fixedClock(NOW),
    });
  });

  it('should answer a trimmed query and record it', async () => {
    const expected = lookup.lookup('What is asthma?');

    const response = await service.search('  What is asthma?  ', { userId: 'user-1' });

    expect(response.id).toMatch(/^rag-[0-9a-f]{6}$/);
    expect(response.query).toBe('What is asthma?');
    expect(response.answer).toBe(expected.answer);
    expect(response.sources).toEqual(expected.sources);
    expect(response.stage).toBe('exact');
    expect(response.matchedKey).toBe('asthma');
    expect(response.confidence).toBe('High');
    expect(response.googleSearch).toBe(
      'https://www.google.com/search?q=What+is+asthma%3F+clinical+guidelines+treatment'
    );
    expect(response.pubmedSearch).toBe('https://pubmed.ncbi.nlm.nih.gov/?term=What+is+asthma%3F');

    expect(stores.knowledgeQueries.records).toEqual([
      {
        id: response.id,
        userId: 'user-1',
        query: 'What is asthma?',
        answerPreview: expected.answer.substring(0, 200),
        confidence: 'High',
        timestamp: NOW,
      },
    ]);
  });

  it('should record fallback answers with their confidence', async () => {
    const response = await service.search('xyzabc123 rare disease');

    expect(response.stage).toBe('fallback');
    expect(response.matchedKey).toBeNull();
    expect(stores.knowledgeQueries.records[0]?.confidence).toBe(response.confidence);
    expect(stores.knowledgeQueries.records[0]?.userId).toBeNull();
  });

  it.each([
    ['empty', ''],
    ['blank', '   '],
  ])('should answer an %s query with the generic overview', async (_label, query) => {
    const response = await service.search(query);

    expect(response.stage).toBe('fallback');
    expect(response.query).toBe('');
    expect(response.answer.startsWith('**Clinical Overview — **\n')).toBe(true);
    expect(response.googleSearch).toBe(
      'https://www.google.com/search?q=+clinical+guidelines+treatment'
    );
    expect(response.pubmedSearch).toBe('https://pubmed.ncbi.nlm.nih.gov/?term=');
    expect(stores.knowledgeQueries.records[0]?.query).toBe('');
  });

  it('should reject an overlong query', async () => {
    await expect(service.search('a'.repeat(501))).rejects.toBeInstanceOf(ValidationError);
    expect(stores.knowledgeQueries.records).toEqual([]);
  });

  it('should record a blank user id as no owner', async () => {
    await service.search('asthma', { userId: '' });

    expect(stores.knowledgeQueries.records[0]?.userId).toBeNull();
  });

  describe('knowledgeSearchLinks', () => {
    it('should spell out ampersands for Google and encode them for PubMed', () => {
      expect(knowledgeSearchLinks('Gout & diet')).toEqual({
        google: 'https://www.google.com/search?q=Gout+and+diet+clinical+guidelines+treatment',
        pubmed: 'https://pubmed.ncbi.nlm.nih.gov/?term=Gout+%26+diet',
      });
    });

    it('should collapse repeated whitespace', () => {
      expect(knowledgeSearchLinks('heart   failure').pubmed).toBe(
        'https://pubmed.ncbi.nlm.nih.gov/?term=heart+failure'
      );
    });
  });
});
