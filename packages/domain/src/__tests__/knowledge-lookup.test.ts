import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { KnowledgeLookupService, titleCase, tokenize } from '../knowledge/knowledge-lookup-service.js';
import { loadKnowledgeBase, type KnowledgeBaseData } from '../knowledge/knowledge-base.js';

describe('KnowledgeLookupService', () => {
  const data = loadKnowledgeBase();
  const lookup = new KnowledgeLookupService(data);
  const answerFor = (key: string): string | undefined =>
    data.entries.find((entry) => entry.key === key)?.answer;

  describe('exact stage', () => {
    it('should match a canonical key inside the query', () => {
      const result = lookup.lookup('What is asthma?');

      expect(result.stage).toBe('exact');
      expect(result.matchedKey).toBe('asthma');
      expect(result.confidence).toBe('High');
      expect(result.answer).toBe(answerFor('asthma'));
      expect(result.sources.map((s) => s.organization)).toEqual(['GINA', 'NICE UK']);
    });

    it('should prefer the earlier key when several are contained', () => {
      const result = lookup.lookup('Type 1 Diabetes in adults');

      expect(result.matchedKey).toBe('diabetes');
      expect(result.stage).toBe('exact');
    });

    it('should ignore surrounding whitespace and case', () => {
      expect(lookup.lookup('   GOUT   ').matchedKey).toBe('gout');
    });
  });

  describe('alias stage', () => {
    it('should resolve an abbreviation to its canonical entry', () => {
      const result = lookup.lookup('t2dm management');

      expect(result.stage).toBe('alias');
      expect(result.matchedKey).toBe('diabetes');
      expect(result.confidence).toBe('High');
      expect(result.answer).toContain('Metformin');
    });

    it('should match multi-word synonyms', () => {
      const result = lookup.lookup('what helps acid reflux at night');

      expect(result.matchedKey).toBe('gerd');
      expect(result.stage).toBe('alias');
    });

    it('should match an alias anywhere in the query text', () => {
      const result = lookup.lookup('xyzzy problems');

      expect(result.stage).toBe('alias');
      expect(result.matchedKey).toBe('multiple sclerosis');
    });

    it('should match an alias inside an inflected word', () => {
      const result = lookup.lookup('chronic headaches');

      expect(result.stage).toBe('alias');
      expect(result.matchedKey).toBe('migraine');
      expect(result.confidence).toBe('High');
    });

    it('should match a multi-word alias followed by a suffix', () => {
      const result = lookup.lookup('knee pains');

      expect(result.stage).toBe('alias');
      expect(result.matchedKey).toBe('osteoarthritis');
    });

    it('should try aliases in table order', () => {
      const ordered: KnowledgeBaseData = {
        ...data,
        aliases: { qqa: 'gout', qq: 'asthma' },
      };

      expect(new KnowledgeLookupService(ordered).lookup('zz qqa').matchedKey).toBe('gout');
    });

    it('should skip aliases whose target key is missing', () => {
      const partial: KnowledgeBaseData = { ...data, aliases: { zzq: 'not a key' } };
      const result = new KnowledgeLookupService(partial).lookup('zzq');

      expect(result.stage).toBe('fallback');
    });
  });

  describe('token stage', () => {
    it('should pick the key with the largest word overlap', () => {
      const result = lookup.lookup('kidney stones');

      expect(result.stage).toBe('token');
      expect(result.matchedKey).toBe('chronic kidney disease');
      expect(result.confidence).toBe('Moderate');
    });

    it('should ignore stop words when counting overlap', () => {
      const result = lookup.lookup('what is the treatment for this disease');

      expect(result.stage).toBe('fallback');
    });
  });

  describe('fallback stage', () => {
    it('should build the generic overview for an unknown query', () => {
      const result = lookup.lookup('xyzabc123 rare disease');
      const { templates } = data;

      expect(result.stage).toBe('fallback');
      expect(result.matchedKey).toBeNull();
      expect(result.confidence).toBe('Moderate');
      expect(result.answer).toBe(
        [
          '**Clinical Overview — Xyzabc123 Rare Disease**\n',
          templates.generic.replaceAll('{title}', 'Xyzabc123 Rare Disease'),
          templates.closing.replaceAll('{title}', 'Xyzabc123 Rare Disease'),
        ].join('\n')
      );
      expect(result.sources).toHaveLength(5);
      expect(result.sources[4]).toEqual({
        title: 'PubMed Medical Literature',
        url: 'https://pubmed.ncbi.nlm.nih.gov/?term=xyzabc123+rare+disease',
        organization: 'NCBI',
      });
    });

    it('should add the category body and matching addenda', () => {
      const result = lookup.lookup('severe lymphoma in an infant');

      expect(result.stage).toBe('fallback');
      expect(result.answer.startsWith('**Clinical Overview — Severe Lymphoma In An Infant**\n\n')).toBe(
        true
      );
      expect(result.answer).toContain(
        '**Diagnosis & Staging:** Severe Lymphoma In An Infant is usually confirmed on biopsy'
      );
      expect(result.answer).toContain('⚠️ **Emergency Considerations:**');
      expect(result.answer).toContain('👶 **Paediatric Considerations:**');
      expect(result.answer.indexOf('⚠️')).toBeLessThan(result.answer.indexOf('👶'));
    });

    it('should encode each query word in the search link', () => {
      const result = lookup.lookup('  zzq & qqz  ');

      expect(result.sources[4]?.url).toBe('https://pubmed.ncbi.nlm.nih.gov/?term=zzq+%26+qqz');
    });

    it('should handle an empty query', () => {
      const result = lookup.lookup('');

      expect(result.stage).toBe('fallback');
      expect(result.answer.startsWith('**Clinical Overview — **\n')).toBe(true);
      expect(result.sources[4]?.url).toBe('https://pubmed.ncbi.nlm.nih.gov/?term=');
    });
  });

  describe('properties', () => {
    it('should never throw and report confidence consistent with the stage', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 80 }), (query) => {
          const result = lookup.lookup(query);
          const high = result.stage === 'exact' || result.stage === 'alias';
          expect(result.confidence).toBe(high ? 'High' : 'Moderate');
          expect(result.matchedKey === null).toBe(result.stage === 'fallback');
        })
      );
    });

    it('should be deterministic', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 80 }), (query) => {
          expect(lookup.lookup(query)).toEqual(lookup.lookup(query));
        })
      );
    });

    it('should resolve every canonical key at the exact stage', () => {
      for (const entry of data.entries) {
        expect(lookup.lookup(entry.key).stage).toBe('exact');
      }
    });
  });
});

describe('tokenize', () => {
  it('should split on punctuation and whitespace', () => {
    expect(tokenize("covid-19, what's new?")).toEqual(['covid', '19', 'what', 's', 'new']);
  });
});

describe('titleCase', () => {
  it('should capitalize every letter run', () => {
    expect(titleCase('xyzabc123 rare DISEASE')).toBe('Xyzabc123 Rare Disease');
  });
});
