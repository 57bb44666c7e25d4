/**
 * Knowledge Lookup Service
 *
 * Resolves a free-text clinical question against the static knowledge base in
 * four stages, first success wins:
 *
 * 1. exact    - a canonical key appears in the query (High)
 * 2. alias    - a synonym appears anywhere in the query (High)
 * 3. token    - largest overlap between query words and key words (Moderate)
 * 4. fallback - templated overview built from keyword categories (Moderate)
 *
 * No stage performs I/O; the data is loaded once by {@link loadKnowledgeBase}.
 *
 * @module domain/knowledge
 */

import type { KnowledgeEntry, KnowledgeSource, LookupResult } from '@medisync/types';
import { loadKnowledgeBase, type KnowledgeBaseData } from './knowledge-base.js';

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Word tokens of a lowercased string
 */
export function tokenize(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

/**
 * Capitalize the first letter of every letter run and lowercase the rest,
 * e.g. `xyzabc123 rare disease` → `Xyzabc123 Rare Disease`
 */
export function titleCase(text: string): string {
  return text.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

function fillTitle(template: string, title: string): string {
  return template.replaceAll('{title}', title);
}

/**
 * KnowledgeLookupService - staged lookup over the static knowledge base
 *
 * @example
 * ```typescript
 * const lookup = new KnowledgeLookupService();
 * const result = lookup.lookup('t2dm management');
 *
 * result.stage; // 'alias'
 * result.matchedKey; // 'diabetes'
 * ```
 */
export class KnowledgeLookupService {
  private readonly data: KnowledgeBaseData;
  private readonly entriesByKey: ReadonlyMap<string, KnowledgeEntry>;
  private readonly aliases: readonly { alias: string; key: string }[];
  private readonly keyTokens: readonly { entry: KnowledgeEntry; tokens: ReadonlySet<string> }[];
  private readonly stopWords: ReadonlySet<string>;

  constructor(data: KnowledgeBaseData = loadKnowledgeBase()) {
    this.data = data;
    this.entriesByKey = new Map(data.entries.map((entry) => [entry.key, entry]));
    this.aliases = Object.entries(data.aliases).map(([alias, key]) => ({
      alias: alias.toLowerCase(),
      key,
    }));
    this.keyTokens = data.entries.map((entry) => ({
      entry,
      tokens: new Set(tokenize(entry.key.toLowerCase())),
    }));
    this.stopWords = new Set(data.stopWords);
  }

  /**
   * Resolve a query. Never throws; unknown queries get the templated fallback.
   */
  lookup(query: string): LookupResult {
    const normalized = query.toLowerCase().trim();

    return (
      this.exactMatch(normalized) ??
      this.aliasMatch(normalized) ??
      this.tokenMatch(normalized) ??
      this.fallback(query.trim())
    );
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private exactMatch(normalized: string): LookupResult | null {
    const entry = this.data.entries.find((e) => normalized.includes(e.key));
    return entry ? this.fromEntry(entry, 'exact') : null;
  }

  private aliasMatch(normalized: string): LookupResult | null {
    // First alias in table order wins
    for (const { alias, key } of this.aliases) {
      const entry = this.entriesByKey.get(key);
      if (entry && normalized.includes(alias)) {
        return this.fromEntry(entry, 'alias');
      }
    }
    return null;
  }

  private tokenMatch(normalized: string): LookupResult | null {
    const queryTokens = new Set(tokenize(normalized).filter((t) => !this.stopWords.has(t)));
    if (queryTokens.size === 0) {
      return null;
    }

    let best: KnowledgeEntry | null = null;
    let bestOverlap = 0;

    for (const { entry, tokens } of this.keyTokens) {
      let overlap = 0;
      for (const token of tokens) {
        if (queryTokens.has(token)) overlap++;
      }
      // Strictly greater: ties keep the earlier key
      if (overlap > bestOverlap) {
        bestOverlap = overlap;
        best = entry;
      }
    }

    return best ? this.fromEntry(best, 'token') : null;
  }

  private fallback(query: string): LookupResult {
    const { templates } = this.data;
    const normalized = query.toLowerCase();
    const title = titleCase(query);
    const mentions = (keywords: readonly string[]): boolean =>
      keywords.some((keyword) => normalized.includes(keyword));

    const category = templates.categories.find((c) => mentions(c.keywords));
    const sections = [
      fillTitle(templates.heading, title),
      fillTitle(category ? category.body : templates.generic, title),
      ...templates.addenda.filter((a) => mentions(a.keywords)).map((a) => fillTitle(a.text, title)),
      fillTitle(templates.closing, title),
    ];

    const searchTerm = query.split(/\s+/).filter(Boolean).map(encodeURIComponent).join('+');
    const sources: KnowledgeSource[] = [
      ...templates.sources,
      {
        title: templates.searchSource.title,
        url: `${templates.searchSource.urlPrefix}${searchTerm}`,
        organization: templates.searchSource.organization,
      },
    ];

    return {
      answer: sections.join('\n'),
      sources,
      confidence: 'Moderate',
      matchedKey: null,
      stage: 'fallback',
    };
  }

  private fromEntry(entry: KnowledgeEntry, stage: 'exact' | 'alias' | 'token'): LookupResult {
    return {
      answer: entry.answer,
      sources: [...entry.sources],
      confidence: stage === 'token' ? 'Moderate' : 'High',
      matchedKey: entry.key,
      stage,
    };
  }
}
