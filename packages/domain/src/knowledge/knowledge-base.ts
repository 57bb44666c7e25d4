import { z } from 'zod';
import { KnowledgeEntrySchema, KnowledgeSourceSchema, type KnowledgeEntry } from '@medisync/types';
import { deepFreeze, loadDataFile } from '../shared/data-loader.js';

// ============================================================================
// DATA FILE SCHEMAS
// ============================================================================

const KnowledgeEntriesSchema = z
  .array(KnowledgeEntrySchema)
  .min(1)
  .refine((entries) => new Set(entries.map((e) => e.key)).size === entries.length, {
    message: 'Knowledge base keys must be unique',
  });

/** Synonym → canonical key, in match order */
const AliasTableSchema = z.record(z.string().min(1), z.string().min(1));

const StopWordsSchema = z.array(z.string().min(1));

const KeywordSectionSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const FallbackTemplatesSchema = z.object({
  heading: z.string().min(1),
  categories: z.array(KeywordSectionSchema.extend({ body: z.string().min(1) })),
  generic: z.string().min(1),
  addenda: z.array(KeywordSectionSchema.extend({ text: z.string().min(1) })),
  closing: z.string().min(1),
  sources: z.array(KnowledgeSourceSchema),
  searchSource: z.object({
    title: z.string().min(1),
    urlPrefix: z.string().url(),
    organization: z.string().min(1),
  }),
});

export type FallbackTemplates = z.infer<typeof FallbackTemplatesSchema>;

/**
 * Immutable knowledge data used by the lookup stages
 */
export interface KnowledgeBaseData {
  readonly entries: readonly KnowledgeEntry[];
  readonly aliases: Readonly<Record<string, string>>;
  readonly stopWords: readonly string[];
  readonly templates: FallbackTemplates;
}

// ============================================================================
// LOADER
// ============================================================================

let cached: KnowledgeBaseData | undefined;

/**
 * Load the bundled knowledge base once and reuse it
 */
export function loadKnowledgeBase(): KnowledgeBaseData {
  cached ??= deepFreeze({
    entries: loadDataFile('knowledge-base.json', KnowledgeEntriesSchema),
    aliases: loadDataFile('aliases.json', AliasTableSchema),
    stopWords: loadDataFile('stop-words.json', StopWordsSchema),
    templates: loadDataFile('fallback-templates.json', FallbackTemplatesSchema),
  });
  return cached;
}
