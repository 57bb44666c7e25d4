import { z } from 'zod';
import { InteractionSeveritySchema, type InteractionSeverity } from '@medisync/types';
import { deepFreeze, loadDataFile } from '../shared/data-loader.js';

/**
 * Drug-drug interaction lookup over a fixed pair table
 */

const DrugInteractionSchema = z.object({
  drugs: z.tuple([z.string().min(1), z.string().min(1)]),
  severity: InteractionSeveritySchema,
  reaction: z.string().min(1),
  action: z.string().min(1),
  source: z.string().min(1),
  sourceUrl: z.string().url(),
});

const DrugInteractionTableSchema = z.array(DrugInteractionSchema).min(1);

export type DrugInteraction = z.infer<typeof DrugInteractionSchema>;

export interface InteractionFound {
  readonly interactionFound: true;
  readonly severity: InteractionSeverity;
  readonly reaction: string;
  readonly action: string;
  readonly source: string;
  readonly sourceUrl: string;
  readonly searchUrl: string;
}

export interface InteractionNotFound {
  readonly interactionFound: false;
  readonly severity: 'none';
  readonly message: string;
  readonly verifyLinks: Readonly<Record<'drugsCom' | 'bnf', string>>;
}

export type InteractionCheckResult = InteractionFound | InteractionNotFound;

const NOT_FOUND_MESSAGE =
  'No major interaction found in database. Always verify with clinical pharmacist.';

const VERIFY_LINKS = Object.freeze({
  drugsCom: 'https://www.drugs.com/drug_interactions.php',
  bnf: 'https://bnf.nice.org.uk',
});

let cachedTable: readonly DrugInteraction[] | undefined;

export function loadDrugInteractions(): readonly DrugInteraction[] {
  cachedTable ??= deepFreeze(loadDataFile('drug-interactions.json', DrugInteractionTableSchema));
  return cachedTable;
}

/** Either string contains the other */
function related(key: string, name: string): boolean {
  return key.includes(name) || name.includes(key);
}

export class DrugInteractionChecker {
  private readonly table: readonly DrugInteraction[];

  constructor(table: readonly DrugInteraction[] = loadDrugInteractions()) {
    this.table = table;
  }

  /**
   * Find the first table pair matching the two drug names in either order
   */
  find(drug1: string, drug2: string): DrugInteraction | undefined {
    const a = drug1.toLowerCase().trim();
    const b = drug2.toLowerCase().trim();
    if (!a || !b) {
      return undefined;
    }

    return this.table.find(({ drugs: [k1, k2] }) => {
      return (related(k1, a) && related(k2, b)) || (related(k1, b) && related(k2, a));
    });
  }

  check(drug1: string, drug2: string): InteractionCheckResult {
    const interaction = this.find(drug1, drug2);

    if (!interaction) {
      return {
        interactionFound: false,
        severity: 'none',
        message: NOT_FOUND_MESSAGE,
        verifyLinks: VERIFY_LINKS,
      };
    }

    const terms = [drug1, drug2]
      .map((d) => d.toLowerCase().trim().split(/\s+/).map(encodeURIComponent).join('+'))
      .join('+');

    return {
      interactionFound: true,
      severity: interaction.severity,
      reaction: interaction.reaction,
      action: interaction.action,
      source: interaction.source,
      sourceUrl: interaction.sourceUrl,
      searchUrl: `https://www.google.com/search?q=${terms}+drug+interaction+management`,
    };
  }
}
