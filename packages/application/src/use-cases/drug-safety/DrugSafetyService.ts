/**
 * @fileoverview Drug Safety Service
 *
 * Interaction checks against the bundled table plus adverse drug reaction
 * reporting.
 *
 * @module application/use-cases/drug-safety/DrugSafetyService
 */

import { createLogger, generateRecordId } from '@medisync/core';
import type { DrugInteractionChecker, InteractionCheckResult } from '@medisync/domain';
import {
  AdverseReactionInputSchema,
  InteractionCheckRequestSchema,
  type AdverseReactionInput,
  type AdverseReactionReport,
  type InteractionCheckRecord,
  type InteractionCheckRequest,
} from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import { parseInput } from '../../shared/validation.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { ownerOf, type RequestContext } from '../../shared/ownership.js';

const logger = createLogger({ name: 'DrugSafetyService' });

export interface DrugSafetyServiceDeps {
  readonly checker: DrugInteractionChecker;
  readonly interactionChecks: RecordCollection<InteractionCheckRecord>;
  readonly adverseReactions: RecordCollection<AdverseReactionReport>;
  readonly clock?: Clock;
}

export interface AdverseReactionReceipt {
  readonly status: 'logged';
  readonly eventId: string;
}

export interface AdverseReactionLog {
  readonly count: number;
  readonly events: readonly AdverseReactionReport[];
}

export class DrugSafetyService {
  private readonly checker: DrugInteractionChecker;
  private readonly interactionChecks: RecordCollection<InteractionCheckRecord>;
  private readonly adverseReactions: RecordCollection<AdverseReactionReport>;
  private readonly clock: Clock;

  constructor(deps: DrugSafetyServiceDeps) {
    this.checker = deps.checker;
    this.interactionChecks = deps.interactionChecks;
    this.adverseReactions = deps.adverseReactions;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Check a drug pair and keep a record of the check
   */
  async check(
    request: InteractionCheckRequest,
    context: RequestContext = {}
  ): Promise<InteractionCheckResult> {
    const { drug1, drug2 } = parseInput(
      InteractionCheckRequestSchema,
      request,
      'interaction check'
    );
    const result = this.checker.check(drug1, drug2);
    const id = generateRecordId('adr');

    await this.interactionChecks.append({
      id,
      userId: ownerOf(context),
      drug1,
      drug2,
      interactionFound: result.interactionFound,
      severity: result.severity,
      timestamp: this.clock(),
    });

    logger.info(
      { checkId: id, interactionFound: result.interactionFound, severity: result.severity },
      'Drug interaction checked'
    );
    return result;
  }

  /**
   * Log a suspected adverse drug reaction
   */
  async report(
    data: AdverseReactionInput,
    context: RequestContext = {}
  ): Promise<AdverseReactionReceipt> {
    const input = parseInput(AdverseReactionInputSchema, data, 'adverse reaction report');
    const eventId = generateRecordId('adr');

    await this.adverseReactions.append({
      id: eventId,
      drug: input.drug,
      patientId: input.patientId,
      reaction: input.reaction,
      severity: input.severity,
      userId: ownerOf(context),
      timestamp: this.clock(),
    });

    logger.warn({ eventId, severity: input.severity }, 'Adverse drug reaction reported');
    return { status: 'logged', eventId };
  }

  /**
   * The user's reports, or every report when no user is given
   */
  async log(userId?: string | null): Promise<AdverseReactionLog> {
    const all = await this.adverseReactions.list();
    const events = userId ? all.filter((event) => event.userId === userId) : all;
    return { count: events.length, events };
  }
}
