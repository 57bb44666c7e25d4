/**
 * @fileoverview Activity Service
 *
 * Read-side views across every store: platform dashboard, per-user dashboard
 * and history timeline, and summary reports.
 *
 * @module application/use-cases/activity/ActivityService
 */

import { createLogger, generateRecordId, NotFoundError, preview } from '@medisync/core';
import {
  ReportOptionsSchema,
  type AdverseReactionReport,
  type KnowledgeQueryRecord,
  type PrescriptionRecord,
  type ReportOptions,
  type RiskLevel,
  type RiskPredictionRecord,
  type ScanRecord,
  type ScanType,
  type Urgency,
  type WellnessSession,
} from '@medisync/types';
import type { ClinicalStores } from '../../ports/secondary/persistence/ClinicalStores.js';
import { parseInput } from '../../shared/validation.js';
import { lastN, newestFirst, systemClock, type Clock } from '../../shared/clock.js';
import { isOwnedBy } from '../../shared/ownership.js';

const logger = createLogger({ name: 'ActivityService' });

// =============================================================================
// TYPES
// =============================================================================

export interface ActivityServiceDeps {
  readonly stores: ClinicalStores;
  readonly clock?: Clock;
}

export interface PlatformDashboard {
  readonly stats: {
    readonly prescriptionsProcessed: number;
    readonly chatbotSessions: number;
    readonly riskPredictions: number;
    readonly knowledgeQueries: number;
    readonly adrEvents: number;
    readonly scansStored: number;
    readonly urgentPatients: number;
  };
  readonly riskDistribution: Record<RiskLevel, number>;
  readonly recentPrescriptions: readonly PrescriptionRecord[];
  readonly recentSessions: readonly WellnessSession[];
  readonly moduleUsage: Readonly<Record<string, number>>;
  readonly timestamp: string;
}

export interface UserDashboard {
  readonly userId: string;
  readonly stats: {
    readonly prescriptionsUploaded: number;
    readonly scansUploaded: number;
    readonly adrReports: number;
    readonly chatSessions: number;
    readonly riskPredictions: number;
    readonly totalActions: number;
  };
  readonly activity: {
    readonly prescriptions: readonly PrescriptionRecord[];
    readonly scans: readonly ScanRecord[];
    readonly adrReports: readonly AdverseReactionReport[];
    readonly chatSessions: readonly WellnessSession[];
    readonly riskPredictions: readonly RiskPredictionRecord[];
  };
  readonly timestamp: string;
}

interface HistoryEntryOf<K extends string, T extends string, D> {
  readonly id: string;
  readonly kind: K;
  readonly type: T;
  readonly refId: string;
  readonly title: string;
  readonly summary: string;
  readonly timestamp: string;
  readonly details: D;
}

export type HistoryEntry =
  | HistoryEntryOf<'chat', 'wellness_chat', WellnessSession>
  | HistoryEntryOf<'rx', 'prescription', PrescriptionRecord>
  | HistoryEntryOf<'scan', 'scan', ScanRecord>
  | HistoryEntryOf<'risk', 'risk_prediction', RiskPredictionRecord>
  | HistoryEntryOf<'adr', 'adr_report', AdverseReactionReport>
  | HistoryEntryOf<'rag', 'knowledge_query', KnowledgeQueryRecord>;

export type HistoryKind = HistoryEntry['kind'];

export interface PrescriptionReportRow {
  readonly id: string;
  readonly patient: string;
  readonly physician: string;
  readonly medication: string;
  readonly status: string;
}

export interface RiskReportRow {
  readonly id: string;
  readonly age: number;
  readonly systolicBp: number;
  readonly bloodSugar: number;
  readonly score: number;
  readonly level: RiskLevel;
  readonly urgency: Urgency;
}

export interface SessionReportRow {
  readonly id: string;
  readonly userId: string | null;
  readonly topic: string;
}

export interface ScanReportRow {
  readonly id: string;
  readonly patient: string;
  readonly type: ScanType;
  readonly region: string;
}

export interface ClinicalReport {
  readonly reportId: string;
  readonly generatedAt: string;
  readonly prescriptions?: readonly PrescriptionReportRow[];
  readonly riskPredictions?: readonly RiskReportRow[];
  readonly chatbotSessions?: readonly SessionReportRow[];
  readonly adrEvents?: readonly AdverseReactionReport[];
  readonly scanRecords?: readonly ScanReportRow[];
  readonly urgentPatients: number;
}

export interface ActivitySummary {
  readonly totalPrescriptions: number;
  readonly totalSessions: number;
  readonly totalRiskPredictions: number;
  readonly totalAdrEvents: number;
  readonly totalScans: number;
  readonly urgentPatients: number;
}

// =============================================================================
// CONSTANTS
// =============================================================================

const DASHBOARD_RECENT_COUNT = 3;
const USER_RECENT_COUNT = 5;
const REPORT_ROW_COUNT = 5;
const REPORT_ADR_COUNT = 10;
const HISTORY_SUMMARY_LENGTH = 60;

// =============================================================================
// HISTORY ENTRIES
// =============================================================================

function historyId(kind: HistoryKind, refId: string): string {
  return `hist-${kind}-${refId}`;
}

function sessionEntry(session: WellnessSession): HistoryEntry {
  return {
    id: historyId('chat', session.id),
    kind: 'chat',
    type: 'wellness_chat',
    refId: session.id,
    title: 'Wellness Chat Session',
    summary: preview(session.messagePreview, HISTORY_SUMMARY_LENGTH),
    timestamp: session.timestamp,
    details: session,
  };
}

function prescriptionEntry(record: PrescriptionRecord): HistoryEntry {
  return {
    id: historyId('rx', record.id),
    kind: 'rx',
    type: 'prescription',
    refId: record.id,
    title: 'Prescription Processed',
    summary: `Patient: ${record.patient}`,
    timestamp: record.timestamp,
    details: record,
  };
}

function scanEntry(scan: ScanRecord): HistoryEntry {
  return {
    id: historyId('scan', scan.id),
    kind: 'scan',
    type: 'scan',
    refId: scan.id,
    title: `${scan.type.toUpperCase()} Scan`,
    summary: `Patient: ${scan.patient} - ${scan.region}`,
    timestamp: scan.date,
    details: scan,
  };
}

function riskEntry(record: RiskPredictionRecord): HistoryEntry {
  return {
    id: historyId('risk', record.id),
    kind: 'risk',
    type: 'risk_prediction',
    refId: record.id,
    title: 'Risk Assessment',
    summary: `Score: ${record.result.score}/100 - ${record.result.level}`,
    timestamp: record.timestamp,
    details: record,
  };
}

function adverseReactionEntry(report: AdverseReactionReport): HistoryEntry {
  return {
    id: historyId('adr', report.id),
    kind: 'adr',
    type: 'adr_report',
    refId: report.id,
    title: 'ADR Report',
    summary: `${report.drug} - ${report.severity}`,
    timestamp: report.timestamp,
    details: report,
  };
}

function knowledgeQueryEntry(record: KnowledgeQueryRecord): HistoryEntry {
  return {
    id: historyId('rag', record.id),
    kind: 'rag',
    type: 'knowledge_query',
    refId: record.id,
    title: 'Knowledge Query',
    summary: preview(record.query, HISTORY_SUMMARY_LENGTH),
    timestamp: record.timestamp,
    details: record,
  };
}

/**
 * Split `hist-<kind>-<refId>`; the ref id may itself contain dashes
 */
function parseHistoryId(id: string): { kind: string; refId: string } | null {
  const first = id.indexOf('-');
  const second = first === -1 ? -1 : id.indexOf('-', first + 1);
  if (second === -1) {
    return null;
  }
  return { kind: id.slice(first + 1, second), refId: id.slice(second + 1) };
}

// =============================================================================
// SERVICE
// =============================================================================

export class ActivityService {
  private readonly stores: ClinicalStores;
  private readonly clock: Clock;

  constructor(deps: ActivityServiceDeps) {
    this.stores = deps.stores;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Platform-wide counts, risk distribution and recent records
   */
  async dashboard(): Promise<PlatformDashboard> {
    const { prescriptions, scans, wellnessSessions, riskPredictions, knowledgeQueries } =
      this.stores;
    const [rxList, sessionList, riskList, queryCount, adrCount, scanCount, urgentCount] =
      await Promise.all([
        prescriptions.list(),
        wellnessSessions.list(),
        riskPredictions.list(),
        knowledgeQueries.count(),
        this.stores.adverseReactions.count(),
        scans.count(),
        this.stores.urgentQueue.size(),
      ]);

    const riskDistribution: Record<RiskLevel, number> = { Low: 0, Medium: 0, High: 0 };
    for (const record of riskList) {
      riskDistribution[record.result.level] += 1;
    }

    return {
      stats: {
        prescriptionsProcessed: rxList.length,
        chatbotSessions: sessionList.length,
        riskPredictions: riskList.length,
        knowledgeQueries: queryCount,
        adrEvents: adrCount,
        scansStored: scanCount,
        urgentPatients: urgentCount,
      },
      riskDistribution,
      recentPrescriptions: lastN(rxList, DASHBOARD_RECENT_COUNT),
      recentSessions: lastN(sessionList, DASHBOARD_RECENT_COUNT),
      moduleUsage: {
        'Prescription Standardization': rxList.length,
        'Wellness Chat': sessionList.length,
        'Risk Assessment': riskList.length,
        'Knowledge Search': queryCount,
        'ADR Reporting': adrCount,
        'Scan Records': scanCount,
      },
      timestamp: this.clock(),
    };
  }

  /**
   * Counts and the latest records for one user
   */
  async userDashboard(userId: string): Promise<UserDashboard> {
    const owned = await this.ownedRecords(userId);

    return {
      userId,
      stats: {
        prescriptionsUploaded: owned.prescriptions.length,
        scansUploaded: owned.scans.length,
        adrReports: owned.adrReports.length,
        chatSessions: owned.chatSessions.length,
        riskPredictions: owned.riskPredictions.length,
        totalActions:
          owned.prescriptions.length +
          owned.scans.length +
          owned.adrReports.length +
          owned.chatSessions.length +
          owned.riskPredictions.length,
      },
      activity: {
        prescriptions: lastN(owned.prescriptions, USER_RECENT_COUNT),
        scans: lastN(owned.scans, USER_RECENT_COUNT),
        adrReports: lastN(owned.adrReports, USER_RECENT_COUNT),
        chatSessions: lastN(owned.chatSessions, USER_RECENT_COUNT),
        riskPredictions: lastN(owned.riskPredictions, USER_RECENT_COUNT),
      },
      timestamp: this.clock(),
    };
  }

  /**
   * Every record the user owns as one timeline, newest first
   */
  async userHistory(userId: string): Promise<HistoryEntry[]> {
    const owned = await this.ownedRecords(userId);
    const entries: HistoryEntry[] = [
      ...owned.chatSessions.map(sessionEntry),
      ...owned.prescriptions.map(prescriptionEntry),
      ...owned.scans.map(scanEntry),
      ...owned.riskPredictions.map(riskEntry),
      ...owned.adrReports.map(adverseReactionEntry),
      ...owned.knowledgeQueries.map(knowledgeQueryEntry),
    ];
    return newestFirst(entries, (entry) => entry.timestamp);
  }

  /**
   * @throws NotFoundError for a malformed id or a record the user does not own
   */
  async historyItem(id: string, userId: string): Promise<HistoryEntry> {
    const parsed = parseHistoryId(id);
    if (!parsed) {
      throw new NotFoundError('History item');
    }

    const history = await this.userHistory(userId);
    const entry = history.find((e) => e.kind === parsed.kind && e.refId === parsed.refId);
    if (!entry) {
      throw new NotFoundError('History item');
    }
    return entry;
  }

  /**
   * Report over the latest records; every section is included by default
   */
  async generateReport(options: ReportOptions = {}): Promise<ClinicalReport> {
    const include = parseInput(ReportOptionsSchema, options, 'report options');
    const { stores } = this;
    const [rxList, riskList, sessionList, adrList, scanList, urgentCount] = await Promise.all([
      stores.prescriptions.list(),
      stores.riskPredictions.list(),
      stores.wellnessSessions.list(),
      stores.adverseReactions.list(),
      stores.scans.list(),
      stores.urgentQueue.size(),
    ]);

    const report: ClinicalReport = {
      reportId: generateRecordId('RPT', 8, { uppercase: true }),
      generatedAt: this.clock(),
      ...(include.includePrescriptions && {
        prescriptions: lastN(rxList, REPORT_ROW_COUNT).map((rx) => ({
          id: rx.id,
          patient: rx.patient,
          physician: rx.physician,
          medication: rx.fhir.medicationCodeableConcept.coding[0]?.display ?? '',
          status: rx.fhir.status,
        })),
      }),
      ...(include.includeRisk && {
        riskPredictions: lastN(riskList, REPORT_ROW_COUNT).map((record) => ({
          id: record.id,
          age: record.input.age,
          systolicBp: record.input.systolicBp,
          bloodSugar: record.input.bloodSugar,
          score: record.result.score,
          level: record.result.level,
          urgency: record.result.urgency,
        })),
      }),
      ...(include.includeChatbot && {
        chatbotSessions: lastN(sessionList, REPORT_ROW_COUNT).map((session) => ({
          id: session.id,
          userId: session.userId,
          topic: session.topic,
        })),
      }),
      ...(include.includeAdr && { adrEvents: lastN(adrList, REPORT_ADR_COUNT) }),
      ...(include.includeScans && {
        scanRecords: lastN(scanList, REPORT_ROW_COUNT).map((scan) => ({
          id: scan.id,
          patient: scan.patient,
          type: scan.type,
          region: scan.region,
        })),
      }),
      urgentPatients: urgentCount,
    };

    logger.info({ reportId: report.reportId }, 'Clinical report generated');
    return report;
  }

  async summary(): Promise<ActivitySummary> {
    const { stores } = this;
    const [prescriptions, sessions, risk, adr, scans, urgent] = await Promise.all([
      stores.prescriptions.count(),
      stores.wellnessSessions.count(),
      stores.riskPredictions.count(),
      stores.adverseReactions.count(),
      stores.scans.count(),
      stores.urgentQueue.size(),
    ]);

    return {
      totalPrescriptions: prescriptions,
      totalSessions: sessions,
      totalRiskPredictions: risk,
      totalAdrEvents: adr,
      totalScans: scans,
      urgentPatients: urgent,
    };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private async ownedRecords(userId: string) {
    const { stores } = this;
    const [prescriptions, scans, adrReports, chatSessions, riskPredictions, knowledgeQueries] =
      await Promise.all([
        stores.prescriptions.list(),
        stores.scans.list(),
        stores.adverseReactions.list(),
        stores.wellnessSessions.list(),
        stores.riskPredictions.list(),
        stores.knowledgeQueries.list(),
      ]);
    const mine = <T extends { readonly userId: string | null }>(records: readonly T[]): T[] =>
      records.filter((record) => isOwnedBy(record, userId));

    return {
      prescriptions: mine(prescriptions),
      scans: mine(scans),
      adrReports: mine(adrReports),
      chatSessions: mine(chatSessions),
      riskPredictions: mine(riskPredictions),
      knowledgeQueries: mine(knowledgeQueries),
    };
  }
}
