export {
  ActivityService,
  type ActivityServiceDeps,
  type ActivitySummary,
  type ClinicalReport,
  type HistoryEntry,
  type HistoryKind,
  type PlatformDashboard,
  type UserDashboard,
  type PrescriptionReportRow,
  type RiskReportRow,
  type SessionReportRow,
  type ScanReportRow,
} from './ActivityService.js';
