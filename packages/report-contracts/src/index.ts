// ============================================
// report-kit - Type Contracts
// ============================================

// Report payloads
export type {
  Dataset,
  DatasetRow,
  DescriptionSet,
  ReportNode,
  ReportTree,
} from './report-types.js';

// Configuration
export {
  SamplesSettingsSchema,
  CorrelationsSettingsSchema,
  HtmlSettingsSchema,
  ReportSettingsSchema,
  StoredReportSettingsSchema,
  validateReportSettings,
} from './config-schemas.js';
export type { ReportSettings, ReportSettingsInput } from './config-schemas.js';

// Snapshot wire format
export {
  SNAPSHOT_FORMAT,
  SNAPSHOT_FIELD_NAMES,
  SnapshotFormatSchema,
  DescriptionSetSchema,
  ReportNodeSchema,
  ReportTreeSchema,
  SnapshotFieldsSchema,
  validateSnapshotFields,
} from './snapshot-schemas.js';
export type {
  SnapshotFieldName,
  SnapshotFields,
  SnapshotEnvelope,
  SnapshotValidation,
} from './snapshot-schemas.js';

// Notices
export type {
  SnapshotNoticeType,
  BaseSnapshotNotice,
  FieldNotLoadedNotice,
  VersionMismatchNotice,
  SnapshotNotice,
  NoticeCallback,
} from './notices.js';

// Logging
export { createConsoleLogger, noopLogger } from './logger.js';
export type { ILogger, LogLevel, LogMeta, ConsoleLoggerOptions } from './logger.js';

// Version
export { REPORT_KIT_VERSION } from './version.js';
