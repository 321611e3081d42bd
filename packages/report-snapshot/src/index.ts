/**
 * Report snapshots for report-kit
 *
 * Provides: dump/load of computed report state, pluggable codecs,
 * snapshot errors and load notices.
 */

export { ProfileReport, readProfilerVersion } from './profile-report.js';
export type { ProfileReportOptions, LoadOptions } from './profile-report.js';
export { JsonSnapshotCodec, YamlSnapshotCodec } from './codec.js';
export type { SnapshotCodec } from './codec.js';
export {
  SnapshotError,
  DeserializationError,
  IncompatibleFormatError,
  DatasetMismatchError,
  isSnapshotError,
} from './errors.js';
export type { SnapshotErrorCode } from './errors.js';
export { NoticeReporter } from './notice-reporter.js';
export { hashDataset } from './dataset-hash.js';
export {
  SNAPSHOT_EXTENSION,
  withSnapshotExtension,
  readSnapshotFile,
  writeSnapshotFile,
} from './snapshot-file.js';
