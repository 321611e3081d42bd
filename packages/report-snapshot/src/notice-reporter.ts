/**
 * Notice reporter - routes non-fatal load outcomes to the logger and to
 * an optional caller callback.
 */

import type {
  ILogger,
  NoticeCallback,
  SnapshotNotice,
} from '@report-kit/report-contracts';

const FIELD_LABELS = {
  descriptionSet: 'description set',
  report: 'report',
} as const;

/**
 * Notice reporter
 *
 * Keeps the notices emitted since the last `reset()` so callers can
 * inspect what the most recent load skipped.
 *
 * @example
 * ```typescript
 * const reporter = new NoticeReporter(logger, (notice) => {
 *   ui.showWarning(notice.data.message);
 * });
 * ```
 */
export class NoticeReporter {
  private notices: SnapshotNotice[] = [];

  constructor(
    private logger: ILogger,
    private onNotice?: NoticeCallback
  ) {}

  reset(): void {
    this.notices = [];
  }

  /**
   * A populated field was kept instead of the loaded value.
   */
  fieldNotLoaded(field: 'descriptionSet' | 'report'): void {
    this.emit({
      type: field === 'descriptionSet' ? 'description-set-not-loaded' : 'report-not-loaded',
      timestamp: Date.now(),
      data: {
        field,
        message: `The ${FIELD_LABELS[field]} of the current report is already set. It won't be loaded.`,
      },
    });
  }

  /**
   * Loaded data was generated by another release.
   */
  versionMismatch(loadedVersion: string, runningVersion: string): void {
    this.emit({
      type: 'version-mismatch',
      timestamp: Date.now(),
      data: {
        loadedVersion,
        runningVersion,
        message:
          'The package version specified in the loaded data is not equal to the version installed. ' +
          `Currently running on report-kit ${runningVersion}, while loaded data was generated by report-kit ${loadedVersion}.`,
      },
    });
  }

  getNotices(): SnapshotNotice[] {
    return [...this.notices];
  }

  private emit(notice: SnapshotNotice): void {
    this.notices.push(notice);
    this.logger.warn(notice.data.message, { notice: notice.type });
    this.onNotice?.(notice);
  }
}
