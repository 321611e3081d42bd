/**
 * Snapshot notice types
 *
 * Notices report non-fatal outcomes of a load: a field that was kept
 * instead of overwritten, or a version marker that differs from the
 * running release. They never stop the load.
 */

export type SnapshotNoticeType =
  | 'description-set-not-loaded'
  | 'report-not-loaded'
  | 'version-mismatch';

/**
 * Base notice.
 */
export interface BaseSnapshotNotice {
  type: SnapshotNoticeType;
  timestamp: number;
  data: {
    message: string;
  };
}

/**
 * A populated field was kept.
 */
export interface FieldNotLoadedNotice extends BaseSnapshotNotice {
  type: 'description-set-not-loaded' | 'report-not-loaded';
  data: {
    message: string;
    field: 'descriptionSet' | 'report';
  };
}

/**
 * Loaded description set was produced by another release.
 */
export interface VersionMismatchNotice extends BaseSnapshotNotice {
  type: 'version-mismatch';
  data: {
    message: string;
    loadedVersion: string;
    runningVersion: string;
  };
}

export type SnapshotNotice = FieldNotLoadedNotice | VersionMismatchNotice;

export type NoticeCallback = (notice: SnapshotNotice) => void;
