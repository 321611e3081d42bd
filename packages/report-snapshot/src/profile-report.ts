/**
 * Profile report state with snapshot dump and load
 */

import {
  REPORT_KIT_VERSION,
  SNAPSHOT_FIELD_NAMES,
  SNAPSHOT_FORMAT,
  createConsoleLogger,
  validateSnapshotFields,
  type Dataset,
  type DescriptionSet,
  type ILogger,
  type NoticeCallback,
  type ReportTree,
  type SnapshotEnvelope,
  type SnapshotFields,
  type SnapshotNotice,
} from '@report-kit/report-contracts';
import { ReportConfig, isPlainObject } from '@report-kit/report-config';
import { JsonSnapshotCodec, type SnapshotCodec } from './codec.js';
import { hashDataset } from './dataset-hash.js';
import { DatasetMismatchError, DeserializationError, IncompatibleFormatError } from './errors.js';
import { NoticeReporter } from './notice-reporter.js';
import { readSnapshotFile, withSnapshotExtension, writeSnapshotFile } from './snapshot-file.js';

export interface ProfileReportOptions {
  /** Dataset the report describes */
  df?: Dataset | null;
  /** Precomputed dataset hash; computed from `df` when omitted */
  dataframeHash?: string | null;
  config?: ReportConfig;
  title?: string | null;
  /** Computed statistics handed over by the profiling pipeline */
  descriptionSet?: DescriptionSet | null;
  /** Rendered report handed over by the profiling pipeline */
  report?: ReportTree | null;
  codec?: SnapshotCodec;
  logger?: ILogger;
  onNotice?: NoticeCallback;
}

export interface LoadOptions {
  /** Keep the current configuration instead of merging the loaded one */
  ignoreConfig?: boolean;
}

/**
 * Read the version marker the pipeline embeds under `package`
 */
export function readProfilerVersion(descriptionSet: DescriptionSet): string | undefined {
  const pkg = descriptionSet.package;
  if (!isPlainObject(pkg)) {
    return undefined;
  }
  const version = pkg.profilerVersion;
  return typeof version === 'string' ? version : undefined;
}

/**
 * Profile Report
 *
 * Holds the computed state of one profiling run and can persist it as a
 * snapshot or restore it from one.
 *
 * Loading rules:
 * - the snapshot must describe the same dataset (equal hash), unless this
 *   report is empty (default config, no dataset bound)
 * - a description set or report tree that is already set is kept, with a notice
 * - decode, shape and dataset errors are raised before any field changes
 */
export class ProfileReport {
  private readonly _df: Dataset | null;
  private _dataframeHash: string | null;
  private _config: ReportConfig;
  private _descriptionSet: DescriptionSet | null;
  private _report: ReportTree | null;
  private _title: string | null;

  private readonly codec: SnapshotCodec;
  private readonly logger: ILogger;
  private readonly reporter: NoticeReporter;

  constructor(options: ProfileReportOptions = {}) {
    this._df = options.df ?? null;
    this._dataframeHash = options.dataframeHash ?? null;
    this._config = options.config ?? ReportConfig.defaults();
    this._descriptionSet = options.descriptionSet ?? null;
    this._report = options.report ?? null;
    this._title = options.title ?? null;

    this.codec = options.codec ?? new JsonSnapshotCodec();
    this.logger = options.logger ?? createConsoleLogger({ component: 'report-snapshot' });
    this.reporter = new NoticeReporter(this.logger, options.onNotice);
  }

  get df(): Dataset | null {
    return this._df;
  }

  /**
   * Dataset fingerprint; computed from `df` on first access
   */
  get dataframeHash(): string | null {
    if (this._dataframeHash === null && this._df !== null) {
      this._dataframeHash = hashDataset(this._df);
    }
    return this._dataframeHash;
  }

  get config(): ReportConfig {
    return this._config;
  }

  get descriptionSet(): DescriptionSet | null {
    return this._descriptionSet;
  }

  get report(): ReportTree | null {
    return this._report;
  }

  get title(): string | null {
    return this._title;
  }

  /**
   * Notices emitted by the most recent `loads`; empty after a load that threw
   */
  get notices(): SnapshotNotice[] {
    return this.reporter.getNotices();
  }

  /**
   * Serialize the current state.
   *
   * `descriptionSet` and `report` are null when the pipeline has not
   * produced them yet. Codec failures propagate as thrown.
   */
  dumps(): Uint8Array {
    const envelope: SnapshotEnvelope = {
      format: SNAPSHOT_FORMAT,
      fields: [
        this.dataframeHash,
        this._config.toJSON(),
        this._descriptionSet,
        this._report,
        this._title,
      ],
    };

    this.logger.debug('Serializing report snapshot', {
      codec: this.codec.name,
      hasDescriptionSet: this._descriptionSet !== null,
      hasReport: this._report !== null,
    });

    return this.codec.encode(envelope);
  }

  /**
   * Restore state from bytes produced by `dumps`.
   *
   * @throws DeserializationError when the bytes cannot be decoded
   * @throws IncompatibleFormatError when a field has the wrong shape
   * @throws DatasetMismatchError when the snapshot belongs to another dataset
   */
  loads(data: Uint8Array, options: LoadOptions = {}): this {
    this.reporter.reset();

    const [dataframeHash, loadedSettings, loadedDescriptionSet, loadedReport, loadedTitle] =
      this.decode(data);

    const currentHash = this.dataframeHash;
    const isEmptyReport = this._config.isDefault && this._df === null;
    if (dataframeHash !== currentHash && !isEmptyReport) {
      throw new DatasetMismatchError(dataframeHash, currentHash);
    }

    const nextConfig = options.ignoreConfig ? this._config : this._config.update(loadedSettings);

    const keepDescriptionSet = this._descriptionSet !== null;
    const keepReport = this._report !== null;

    if (!keepDescriptionSet) {
      this._descriptionSet = loadedDescriptionSet;
    }
    if (!keepReport) {
      this._report = loadedReport;
    }
    this._config = nextConfig;
    this._dataframeHash = dataframeHash;
    this._title = loadedTitle;

    if (keepDescriptionSet) {
      this.reporter.fieldNotLoaded('descriptionSet');
    }
    if (keepReport) {
      this.reporter.fieldNotLoaded('report');
    }
    if (loadedDescriptionSet !== null) {
      const loadedVersion = readProfilerVersion(loadedDescriptionSet) ?? 'unknown';
      if (loadedVersion !== REPORT_KIT_VERSION) {
        this.reporter.versionMismatch(loadedVersion, REPORT_KIT_VERSION);
      }
    }

    this.logger.info('Report snapshot loaded', {
      dataframeHash,
      configMerged: !options.ignoreConfig,
      notices: this.reporter.getNotices().length,
    });

    return this;
  }

  /**
   * Write the snapshot to disk. The extension is always `.pp`.
   *
   * @returns the path actually written
   */
  async dump(filePath: string): Promise<string> {
    const target = withSnapshotExtension(filePath);
    this.logger.debug('Writing report snapshot', { path: target });
    await writeSnapshotFile(target, this.dumps());
    return target;
  }

  /**
   * Read a snapshot file and load it (see `loads`).
   */
  async load(filePath: string, options: LoadOptions = {}): Promise<this> {
    this.logger.debug('Reading report snapshot', { path: filePath });
    const data = await readSnapshotFile(filePath);
    return this.loads(data, options);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Private Methods
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Decode bytes and check the shape of every field
   */
  private decode(data: Uint8Array): SnapshotFields {
    let decoded: unknown;
    try {
      decoded = this.codec.decode(data);
    } catch (error) {
      throw new DeserializationError(error);
    }

    if (
      !isPlainObject(decoded) ||
      !Array.isArray(decoded.fields) ||
      decoded.fields.length !== SNAPSHOT_FIELD_NAMES.length
    ) {
      throw new DeserializationError(
        new Error(`expected a snapshot envelope with ${SNAPSHOT_FIELD_NAMES.length} fields`)
      );
    }

    const validation = validateSnapshotFields(decoded.format, decoded.fields);
    if (!validation.success) {
      throw new IncompatibleFormatError(validation.failures);
    }
    return validation.data;
  }
}
