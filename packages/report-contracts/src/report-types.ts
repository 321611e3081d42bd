/**
 * Report payload types
 *
 * The profiling pipeline produces these values; this project only stores,
 * validates and restores them.
 */

/**
 * In-memory dataset the report describes. Only its presence and its
 * content hash matter here.
 */
export type DatasetRow = Readonly<Record<string, unknown>>;
export type Dataset = ReadonlyArray<DatasetRow>;

/**
 * Computed statistics. Free-form mapping; the pipeline stores its
 * version marker at `package.profilerVersion`.
 */
export type DescriptionSet = Record<string, unknown>;

/**
 * Single node of the rendered report
 */
export interface ReportNode {
  /** Node kind, e.g. `section`, `table`, `html` */
  kind: string;
  name?: string;
  anchorId?: string;
  content?: Record<string, unknown>;
  items?: ReportNode[];
}

/**
 * Rendered report: a node tree whose top node is the root.
 */
export interface ReportTree extends ReportNode {
  kind: 'root';
}
