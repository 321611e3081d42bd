/**
 * Zod Schemas for the snapshot wire format
 *
 * A snapshot is a 5-tuple in fixed positional order, wrapped in an
 * envelope that names the format revision. Reordering the tuple breaks
 * every file written before the change.
 */

import { z } from 'zod';
import { StoredReportSettingsSchema, type ReportSettings } from './config-schemas.js';
import type { DescriptionSet, ReportNode, ReportTree } from './report-types.js';

/**
 * Current snapshot format revision
 */
export const SNAPSHOT_FORMAT = 'report-kit.snapshot/1';

export const SnapshotFormatSchema = z.literal(SNAPSHOT_FORMAT);

/**
 * Positional field names, in wire order
 */
export const SNAPSHOT_FIELD_NAMES = [
  'dataframeHash',
  'config',
  'descriptionSet',
  'report',
  'title',
] as const;

export type SnapshotFieldName = (typeof SNAPSHOT_FIELD_NAMES)[number];

export const DescriptionSetSchema = z.record(z.unknown());

export const ReportNodeSchema: z.ZodType<ReportNode> = z.lazy(() =>
  z.object({
    kind: z.string().min(1),
    name: z.string().optional(),
    anchorId: z.string().optional(),
    content: z.record(z.unknown()).optional(),
    items: z.array(ReportNodeSchema).optional(),
  })
);

export const ReportTreeSchema = z.object({
  kind: z.literal('root'),
  name: z.string().optional(),
  anchorId: z.string().optional(),
  content: z.record(z.unknown()).optional(),
  items: z.array(ReportNodeSchema).optional(),
});

export const SnapshotFieldsSchema = z.tuple([
  z.string().nullable(),
  StoredReportSettingsSchema,
  DescriptionSetSchema.nullable(),
  ReportTreeSchema.nullable(),
  z.string().nullable(),
]);

export type SnapshotFields = [
  dataframeHash: string | null,
  config: ReportSettings,
  descriptionSet: DescriptionSet | null,
  report: ReportTree | null,
  title: string | null,
];

/**
 * What the codec actually encodes
 */
export interface SnapshotEnvelope {
  format: string;
  fields: SnapshotFields;
}

export type SnapshotValidation =
  | { success: true; data: SnapshotFields }
  | { success: false; failures: string[] };

/**
 * Check the format marker and every positional field in one pass.
 * Failures are reported as `field: message` lines.
 */
export function validateSnapshotFields(format: unknown, fields: unknown): SnapshotValidation {
  const failures: string[] = [];

  const formatResult = SnapshotFormatSchema.safeParse(format);
  if (!formatResult.success) {
    const got = typeof format === 'string' ? `"${format}"` : typeof format;
    failures.push(`format: expected "${SNAPSHOT_FORMAT}", got ${got}`);
  }

  const fieldsResult = SnapshotFieldsSchema.safeParse(fields);
  if (!fieldsResult.success) {
    for (const issue of fieldsResult.error.issues) {
      const [index, ...rest] = issue.path;
      const name = typeof index === 'number' ? SNAPSHOT_FIELD_NAMES[index] ?? `[${index}]` : 'fields';
      const location = [name, ...rest].join('.');
      failures.push(`${location}: ${issue.message}`);
    }
  }

  if (fieldsResult.success && failures.length === 0) {
    return { success: true, data: fieldsResult.data };
  }
  return { success: false, failures };
}
