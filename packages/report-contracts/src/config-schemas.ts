/**
 * Zod Schemas for Report Configuration
 *
 * Every field has a default, so an empty object parses into the default
 * configuration.
 */

import { z } from 'zod';

/**
 * Sample rows shown in the report
 */
export const SamplesSettingsSchema = z.object({
  head: z.number().int().nonnegative().default(10),
  tail: z.number().int().nonnegative().default(10),
});

/**
 * Correlation matrices to compute
 */
export const CorrelationsSettingsSchema = z.object({
  pearson: z.boolean().default(true),
  spearman: z.boolean().default(true),
  kendall: z.boolean().default(false),
});

/**
 * HTML rendering options
 */
export const HtmlSettingsSchema = z.object({
  minify: z.boolean().default(true),
  inline: z.boolean().default(true),
});

/**
 * Full report configuration
 */
export const ReportSettingsSchema = z.object({
  title: z.string().default('Profiling Report'),
  poolSize: z.number().int().nonnegative().default(0),
  progressBar: z.boolean().default(true),
  samples: SamplesSettingsSchema.default({}),
  correlations: CorrelationsSettingsSchema.default({}),
  html: HtmlSettingsSchema.default({}),
});

export type ReportSettings = z.infer<typeof ReportSettingsSchema>;

/**
 * Settings as stored in a snapshot: every field present, no defaults,
 * no unknown keys. A partial record here means the snapshot is damaged.
 */
export const StoredReportSettingsSchema = z
  .object({
    title: z.string(),
    poolSize: z.number().int().nonnegative(),
    progressBar: z.boolean(),
    samples: z
      .object({
        head: z.number().int().nonnegative(),
        tail: z.number().int().nonnegative(),
      })
      .strict(),
    correlations: z
      .object({
        pearson: z.boolean(),
        spearman: z.boolean(),
        kendall: z.boolean(),
      })
      .strict(),
    html: z
      .object({
        minify: z.boolean(),
        inline: z.boolean(),
      })
      .strict(),
  })
  .strict() satisfies z.ZodType<ReportSettings>;
export type ReportSettingsInput = z.input<typeof ReportSettingsSchema>;

/**
 * Validate settings (returns result, doesn't throw)
 */
export function validateReportSettings(data: unknown): {
  success: boolean;
  data?: ReportSettings;
  error?: z.ZodError;
} {
  const result = ReportSettingsSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
