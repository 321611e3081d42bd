/**
 * Report configuration value
 */

import { isDeepStrictEqual } from 'node:util';
import {
  validateReportSettings,
  type ReportSettings,
  type ReportSettingsInput,
} from '@report-kit/report-contracts';
import { deepFreeze, deepMerge, type DeepReadonly } from './merge.js';

/**
 * Raised when settings fail schema validation
 */
export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  • ${issue}`).join('\n')}` : message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

interface ValidationIssues {
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>;
}

function formatIssues(error: ValidationIssues): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseSettings(input: unknown): ReportSettings {
  const validation = validateReportSettings(input);
  if (validation.success && validation.data) {
    return validation.data;
  }
  throw new ConfigValidationError(
    'Invalid report configuration',
    validation.error ? formatIssues(validation.error) : []
  );
}

const DEFAULT_SETTINGS: DeepReadonly<ReportSettings> = deepFreeze(parseSettings({}));

/**
 * Merge loaded settings over current ones and validate the result.
 * Pure: returns a new record, leaves both inputs untouched.
 */
export function mergeSettings(
  current: ReportSettings,
  loaded: ReportSettings | ReportSettingsInput
): ReportSettings {
  return parseSettings(deepMerge(current, loaded));
}

/**
 * Immutable report configuration
 *
 * Owned by a single report; `update` returns a new value instead of
 * changing a shared one. Settings are frozen all the way down.
 */
export class ReportConfig {
  public readonly settings: DeepReadonly<ReportSettings>;

  private constructor(settings: ReportSettings) {
    this.settings = deepFreeze(settings);
  }

  /**
   * Configuration with every field at its default
   */
  static defaults(): ReportConfig {
    return new ReportConfig(structuredClone(DEFAULT_SETTINGS));
  }

  /**
   * Build from a (possibly partial) settings record.
   *
   * @throws ConfigValidationError when a field has the wrong type
   */
  static from(input: unknown): ReportConfig {
    return new ReportConfig(parseSettings(input));
  }

  /**
   * True when nothing differs from the defaults
   */
  get isDefault(): boolean {
    return isDeepStrictEqual(this.settings, DEFAULT_SETTINGS);
  }

  update(other: ReportConfig | ReportSettingsInput): ReportConfig {
    const loaded = other instanceof ReportConfig ? other.toJSON() : other;
    return new ReportConfig(mergeSettings(this.toJSON(), loaded));
  }

  toJSON(): ReportSettings {
    return structuredClone(this.settings);
  }
}
