/**
 * Config file loader - reads report settings from YAML
 */

import * as fs from 'node:fs';
import { parse as parseYAML } from 'yaml';
import { ConfigValidationError, ReportConfig } from './report-config.js';

/**
 * Load a report configuration from a YAML file.
 *
 * Missing keys take their defaults. An empty file yields the default
 * configuration.
 */
export async function loadConfigFile(filePath: string): Promise<ReportConfig> {
  const content = await fs.promises.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = parseYAML(content);
  } catch (error) {
    throw new ConfigValidationError(`Failed to parse ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return ReportConfig.from(data ?? {});
}
