/**
 * Snapshot files - read and write snapshot bytes on disk
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Extension every snapshot file carries
 */
export const SNAPSHOT_EXTENSION = '.pp';

/**
 * Replace the last extension of `filePath` with `.pp`, or append it when
 * there is none (`report` and `report.json` both become `report.pp`).
 */
export function withSnapshotExtension(filePath: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${SNAPSHOT_EXTENSION}`);
}

/**
 * Write snapshot bytes, creating the parent directory when needed.
 * A failed write leaves the destination in an undefined state.
 */
export async function writeSnapshotFile(filePath: string, data: Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, data);
}

export async function readSnapshotFile(filePath: string): Promise<Uint8Array> {
  return fs.promises.readFile(filePath);
}
