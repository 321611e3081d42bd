/**
 * Snapshot codecs - turn plain snapshot data into bytes and back
 */

import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';

/**
 * Byte codec for plain data (objects, arrays, strings, numbers,
 * booleans, null). `decode` throws on malformed input.
 */
export interface SnapshotCodec {
  readonly name: string;
  encode(value: unknown): Uint8Array;
  decode(data: Uint8Array): unknown;
}

const encoder = new TextEncoder();

function decodeUtf8(data: Uint8Array): string {
  // fatal: invalid byte sequences throw instead of becoming U+FFFD
  return new TextDecoder('utf-8', { fatal: true }).decode(data);
}

/**
 * Key of the object that stands in for a non-finite number in JSON
 */
const NUMBER_TAG = '$number';

const NON_FINITE: Record<string, number> = {
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  '-Infinity': Number.NEGATIVE_INFINITY,
};

function tagNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return { [NUMBER_TAG]: String(value) };
  }
  return value;
}

function untagNonFinite(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const keys = Object.keys(value);
  if (keys.length !== 1 || keys[0] !== NUMBER_TAG) {
    return value;
  }
  const tag: unknown = Object.values(value)[0];
  if (typeof tag === 'string' && Object.hasOwn(NON_FINITE, tag)) {
    return NON_FINITE[tag];
  }
  return value;
}

/**
 * UTF-8 JSON (default)
 *
 * `NaN`, `Infinity` and `-Infinity` are written as `{"$number": "NaN"}`
 * and friends, since plain JSON would turn them into `null`.
 */
export class JsonSnapshotCodec implements SnapshotCodec {
  readonly name = 'json';

  encode(value: unknown): Uint8Array {
    return encoder.encode(JSON.stringify(value, tagNonFinite));
  }

  decode(data: Uint8Array): unknown {
    return JSON.parse(decodeUtf8(data), untagNonFinite);
  }
}

/**
 * UTF-8 YAML, for snapshots meant to be read by people
 */
export class YamlSnapshotCodec implements SnapshotCodec {
  readonly name = 'yaml';

  encode(value: unknown): Uint8Array {
    return encoder.encode(stringifyYAML(value));
  }

  decode(data: Uint8Array): unknown {
    return parseYAML(decodeUtf8(data));
  }
}
