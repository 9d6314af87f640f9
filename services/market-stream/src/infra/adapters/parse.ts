import { DecodeError } from '@/domain/errors';
import type { PriceLevel } from '@/domain/types';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON 文字列をオブジェクトとして読む。
 * @throws {DecodeError}
 */
export function parseJsonRecord(provider: string, data: string): JsonRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new DecodeError(provider, 'invalid JSON', { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new DecodeError(provider, 'message is not an object');
  }
  return parsed;
}

/**
 * 数値または数値文字列を number にする。
 * @throws {DecodeError}
 */
export function readNumber(provider: string, record: JsonRecord, field: string): number {
  const value = record[field];
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new DecodeError(provider, `field "${field}" is not a number`);
  }
  return parsed;
}

/**
 * @throws {DecodeError}
 */
export function readString(provider: string, record: JsonRecord, field: string): string {
  const value = record[field];
  if (typeof value !== 'string') {
    throw new DecodeError(provider, `field "${field}" is not a string`);
  }
  return value;
}

/**
 * @throws {DecodeError}
 */
export function readBoolean(provider: string, record: JsonRecord, field: string): boolean {
  const value = record[field];
  if (typeof value !== 'boolean') {
    throw new DecodeError(provider, `field "${field}" is not a boolean`);
  }
  return value;
}

/**
 * @throws {DecodeError}
 */
export function readRecord(provider: string, record: JsonRecord, field: string): JsonRecord {
  const value = record[field];
  if (!isRecord(value)) {
    throw new DecodeError(provider, `field "${field}" is not an object`);
  }
  return value;
}

/**
 * @throws {DecodeError}
 */
export function readArray(provider: string, record: JsonRecord, field: string): unknown[] {
  const value = record[field];
  if (!Array.isArray(value)) {
    throw new DecodeError(provider, `field "${field}" is not an array`);
  }
  return value;
}

/**
 * `[["price", "qty"], ...]` 形式の板を読む。
 * @throws {DecodeError}
 */
export function readTupleLevels(provider: string, record: JsonRecord, field: string): PriceLevel[] {
  return readArray(provider, record, field).map((entry) => {
    if (!Array.isArray(entry) || entry.length < 2) {
      throw new DecodeError(provider, `field "${field}" has a malformed level`);
    }
    const level = { price: entry[0], qty: entry[1] };
    return { price: readNumber(provider, level, 'price'), qty: readNumber(provider, level, 'qty') };
  });
}

/**
 * `[{ price: "1", size: "2" }, ...]` 形式の板を読む。
 * @throws {DecodeError}
 */
export function readObjectLevels(provider: string, record: JsonRecord, field: string): PriceLevel[] {
  return readArray(provider, record, field).map((entry) => {
    if (!isRecord(entry)) {
      throw new DecodeError(provider, `field "${field}" has a malformed level`);
    }
    return { price: readNumber(provider, entry, 'price'), qty: readNumber(provider, entry, 'size') };
  });
}

/**
 * ISO 8601 のタイムスタンプをエポックミリ秒にする。
 * @throws {DecodeError}
 */
export function readTimestamp(provider: string, record: JsonRecord, field: string): number {
  const ts = Date.parse(readString(provider, record, field));
  if (Number.isNaN(ts)) {
    throw new DecodeError(provider, `field "${field}" is not a timestamp`);
  }
  return ts;
}
