import { createHash } from 'crypto';
import type { JsonObject } from '../types/ApiManagement';

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonObject {
  return isRecord(value) ? value : {};
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function md5(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/** First `count` entries of an object, in insertion order. */
export function takeEntries(value: JsonObject, count: number): JsonObject {
  return Object.fromEntries(Object.entries(value).slice(0, count));
}
