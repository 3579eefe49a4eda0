import { parse as parseYaml } from 'yaml';
import type { JsonObject } from '../../types/ApiManagement';
import { isRecord, takeEntries } from '../../utils/json';

export const CHARS_PER_TOKEN = 4;
export const MAX_SPEC_TOKENS = 80000;
export const MAX_PATHS = 50;
export const MAX_SCHEMAS = 20;

export type TruncatedSpec = {
  text: string;
  truncated: boolean;
  estimatedTokens: number;
};

export function estimateTokens(text: string): number {
  return text.length / CHARS_PER_TOKEN;
}

function tryParse(text: string): JsonObject | undefined {
  try {
    const json: unknown = JSON.parse(text);
    return isRecord(json) ? json : undefined;
  } catch {
    // not JSON; fall through to YAML
  }
  try {
    const yaml: unknown = parseYaml(text);
    return isRecord(yaml) ? yaml : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Keeps `info`, the first 50 paths and the first 20 schema definitions of an
 * oversized specification. Text that does not parse is cut to the token budget.
 */
export function truncateForExtraction(specText: string): TruncatedSpec {
  const estimatedTokens = estimateTokens(specText);
  if (estimatedTokens <= MAX_SPEC_TOKENS) {
    return { text: specText, truncated: false, estimatedTokens };
  }

  const spec = tryParse(specText);
  if (!spec) {
    return { text: specText.slice(0, MAX_SPEC_TOKENS * CHARS_PER_TOKEN), truncated: true, estimatedTokens };
  }

  const reduced: JsonObject = {
    info: isRecord(spec.info) ? spec.info : {},
    paths: isRecord(spec.paths) ? takeEntries(spec.paths, MAX_PATHS) : {},
  };
  if (isRecord(spec.definitions)) {
    reduced.definitions = takeEntries(spec.definitions, MAX_SCHEMAS);
  } else if (isRecord(spec.components) && isRecord(spec.components.schemas)) {
    reduced.components = { schemas: takeEntries(spec.components.schemas, MAX_SCHEMAS) };
  }
  return { text: JSON.stringify(reduced, null, 2), truncated: true, estimatedTokens };
}
