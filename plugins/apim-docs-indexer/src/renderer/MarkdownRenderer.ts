import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { JsonObject } from '../types/ApiManagement';
import { asRecord, asString, asStringArray, isRecord } from '../utils/json';

const HTTP_METHODS = new Set(['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace']);

type OperationEntry = {
  path: string;
  method: string;
  operation: JsonObject;
  pathParameters: unknown[];
};

/**
 * Parses a specification file body as JSON, or as YAML for `.yaml`/`.yml`.
 * Throws when the text is malformed or the root is not an object.
 */
export function parseSpecification(text: string, fileName: string): JsonObject {
  const ext = path.extname(fileName).toLowerCase();
  const parsed: unknown = ext === '.yaml' || ext === '.yml' ? parseYaml(text) : JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error(`${fileName} does not contain an OpenAPI document object`);
  }
  return parsed;
}

export function refName(ref: string): string {
  const parts = ref.split('/');
  return parts[parts.length - 1] ?? ref;
}

/**
 * Looks up a local `#/...` reference. One hop only: a `$ref` inside the
 * target is returned as-is, never followed.
 */
export function resolveRef(spec: JsonObject, ref: string): JsonObject | undefined {
  if (!ref.startsWith('#/')) return undefined;
  let node: unknown = spec;
  for (const raw of ref.slice(2).split('/')) {
    const key = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return isRecord(node) ? node : undefined;
}

function deref(spec: JsonObject, value: unknown): JsonObject {
  const node = asRecord(value);
  const ref = asString(node.$ref);
  return ref ? resolveRef(spec, ref) ?? node : node;
}

function tableCell(value: string): string {
  return value.replace(/\r?\n/g, '<br>').replace(/\|/g, '\\|');
}

function typeLabel(schema: JsonObject): string {
  const ref = asString(schema.$ref);
  if (ref) return refName(ref);
  return asString(schema.type) ?? 'object';
}

function parameterType(param: JsonObject): string {
  // OpenAPI 3 keeps the type under `schema`; Swagger 2 non-body parameters inline it
  const schema = isRecord(param.schema) ? param.schema : param;
  const type = isRecord(param.schema) || asString(param.type) ? typeLabel(schema) : 'object';
  if (type === 'array') {
    return `array of ${typeLabel(asRecord(schema.items))}`;
  }
  return type;
}

function pushBlock(lines: string[], ...blocks: string[]) {
  for (const b of blocks) {
    lines.push(b, '');
  }
}

function pushExample(lines: string[], example: unknown) {
  lines.push('**Example:**', '', '```json', JSON.stringify(example, null, 2), '```', '');
}

function renderContent(spec: JsonObject, content: JsonObject, lines: string[]) {
  for (const [contentType, media] of Object.entries(content)) {
    const mediaType = asRecord(media);
    pushBlock(lines, `**Content Type:** \`${contentType}\``);

    const schema = asRecord(mediaType.schema);
    const ref = asString(schema.$ref);
    let example = mediaType.example;
    if (ref) {
      pushBlock(lines, `**Schema:** \`${refName(ref)}\``);
      if (example === undefined) example = resolveRef(spec, ref)?.example;
    } else if (example === undefined) {
      example = schema.example;
    }
    if (example !== undefined) pushExample(lines, example);
  }
}

function renderHeader(spec: JsonObject, lines: string[]) {
  const info = asRecord(spec.info);
  pushBlock(lines, `# ${asString(info.title) || 'API Documentation'}`);

  const description = asString(info.description);
  if (description) pushBlock(lines, description);

  const version = asString(info.version) ?? (typeof info.version === 'number' ? String(info.version) : undefined);
  if (version) pushBlock(lines, `**Version:** ${version}`);

  const downloadedAt = asString(info['x-downloaded-timestamp']);
  if (downloadedAt) pushBlock(lines, `*Last updated: ${downloadedAt}*`);
}

function renderServers(spec: JsonObject, lines: string[]) {
  const servers = Array.isArray(spec.servers) ? spec.servers.filter(isRecord) : [];
  if (servers.length === 0) return;

  pushBlock(lines, '## Base URL');
  for (const server of servers) {
    lines.push(`* ${asString(server.url) ?? ''}`);
    const description = asString(server.description);
    if (description) lines.push(`  * ${description}`);
  }
  lines.push('');
}

function renderAuthentication(spec: JsonObject, lines: string[]) {
  const schemes = Object.entries(asRecord(asRecord(spec.components).securitySchemes));
  if (schemes.length === 0) return;

  pushBlock(lines, '## Authentication');
  for (const [name, value] of schemes) {
    const scheme = asRecord(value);
    const type = asString(scheme.type) ?? '';
    pushBlock(lines, `### ${name}`);

    lines.push(`- **Type:** ${type}`);
    if (type === 'http') lines.push(`- **Scheme:** ${asString(scheme.scheme) ?? ''}`);
    const bearerFormat = asString(scheme.bearerFormat);
    if (bearerFormat) lines.push(`- **Bearer Format:** ${bearerFormat}`);
    if (type === 'apiKey') {
      lines.push(`- **In:** ${asString(scheme.in) ?? ''}`);
      lines.push(`- **Name:** ${asString(scheme.name) ?? ''}`);
    }
    lines.push('');

    const description = asString(scheme.description);
    if (description) pushBlock(lines, description);
  }
}

/** Operations bucketed by tag, both in source (insertion) order. */
export function groupOperationsByTag(spec: JsonObject): Map<string, OperationEntry[]> {
  const groups = new Map<string, OperationEntry[]>();
  for (const [p, item] of Object.entries(asRecord(spec.paths))) {
    const pathItem = asRecord(item);
    const pathParameters = Array.isArray(pathItem.parameters) ? pathItem.parameters : [];
    for (const [method, op] of Object.entries(pathItem)) {
      if (!HTTP_METHODS.has(method) || !isRecord(op)) continue;
      const declared = asStringArray(op.tags);
      for (const tag of declared.length ? declared : ['default']) {
        const bucket = groups.get(tag) ?? [];
        bucket.push({ path: p, method, operation: op, pathParameters });
        groups.set(tag, bucket);
      }
    }
  }
  return groups;
}

function collectParameters(spec: JsonObject, entry: OperationEntry): JsonObject[] {
  const own = Array.isArray(entry.operation.parameters) ? entry.operation.parameters : [];
  const merged = new Map<string, JsonObject>();
  for (const raw of [...entry.pathParameters, ...own]) {
    const param = deref(spec, raw);
    merged.set(`${asString(param.in) ?? ''}:${asString(param.name) ?? ''}`, param);
  }
  return [...merged.values()];
}

function renderParameters(spec: JsonObject, entry: OperationEntry, lines: string[]) {
  const params = collectParameters(spec, entry);
  if (params.length === 0) return;

  pushBlock(lines, '#### Parameters');
  lines.push('| Name | In | Type | Required | Description |');
  lines.push('|------|----|------|----------|-------------|');
  for (const param of params) {
    const cells = [
      asString(param.name) ?? '',
      asString(param.in) ?? '',
      parameterType(param),
      param.required === true ? 'Yes' : 'No',
      asString(param.description) ?? '',
    ].map(tableCell);
    lines.push(`| ${cells.join(' | ')} |`);
  }
  lines.push('');
}

function renderRequestBody(spec: JsonObject, operation: JsonObject, lines: string[]) {
  if (!isRecord(operation.requestBody)) return;
  const body = deref(spec, operation.requestBody);

  pushBlock(lines, '#### Request Body');
  const description = asString(body.description);
  if (description) pushBlock(lines, description);
  renderContent(spec, asRecord(body.content), lines);
}

function renderResponses(spec: JsonObject, operation: JsonObject, lines: string[]) {
  const responses = Object.entries(asRecord(operation.responses));
  if (responses.length === 0) return;

  pushBlock(lines, '#### Responses');
  for (const [status, value] of responses) {
    const response = deref(spec, value);
    pushBlock(lines, `**Status Code:** ${status}`);
    const description = asString(response.description);
    if (description) pushBlock(lines, `**Description:** ${description}`);
    renderContent(spec, asRecord(response.content), lines);
  }
}

function renderOperation(spec: JsonObject, entry: OperationEntry, lines: string[]) {
  const { operation } = entry;
  const method = entry.method.toUpperCase();
  const heading = asString(operation.summary) || asString(operation.operationId) || `${method} ${entry.path}`;
  pushBlock(lines, `### ${heading}`);

  const description = asString(operation.description);
  if (description) pushBlock(lines, description);

  lines.push('```', `${method} ${entry.path}`, '```', '');

  renderParameters(spec, entry, lines);
  renderRequestBody(spec, operation, lines);
  renderResponses(spec, operation, lines);
}

function renderOperations(spec: JsonObject, lines: string[]) {
  const tagDescriptions = new Map<string, string>();
  for (const tag of Array.isArray(spec.tags) ? spec.tags.filter(isRecord) : []) {
    const name = asString(tag.name);
    const description = asString(tag.description);
    if (name && description && !tagDescriptions.has(name)) tagDescriptions.set(name, description);
  }

  for (const [tag, entries] of groupOperationsByTag(spec)) {
    pushBlock(lines, `## ${tag}`);
    const description = tagDescriptions.get(tag);
    if (description) pushBlock(lines, description);
    for (const entry of entries) {
      renderOperation(spec, entry, lines);
    }
  }
}

/**
 * Renders one OpenAPI document as Markdown. Pure and deterministic: the same
 * document always yields the same text.
 */
export function renderMarkdown(spec: JsonObject): string {
  const lines: string[] = [];
  renderHeader(spec, lines);
  renderServers(spec, lines);
  renderAuthentication(spec, lines);
  renderOperations(spec, lines);
  return lines.join('\n').replace(/\n+$/, '') + '\n';
}
