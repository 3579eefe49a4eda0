import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from '../services/logger';
import type { Observability } from '../services/Observability';
import { ErrorHandler, StageError, type BatchResult, type Result } from '../services/ErrorHandler';
import { fetchJson } from '../services/http';
import type { ApiFilter, ApiHandle, ApiManagementProvider, ApiSpecDocument, JsonObject } from '../types/ApiManagement';
import { isRecord } from '../utils/json';

export type SpecFetcherOptions = {
  outputDir: string;
  filter: ApiFilter;
  download?: (url: string) => Promise<unknown>;
  now?: () => Date;
};

/** Display name with anything but letters, digits, `_` and `-` replaced, then the API id. */
export function specFileName(api: ApiHandle): string {
  const safeName = api.displayName.replace(/[^\p{L}\p{N}_-]/gu, '_');
  return `${safeName}_${api.id}.json`;
}

export function annotateSpec(body: JsonObject, doc: Omit<ApiSpecDocument, 'body'>): JsonObject {
  const info: JsonObject = isRecord(body.info) ? { ...body.info } : {};
  info['x-api-id'] = doc.apiId;
  info['x-api-name'] = doc.displayName;
  info['x-downloaded-timestamp'] = doc.downloadedAt;
  if (doc.serviceUrl) info['x-api-service-url'] = doc.serviceUrl;
  if (doc.description) info.description = doc.description;
  return { ...body, info };
}

export class SpecFetcher {
  private readonly download: (url: string) => Promise<unknown>;
  private readonly now: () => Date;

  constructor(
    private readonly provider: ApiManagementProvider,
    private readonly options: SpecFetcherOptions,
    private readonly logger: Logger,
    private readonly observability: Observability,
  ) {
    this.download = options.download ?? fetchJson;
    this.now = options.now ?? (() => new Date());
  }

  async listAPIs(filter: ApiFilter = this.options.filter): Promise<ApiHandle[]> {
    const all = await this.provider.listApis();
    this.logger.info({ count: all.length }, 'Retrieved APIs from API Management');

    const names = new Set(filter.includeApis);
    const byName = names.size === 0 ? all : all.filter(a => names.has(a.id) || names.has(a.displayName));
    if (filter.includeTags.length === 0) return byName;

    const wanted = new Set(filter.includeTags);
    const selected: ApiHandle[] = [];
    for (const api of byName) {
      try {
        const tags = await this.provider.listApiTags(api.id);
        if (tags.some(t => wanted.has(t))) selected.push(api);
      } catch (error) {
        this.logger.error({ api: api.id, err: ErrorHandler.describe(error) }, 'Could not read API tags; skipping');
      }
    }
    return selected;
  }

  async exportOne(api: ApiHandle): Promise<ApiSpecDocument> {
    this.logger.info({ api: api.id, name: api.displayName }, 'Exporting OpenAPI specification');
    const link = await this.provider.exportSpecLink(api.id);
    const content = await this.download(link);
    if (!isRecord(content)) {
      throw new Error(`Export of API ${api.id} is not a JSON object`);
    }
    const meta = {
      apiId: api.id,
      displayName: api.displayName,
      downloadedAt: this.now().toISOString(),
      serviceUrl: api.serviceUrl,
      description: api.description,
    };
    return { ...meta, body: annotateSpec(content, meta) };
  }

  async save(doc: ApiSpecDocument): Promise<string> {
    const filePath = path.join(
      this.options.outputDir,
      specFileName({ id: doc.apiId, displayName: doc.displayName }),
    );
    await writeFile(filePath, JSON.stringify(doc.body, null, 2), 'utf-8');
    this.logger.info({ file: filePath }, 'Saved specification');
    return filePath;
  }

  async runOnce(): Promise<BatchResult<string>> {
    await mkdir(this.options.outputDir, { recursive: true });

    let apis: ApiHandle[];
    try {
      apis = await this.listAPIs();
    } catch (error) {
      throw new StageError('download', `Could not list APIs: ${ErrorHandler.describe(error)}`, { cause: error });
    }

    const results: Result<string>[] = [];
    for (const api of apis) {
      const result = await ErrorHandler.attempt(api.id, async () => this.save(await this.exportOne(api)));
      if (!result.ok) {
        this.logger.error({ api: api.id, err: result.error.reason }, 'Error downloading specification');
      }
      results.push(result);
    }

    const batch = ErrorHandler.collect(results);
    this.observability.recordItem('download', 'succeeded', batch.succeeded.length);
    this.observability.recordItem('download', 'failed', batch.failed.length);
    this.logger.info({ downloaded: batch.succeeded.length, failed: batch.failed.length }, 'Download finished');
    return batch;
  }
}
