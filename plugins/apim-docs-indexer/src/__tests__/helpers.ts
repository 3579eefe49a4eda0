import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { Registry } from 'prom-client';
import { createLogger } from '../services/logger';
import { Observability } from '../services/Observability';
import type { EmbeddingService } from '../services/ai/EmbeddingService';
import type { ApiHandle, ApiManagementProvider } from '../types/ApiManagement';
import type { IndexingResult, SearchDocument, SearchIndexDefinition, SearchIndexWriter } from '../types/Search';

export const silentLogger = () => createLogger({ level: 'silent' });

export const testObservability = () => new Observability({ registry: new Registry(), defaultMetrics: false });

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'apim-docs-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Records every call; `reject` decides per document whether the service refuses it. */
export class FakeSearchWriter implements SearchIndexWriter {
  readonly definitions: SearchIndexDefinition[] = [];
  readonly batches: SearchDocument[][] = [];
  failIndex = false;
  failBatch?: number;
  reject: (doc: SearchDocument) => string | undefined = () => undefined;

  async createOrUpdateIndex(definition: SearchIndexDefinition): Promise<void> {
    if (this.failIndex) throw new Error('index rejected');
    this.definitions.push(definition);
  }

  async uploadDocuments(documents: SearchDocument[]): Promise<IndexingResult[]> {
    const batchNumber = this.batches.length;
    this.batches.push(documents);
    if (this.failBatch === batchNumber) throw new Error('service unavailable');
    return documents.map(d => {
      const errorMessage = this.reject(d);
      return { key: d.id, succeeded: errorMessage === undefined, errorMessage };
    });
  }

  get uploaded(): SearchDocument[] {
    return this.batches.flat();
  }
}

/** In-memory API Management: specs are served from `specs` by API id. */
export class FakeApiProvider implements ApiManagementProvider {
  failListing = false;
  readonly failingTags = new Set<string>();

  constructor(
    readonly apis: ApiHandle[],
    readonly specs: Record<string, unknown> = {},
    readonly tags: Record<string, string[]> = {},
  ) {}

  async listApis(): Promise<ApiHandle[]> {
    if (this.failListing) throw new Error('forbidden');
    return this.apis;
  }

  async listApiTags(apiId: string): Promise<string[]> {
    if (this.failingTags.has(apiId)) throw new Error('tags unavailable');
    return this.tags[apiId] ?? [];
  }

  async exportSpecLink(apiId: string): Promise<string> {
    return `https://export.test/${apiId}`;
  }

  /** Stands in for the HTTPS download of an export link. */
  readonly download = async (url: string): Promise<unknown> => {
    const id = url.slice('https://export.test/'.length);
    if (!(id in this.specs)) throw new Error(`no export for ${id}`);
    return this.specs[id];
  };
}

/** Returns `[length, 1, 1, ...]` so tests can tell which text was embedded. */
export class FakeEmbeddingService implements EmbeddingService {
  readonly texts: string[] = [];

  constructor(private readonly dimension = 3) {}

  dim(): number {
    return this.dimension;
  }

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    return [text.length, ...new Array<number>(this.dimension - 1).fill(1)];
  }
}
