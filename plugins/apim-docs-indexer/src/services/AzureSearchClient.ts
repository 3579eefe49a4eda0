import type { TokenCredential } from '@azure/identity';
import type { IndexingResult, SearchDocument, SearchIndexDefinition, SearchIndexWriter } from '../types/Search';
import { asString, isRecord } from '../utils/json';
import { sendRequest, type HttpMethod } from './http';

const SEARCH_SCOPE = 'https://search.azure.com/.default';

type ClientConfig = {
  endpoint: string;
  indexName: string;
  apiVersion: string;
  auth: { type: 'key'; key: string } | { type: 'bearer'; credential: TokenCredential };
  tls?: { rejectUnauthorized?: boolean };
};

/** Azure AI Search over its REST API: index management and document upload. */
export class AzureSearchClient implements SearchIndexWriter {
  constructor(private readonly config: ClientConfig) {}

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers: Record<string, string> = { 'content-type': 'application/json', accept: 'application/json' };
    const auth = this.config.auth;
    if (auth.type === 'key') {
      headers['api-key'] = auth.key;
    } else {
      const token = await auth.credential.getToken(SEARCH_SCOPE);
      if (!token) throw new Error('Could not acquire an Azure AI Search access token');
      headers['authorization'] = `Bearer ${token.token}`;
    }
    return headers;
  }

  private async request(path: string, method: HttpMethod, body?: unknown): Promise<unknown> {
    const url = new URL(this.config.endpoint);
    url.pathname = path;
    url.searchParams.set('api-version', this.config.apiVersion);

    const res = await sendRequest({
      url,
      method,
      headers: await this.buildHeaders(),
      body: body === undefined ? undefined : JSON.stringify(body),
      rejectUnauthorized: this.config.tls?.rejectUnauthorized,
    });
    if (!res.body) return undefined;
    try {
      return JSON.parse(res.body);
    } catch {
      return res.body;
    }
  }

  async createOrUpdateIndex(definition: SearchIndexDefinition): Promise<void> {
    await this.request(`/indexes/${encodeURIComponent(definition.name)}`, 'PUT', definition);
  }

  async uploadDocuments(documents: SearchDocument[]): Promise<IndexingResult[]> {
    if (documents.length === 0) return [];
    const body = { value: documents.map(d => ({ '@search.action': 'mergeOrUpload', ...d })) };
    const response = await this.request(`/indexes/${encodeURIComponent(this.config.indexName)}/docs/index`, 'POST', body);

    const items = isRecord(response) && Array.isArray(response.value) ? response.value : [];
    return items.filter(isRecord).map(item => ({
      key: asString(item.key) ?? '',
      succeeded: item.status === true,
      errorMessage: asString(item.errorMessage),
    }));
  }
}
