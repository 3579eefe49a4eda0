// Minimal API Management shapes (loose) so the stages do not depend on the ARM SDK types
export type JsonObject = { [key: string]: unknown };

export type ApiHandle = {
  id: string;
  displayName: string;
  description?: string;
  serviceUrl?: string;
};

export type ApiFilter = {
  includeApis: string[];
  includeTags: string[];
};

export interface ApiManagementProvider {
  listApis(): Promise<ApiHandle[]>;
  listApiTags(apiId: string): Promise<string[]>;
  exportSpecLink(apiId: string): Promise<string>;
}

/**
 * One exported API. Provenance fields are also written into `body.info`
 * under the `x-` keys before the file is persisted.
 */
export type ApiSpecDocument = {
  apiId: string;
  displayName: string;
  body: JsonObject;
  downloadedAt: string;
  serviceUrl?: string;
  description?: string;
};
