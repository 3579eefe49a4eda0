import { ApiManagementClient } from '@azure/arm-apimanagement';
import { ClientSecretCredential, DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import type { ApimSettings, CredentialSettings } from '../config/config';
import type { ApiHandle, ApiManagementProvider } from '../types/ApiManagement';

// OpenAPI 3 JSON; the renderer walks servers/components rather than host/definitions
const EXPORT_FORMAT = 'openapi+json-link';

export function createCredential(settings: CredentialSettings): TokenCredential {
  if (settings.useDefaultCredential) {
    return new DefaultAzureCredential();
  }
  return new ClientSecretCredential(settings.tenantId, settings.clientId, settings.clientSecret);
}

export class AzureApiManagementProvider implements ApiManagementProvider {
  private readonly client: ApiManagementClient;

  constructor(
    private readonly settings: ApimSettings,
    credential: TokenCredential,
  ) {
    this.client = new ApiManagementClient(credential, settings.subscriptionId);
  }

  async listApis(): Promise<ApiHandle[]> {
    const apis: ApiHandle[] = [];
    for await (const api of this.client.api.listByService(this.settings.resourceGroup, this.settings.serviceName)) {
      if (!api.name) continue;
      apis.push({
        id: api.name,
        displayName: api.displayName || api.name,
        description: api.description || undefined,
        serviceUrl: api.serviceUrl || undefined,
      });
    }
    return apis;
  }

  async listApiTags(apiId: string): Promise<string[]> {
    const tags: string[] = [];
    for await (const tag of this.client.tag.listByApi(this.settings.resourceGroup, this.settings.serviceName, apiId)) {
      const name = tag.displayName || tag.name;
      if (name) tags.push(name);
    }
    return tags;
  }

  async exportSpecLink(apiId: string): Promise<string> {
    const result = await this.client.apiExport.get(
      this.settings.resourceGroup,
      this.settings.serviceName,
      apiId,
      EXPORT_FORMAT,
      'true',
    );
    const link = result.value?.link;
    if (!link) {
      throw new Error(`Export of API ${apiId} returned no download link`);
    }
    return link;
  }
}
