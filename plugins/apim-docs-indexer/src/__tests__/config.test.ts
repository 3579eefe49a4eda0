import { writeFile } from 'fs/promises';
import path from 'path';
import { applyEnvOverrides, loadSettings, parseSettings } from '../config/config';
import { ConfigError } from '../services/ErrorHandler';
import { makeTempDir, removeDir } from './helpers';

describe('parseSettings', () => {
  it('applies defaults to an empty file', () => {
    const settings = parseSettings(null);

    expect(settings.credentials).toEqual({ useDefaultCredential: true });
    expect(settings.apim).toBeUndefined();
    expect(settings.search).toBeUndefined();
    expect(settings.apiFilter).toEqual({ includeApis: [], includeTags: [] });
    expect(settings.processing).toEqual({
      convertToMarkdown: true,
      processWiki: true,
      uploadToSearch: true,
      llmExtraction: false,
      vectorSearch: false,
    });
    expect(settings.wiki).toEqual({ wikiDir: 'wiki_documents', wikiBaseUrl: '' });
    expect(settings.output).toEqual({ swaggerDir: 'swagger_files', markdownDir: 'markdown_files', llmDir: undefined });
  });

  it('maps the YAML tree to typed settings', () => {
    const settings = parseSettings({
      azure: {
        subscription_id: 'sub',
        resource_group: 'rg',
        service_name: 'apim',
        search: { endpoint: 'https://search.test', index_name: 'apis', key: 'test-secret' },
      },
    });

    expect(settings.apim).toEqual({ subscriptionId: 'sub', resourceGroup: 'rg', serviceName: 'apim' });
    expect(settings.search).toEqual({
      endpoint: 'https://search.test',
      key: 'test-secret',
      indexName: 'apis',
      apiVersion: '2024-07-01',
    });
  });

  it('lets environment variables override the file', () => {
    const settings = parseSettings(
      { azure: { api_filter: { include_apis: ['from-file'] } }, logging: { level: 'info' } },
      {
        AZURE_USE_DEFAULT_CREDENTIAL: 'no',
        AZURE_TENANT_ID: 'tenant',
        AZURE_CLIENT_ID: 'client',
        AZURE_CLIENT_SECRET: 'test-secret',
        AZURE_APIM_INCLUDE_APIS: ' orders , billing ,',
        AZURE_APIM_INCLUDE_TAGS: 'public',
        LOG_LEVEL: 'debug',
      },
    );

    expect(settings.credentials).toEqual({
      useDefaultCredential: false,
      tenantId: 'tenant',
      clientId: 'client',
      clientSecret: 'test-secret',
    });
    expect(settings.apiFilter).toEqual({ includeApis: ['orders', 'billing'], includeTags: ['public'] });
    expect(settings.logging.level).toBe('debug');
  });

  it('requires service principal fields without the default credential', () => {
    expect(() => parseSettings({ azure: { auth: { use_default_credential: false }, tenant_id: 't' } })).toThrow(
      'Invalid configuration: azure.client_id: required when azure.auth.use_default_credential is false; ' +
        'azure.client_secret: required when azure.auth.use_default_credential is false',
    );
  });

  it('requires Azure OpenAI settings for LLM extraction', () => {
    expect(() => parseSettings({ processing: { llm_extraction: true } })).toThrow(ConfigError);
  });

  it('requires an embedding deployment and model for vector search', () => {
    expect(() =>
      parseSettings({
        openai: { endpoint: 'https://openai.test', api_key: 'test-secret', model: 'gpt-test' },
        processing: { llm_extraction: true, vector_search: true },
      }),
    ).toThrow(
      'Invalid configuration: openai.embedding_deployment: required when processing.vector_search is enabled; ' +
        'openai.embedding_model: required when processing.vector_search is enabled',
    );
  });

  it('accepts vector search with an embedding deployment', () => {
    const settings = parseSettings({
      openai: {
        endpoint: 'https://openai.test',
        api_key: 'test-secret',
        model: 'gpt-test',
        embedding_deployment: 'embed',
        embedding_model: 'text-embedding-3-small',
      },
      processing: { llm_extraction: true, vector_search: true },
    });

    expect(settings.openai).toMatchObject({ embeddingDeployment: 'embed', embeddingModel: 'text-embedding-3-small' });
  });

  it('rejects a partial API Management target', () => {
    expect(() => parseSettings({ azure: { subscription_id: 'sub' } })).toThrow(
      'azure: subscription_id, resource_group and service_name must be set together',
    );
  });

  it('rejects a root that is not a mapping', () => {
    expect(() => parseSettings(['a'])).toThrow('Configuration root must be a mapping');
  });
});

describe('applyEnvOverrides', () => {
  it('creates missing sections', () => {
    expect(applyEnvOverrides({}, { AZURE_SEARCH_INDEX_NAME: 'apis', AZURE_OPENAI_API_KEY: 'test-secret' })).toEqual({
      azure: { search: { index_name: 'apis' } },
      openai: { api_key: 'test-secret' },
    });
  });
});

describe('loadSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads a YAML file', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'wiki:\n  wiki_dir: docs/wiki\nprocessing:\n  process_wiki: false\n', 'utf-8');

    const settings = loadSettings(file, {});

    expect(settings.wiki.wikiDir).toBe('docs/wiki');
    expect(settings.processing.processWiki).toBe(false);
  });

  it('reports a missing file', () => {
    const file = path.join(dir, 'missing.yaml');
    expect(() => loadSettings(file, {})).toThrow(`Configuration file not found: ${file}`);
  });

  it('reports unparseable YAML', async () => {
    const file = path.join(dir, 'bad.yaml');
    await writeFile(file, 'a: [1, 2\n', 'utf-8');
    expect(() => loadSettings(file, {})).toThrow(ConfigError);
  });
});
