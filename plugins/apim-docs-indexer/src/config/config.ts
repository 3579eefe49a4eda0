import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import type { ApiFilter } from '../types/ApiManagement';
import { ConfigError } from '../services/ErrorHandler';
import { isRecord } from '../utils/json';

const stringList = z.array(z.string()).default([]);

const configSchema = z
  .object({
    azure: z
      .object({
        auth: z.object({ use_default_credential: z.boolean().default(true) }).default({}),
        tenant_id: z.string().optional(),
        client_id: z.string().optional(),
        client_secret: z.string().optional(),
        subscription_id: z.string().optional(),
        resource_group: z.string().optional(),
        service_name: z.string().optional(),
        api_filter: z.object({ include_apis: stringList, include_tags: stringList }).default({}),
        search: z
          .object({
            endpoint: z.string().url().optional(),
            key: z.string().optional(),
            index_name: z.string().optional(),
            api_version: z.string().default('2024-07-01'),
          })
          .default({}),
      })
      .default({}),
    openai: z
      .object({
        endpoint: z.string().url().optional(),
        api_key: z.string().optional(),
        api_version: z.string().default('2024-06-01'),
        model: z.string().optional(),
        embedding_deployment: z.string().optional(),
        embedding_model: z.string().optional(),
        embedding_dimensions: z.number().int().positive().default(1536),
      })
      .default({}),
    output: z
      .object({
        swagger_dir: z.string().default('swagger_files'),
        markdown_dir: z.string().default('markdown_files'),
        llm_dir: z.string().optional(),
      })
      .default({}),
    processing: z
      .object({
        convert_to_markdown: z.boolean().default(true),
        process_wiki: z.boolean().default(true),
        upload_to_search: z.boolean().default(true),
        llm_extraction: z.boolean().default(false),
        vector_search: z.boolean().default(false),
      })
      .default({}),
    wiki: z
      .object({
        wiki_dir: z.string().default('wiki_documents'),
        wiki_base_url: z.string().default(''),
      })
      .default({}),
    logging: z.object({ level: z.string().default('info') }).default({}),
    observability: z.object({ metrics_file: z.string().optional() }).default({}),
  })
  .superRefine((cfg, ctx) => {
    const azure = cfg.azure;
    if (!azure.auth.use_default_credential) {
      for (const key of ['tenant_id', 'client_id', 'client_secret'] as const) {
        if (!azure[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['azure', key],
            message: 'required when azure.auth.use_default_credential is false',
          });
        }
      }
    }
    const apim = [azure.subscription_id, azure.resource_group, azure.service_name];
    if (apim.some(Boolean) && !apim.every(Boolean)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['azure'],
        message: 'subscription_id, resource_group and service_name must be set together',
      });
    }
    if (!!azure.search.endpoint !== !!azure.search.index_name) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['azure', 'search'],
        message: 'endpoint and index_name must be set together',
      });
    }
    if (cfg.processing.llm_extraction) {
      for (const key of ['endpoint', 'api_key', 'model'] as const) {
        if (!cfg.openai[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['openai', key],
            message: 'required when processing.llm_extraction is enabled',
          });
        }
      }
    }
    if (cfg.processing.vector_search) {
      for (const key of ['embedding_deployment', 'embedding_model'] as const) {
        if (!cfg.openai[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['openai', key],
            message: 'required when processing.vector_search is enabled',
          });
        }
      }
    }
  });

type RawConfig = z.infer<typeof configSchema>;

export type CredentialSettings =
  | { useDefaultCredential: true }
  | { useDefaultCredential: false; tenantId: string; clientId: string; clientSecret: string };

export type ApimSettings = {
  subscriptionId: string;
  resourceGroup: string;
  serviceName: string;
};

export type SearchSettings = {
  endpoint: string;
  key?: string;
  indexName: string;
  apiVersion: string;
};

export type OpenAISettings = {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  model: string;
  embeddingDeployment?: string;
  embeddingModel?: string;
  embeddingDimensions: number;
};

export type Settings = {
  credentials: CredentialSettings;
  apim?: ApimSettings;
  apiFilter: ApiFilter;
  search?: SearchSettings;
  openai?: OpenAISettings;
  output: { swaggerDir: string; markdownDir: string; llmDir?: string };
  processing: {
    convertToMarkdown: boolean;
    processWiki: boolean;
    uploadToSearch: boolean;
    llmExtraction: boolean;
    vectorSearch: boolean;
  };
  wiki: { wikiDir: string; wikiBaseUrl: string };
  logging: { level: string };
  observability: { metricsFile?: string };
};

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(v => v.trim())
    .filter(Boolean);
}

/** Applies the documented environment variables on top of the parsed YAML tree (mutates `raw`). */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const azure = section(raw, 'azure');

  const useDefault = env.AZURE_USE_DEFAULT_CREDENTIAL;
  if (useDefault) {
    azure.auth = { use_default_credential: ['true', 'yes', '1'].includes(useDefault.toLowerCase()) };
  }

  const direct: Array<[string, Record<string, unknown>, string]> = [
    ['AZURE_TENANT_ID', azure, 'tenant_id'],
    ['AZURE_CLIENT_ID', azure, 'client_id'],
    ['AZURE_CLIENT_SECRET', azure, 'client_secret'],
    ['AZURE_SUBSCRIPTION_ID', azure, 'subscription_id'],
    ['AZURE_RESOURCE_GROUP', azure, 'resource_group'],
    ['AZURE_APIM_SERVICE_NAME', azure, 'service_name'],
  ];
  for (const [name, target, key] of direct) {
    const value = env[name];
    if (value) target[key] = value;
  }

  if (env.AZURE_SEARCH_ENDPOINT) section(azure, 'search').endpoint = env.AZURE_SEARCH_ENDPOINT;
  if (env.AZURE_SEARCH_KEY) section(azure, 'search').key = env.AZURE_SEARCH_KEY;
  if (env.AZURE_SEARCH_INDEX_NAME) section(azure, 'search').index_name = env.AZURE_SEARCH_INDEX_NAME;

  if (env.AZURE_APIM_INCLUDE_APIS) section(azure, 'api_filter').include_apis = splitList(env.AZURE_APIM_INCLUDE_APIS);
  if (env.AZURE_APIM_INCLUDE_TAGS) section(azure, 'api_filter').include_tags = splitList(env.AZURE_APIM_INCLUDE_TAGS);

  if (env.AZURE_OPENAI_ENDPOINT) section(raw, 'openai').endpoint = env.AZURE_OPENAI_ENDPOINT;
  if (env.AZURE_OPENAI_API_KEY) section(raw, 'openai').api_key = env.AZURE_OPENAI_API_KEY;

  if (env.LOG_LEVEL) section(raw, 'logging').level = env.LOG_LEVEL;

  return raw;
}

function toSettings(cfg: RawConfig): Settings {
  const { azure, openai } = cfg;

  const credentials: CredentialSettings =
    azure.auth.use_default_credential || !azure.tenant_id || !azure.client_id || !azure.client_secret
      ? { useDefaultCredential: true }
      : {
          useDefaultCredential: false,
          tenantId: azure.tenant_id,
          clientId: azure.client_id,
          clientSecret: azure.client_secret,
        };

  const apim =
    azure.subscription_id && azure.resource_group && azure.service_name
      ? { subscriptionId: azure.subscription_id, resourceGroup: azure.resource_group, serviceName: azure.service_name }
      : undefined;

  const search =
    azure.search.endpoint && azure.search.index_name
      ? {
          endpoint: azure.search.endpoint,
          key: azure.search.key,
          indexName: azure.search.index_name,
          apiVersion: azure.search.api_version,
        }
      : undefined;

  const openaiSettings =
    openai.endpoint && openai.api_key && openai.model
      ? {
          endpoint: openai.endpoint,
          apiKey: openai.api_key,
          apiVersion: openai.api_version,
          model: openai.model,
          embeddingDeployment: openai.embedding_deployment,
          embeddingModel: openai.embedding_model,
          embeddingDimensions: openai.embedding_dimensions,
        }
      : undefined;

  return {
    credentials,
    apim,
    apiFilter: { includeApis: azure.api_filter.include_apis, includeTags: azure.api_filter.include_tags },
    search,
    openai: openaiSettings,
    output: {
      swaggerDir: cfg.output.swagger_dir,
      markdownDir: cfg.output.markdown_dir,
      llmDir: cfg.output.llm_dir,
    },
    processing: {
      convertToMarkdown: cfg.processing.convert_to_markdown,
      processWiki: cfg.processing.process_wiki,
      uploadToSearch: cfg.processing.upload_to_search,
      llmExtraction: cfg.processing.llm_extraction,
      vectorSearch: cfg.processing.vector_search,
    },
    wiki: { wikiDir: cfg.wiki.wiki_dir, wikiBaseUrl: cfg.wiki.wiki_base_url },
    logging: { level: cfg.logging.level },
    observability: { metricsFile: cfg.observability.metrics_file },
  };
}

export function parseSettings(raw: unknown, env: NodeJS.ProcessEnv = {}): Settings {
  if (raw !== null && raw !== undefined && !isRecord(raw)) {
    throw new ConfigError('Configuration root must be a mapping');
  }
  const tree = applyEnvOverrides(isRecord(raw) ? { ...raw } : {}, env);
  const parsed = configSchema.safeParse(tree);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return toSettings(parsed.data);
}

export function defaultConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, 'config', 'config.yaml');
}

/** Reads the YAML file, applies environment overrides and validates the result. */
export function loadSettings(configPath?: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const file = configPath ?? defaultConfigPath();
  if (!existsSync(file)) {
    throw new ConfigError(`Configuration file not found: ${file}`);
  }
  let raw: unknown;
  try {
    raw = parse(readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Could not parse ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSettings(raw, env);
}
