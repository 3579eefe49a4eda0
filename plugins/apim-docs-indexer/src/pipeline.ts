import type { TokenCredential } from '@azure/identity';
import type { Settings } from './config/config';
import type { Logger } from './services/logger';
import { Observability } from './services/Observability';
import { FeatureToggle } from './services/FeatureToggle';
import { InMemoryCacheService } from './services/CacheService';
import { ErrorHandler, StageError, type BatchResult, type Failure, type StageName } from './services/ErrorHandler';
import { AzureApiManagementProvider, createCredential } from './services/ApiManagementClient';
import { AzureSearchClient } from './services/AzureSearchClient';
import { WikiFuser } from './services/WikiFuser';
import { OpenAIExtractionProvider } from './services/ai/OpenAIExtractionProvider';
import type { ExtractionProvider } from './services/ai/ExtractionProvider';
import { OpenAIEmbeddingService, type EmbeddingService } from './services/ai/EmbeddingService';
import type { ApiManagementProvider } from './types/ApiManagement';
import type { SearchIndexWriter } from './types/Search';
import { SpecFetcher } from './ingestion/SpecFetcher';
import { MarkdownConversion } from './ingestion/MarkdownConversion';
import { WikiIngestion } from './ingestion/WikiIngestion';
import { SearchIngestion } from './ingestion/SearchIngestion';
import { MarkdownIndexer } from './indexers/MarkdownIndexer';
import { SwaggerIndexer } from './indexers/SwaggerIndexer';
import { WikiIndexer } from './indexers/WikiIndexer';
import { SearchPublisher } from './indexers/SearchPublisher';
import { buildIndexSchema, type VectorizerOptions } from './indexers/indexSchema';

// Used only when a search writer is injected without search settings
const DEFAULT_INDEX_NAME = 'apim-docs';

export type RunMode = 'full' | 'download-only' | 'convert-only' | 'index-only' | 'wiki-only';

export type RunSummary = {
  mode: RunMode;
  downloaded: number;
  converted: number;
  wikiDocuments: number;
  indexed: number;
  failures: Failure[];
  exitCode: 0 | 1;
};

export type PipelineStages = {
  fetcher?: SpecFetcher;
  conversion?: MarkdownConversion;
  wiki?: WikiIngestion;
  search?: SearchIngestion;
};

export type PipelineDeps = {
  apiProvider?: ApiManagementProvider;
  searchWriter?: SearchIndexWriter;
  extraction?: ExtractionProvider;
  embedding?: EmbeddingService;
  observability?: Observability;
  /** Replaces the HTTPS download of export links. */
  fetchSpec?: (url: string) => Promise<unknown>;
  now?: () => Date;
  cwd?: string;
};

export class Pipeline {
  constructor(
    private readonly stages: PipelineStages,
    private readonly toggle: FeatureToggle,
    private readonly logger: Logger,
    readonly observability: Observability,
  ) {}

  private required<T>(stage: StageName, value: T | undefined): T {
    if (value === undefined) {
      throw new StageError(stage, `The ${stage} stage is not configured`);
    }
    return value;
  }

  private async timed<T>(stage: StageName, run: () => Promise<BatchResult<T>>): Promise<BatchResult<T>> {
    const started = Date.now();
    this.logger.info({ stage }, 'Stage started');
    try {
      const result = await run();
      this.observability.recordStage(stage, {
        ms: Date.now() - started,
        succeeded: result.succeeded.length,
        failed: result.failed.length,
      });
      return result;
    } catch (error) {
      this.observability.recordError(stage, error);
      if (error instanceof StageError) throw error;
      throw new StageError(stage, ErrorHandler.describe(error), { cause: error });
    }
  }

  /**
   * Runs the stages selected by `mode` and the processing flags. A stage that
   * cannot run ends the run with exit code 1, except the wiki stage in a full
   * run, which is logged and skipped.
   */
  async run(mode: RunMode): Promise<RunSummary> {
    const full = mode === 'full';
    const summary: RunSummary = {
      mode,
      downloaded: 0,
      converted: 0,
      wikiDocuments: 0,
      indexed: 0,
      failures: [],
      exitCode: 0,
    };
    let downloaded: string[] = [];
    let converted: string[] = [];

    try {
      if (full || mode === 'download-only') {
        const fetcher = this.required('download', this.stages.fetcher);
        const result = await this.timed('download', () => fetcher.runOnce());
        downloaded = result.succeeded;
        summary.downloaded = downloaded.length;
        summary.failures.push(...result.failed);
      }

      if ((full && this.toggle.isConvertEnabled()) || mode === 'convert-only') {
        const conversion = this.required('convert', this.stages.conversion);
        const result = await this.timed('convert', () => conversion.runOnce(downloaded));
        converted = result.succeeded;
        summary.converted = converted.length;
        summary.failures.push(...result.failed);
      }

      if ((full && this.toggle.isWikiEnabled()) || mode === 'wiki-only') {
        try {
          const wiki = this.required('wiki', this.stages.wiki);
          const result = await this.timed('wiki', () => wiki.runOnce());
          summary.wikiDocuments = result.succeeded.length;
          summary.failures.push(...result.failed);
        } catch (error) {
          if (!full) throw error;
          this.logger.warn({ err: ErrorHandler.describe(error) }, 'Wiki stage failed; continuing');
        }
      }

      if ((full && this.toggle.isUploadEnabled()) || mode === 'index-only') {
        const search = this.required('index', this.stages.search);
        const result = await this.timed('index', () =>
          search.runOnce({ markdownFiles: converted, specFiles: downloaded }),
        );
        summary.indexed = result.succeeded.length;
        summary.failures.push(...result.failed);
      }
    } catch (error) {
      const stage = error instanceof StageError ? error.stage : undefined;
      this.logger.error({ stage, err: ErrorHandler.describe(error) }, 'Pipeline stage could not run');
      summary.exitCode = 1;
    }

    this.logger.info(
      {
        mode,
        downloaded: summary.downloaded,
        converted: summary.converted,
        wiki: summary.wikiDocuments,
        indexed: summary.indexed,
        failed: summary.failures.length,
      },
      `Pipeline finished: ${summary.downloaded} downloaded, ${summary.converted} converted, ` +
        `${summary.wikiDocuments} wiki documents, ${summary.indexed} indexed, ${summary.failures.length} failed`,
    );
    return summary;
  }
}

export function createPipelineFromConfig(settings: Settings, logger: Logger, deps: PipelineDeps = {}): Pipeline {
  const toggle = new FeatureToggle(settings.processing);
  const observability = deps.observability ?? new Observability();

  let credential: TokenCredential | undefined;
  const getCredential = () => (credential ??= createCredential(settings.credentials));

  const apiProvider =
    deps.apiProvider ?? (settings.apim ? new AzureApiManagementProvider(settings.apim, getCredential()) : undefined);

  const searchWriter =
    deps.searchWriter ??
    (settings.search
      ? new AzureSearchClient({
          endpoint: settings.search.endpoint,
          indexName: settings.search.indexName,
          apiVersion: settings.search.apiVersion,
          auth: settings.search.key
            ? { type: 'key', key: settings.search.key }
            : { type: 'bearer', credential: getCredential() },
        })
      : undefined);

  const stages: PipelineStages = {
    conversion: new MarkdownConversion(
      { swaggerDir: settings.output.swaggerDir, markdownDir: settings.output.markdownDir },
      logger.child({ stage: 'convert' }),
      observability,
    ),
  };

  if (apiProvider) {
    stages.fetcher = new SpecFetcher(
      apiProvider,
      {
        outputDir: settings.output.swaggerDir,
        filter: settings.apiFilter,
        download: deps.fetchSpec,
        now: deps.now,
      },
      logger.child({ stage: 'download' }),
      observability,
    );
  } else {
    logger.warn('API Management is not configured; the download stage is unavailable');
  }

  if (!searchWriter) {
    logger.warn('Azure AI Search is not configured; the wiki and index stages are unavailable');
    return new Pipeline(stages, toggle, logger, observability);
  }

  const indexLogger = logger.child({ stage: 'index' });
  const openai = settings.openai;
  let swaggerIndexer: SwaggerIndexer | undefined;
  let embedding: EmbeddingService | undefined;
  let vectorizer: VectorizerOptions | undefined;

  if (toggle.isLlmExtractionEnabled()) {
    const extraction =
      deps.extraction ??
      (openai
        ? new OpenAIExtractionProvider(
            { endpoint: openai.endpoint, apiKey: openai.apiKey, apiVersion: openai.apiVersion, model: openai.model },
            indexLogger,
            observability,
          )
        : undefined);

    // Settings validation guarantees the deployment and model once vector search is on
    if (toggle.isVectorSearchEnabled() && openai?.embeddingDeployment && openai.embeddingModel) {
      vectorizer = {
        resourceUri: openai.endpoint,
        deploymentId: openai.embeddingDeployment,
        modelName: openai.embeddingModel,
        apiKey: openai.apiKey,
      };
      embedding =
        deps.embedding ??
        new OpenAIEmbeddingService(
          {
            endpoint: openai.endpoint,
            apiKey: openai.apiKey,
            apiVersion: openai.apiVersion,
            deployment: openai.embeddingDeployment,
            model: openai.embeddingModel,
            dimension: openai.embeddingDimensions,
          },
          new InMemoryCacheService(),
          observability,
        );
    }

    if (extraction) {
      swaggerIndexer = new SwaggerIndexer(extraction, indexLogger, {
        llmDir: settings.output.llmDir,
        embedding,
        now: deps.now,
      });
    } else {
      indexLogger.warn('LLM extraction is enabled but Azure OpenAI is not configured; skipping it');
    }
  }

  const schema = buildIndexSchema({
    indexName: settings.search?.indexName ?? DEFAULT_INDEX_NAME,
    llmExtraction: swaggerIndexer !== undefined,
    vector: embedding && vectorizer ? { dimensions: embedding.dim(), vectorizer } : undefined,
  });

  const wikiLogger = logger.child({ stage: 'wiki' });
  stages.wiki = new WikiIngestion(
    new WikiFuser({ baseUrl: settings.wiki.wikiBaseUrl }, wikiLogger),
    new WikiIndexer(deps.now),
    new SearchPublisher(searchWriter, wikiLogger, observability),
    schema,
    wikiLogger,
    observability,
    settings.wiki.wikiDir,
  );

  stages.search = new SearchIngestion(
    new SearchPublisher(searchWriter, indexLogger, observability),
    schema,
    new MarkdownIndexer({ rootDir: deps.cwd, now: deps.now }),
    indexLogger,
    observability,
    { markdownDir: settings.output.markdownDir, swaggerDir: settings.output.swaggerDir },
    swaggerIndexer,
  );

  return new Pipeline(stages, toggle, logger, observability);
}
