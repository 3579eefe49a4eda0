import { readdir } from 'fs/promises';
import path from 'path';
import type { Logger } from '../services/logger';
import type { Observability } from '../services/Observability';
import { ErrorHandler, StageError, type BatchResult, type Result } from '../services/ErrorHandler';
import type { MarkdownIndexer } from '../indexers/MarkdownIndexer';
import type { SearchPublisher } from '../indexers/SearchPublisher';
import type { SwaggerIndexer } from '../indexers/SwaggerIndexer';
import type { SearchDocument, SearchIndexDefinition } from '../types/Search';
import { listSpecificationFiles } from './MarkdownConversion';

export type SearchIngestionSources = {
  markdownFiles?: string[];
  specFiles?: string[];
};

export class SearchIngestion {
  constructor(
    private readonly publisher: SearchPublisher,
    private readonly schema: SearchIndexDefinition,
    private readonly markdownIndexer: MarkdownIndexer,
    private readonly logger: Logger,
    private readonly observability: Observability,
    private readonly dirs: { markdownDir: string; swaggerDir: string },
    private readonly swaggerIndexer?: SwaggerIndexer,
  ) {}

  private async scan(dir: string, list: (d: string) => Promise<string[]>): Promise<string[]> {
    try {
      return await list(dir);
    } catch (error) {
      throw new StageError('index', `Cannot read ${dir}: ${ErrorHandler.describe(error)}`, { cause: error });
    }
  }

  private async buildDocuments(
    files: string[],
    toDocument: (file: string) => Promise<SearchDocument>,
  ): Promise<BatchResult<SearchDocument>> {
    const results: Result<SearchDocument>[] = [];
    for (const file of files) {
      const result = await ErrorHandler.attempt(path.basename(file), () => toDocument(file));
      if (!result.ok) {
        this.logger.error(
          { file: result.error.item, err: result.error.reason, fatal: !!result.error.fatal },
          'Error preparing document for indexing',
        );
      }
      results.push(result);
    }
    return ErrorHandler.collect(results);
  }

  /**
   * Indexes Markdown files and, when LLM extraction is wired in, the
   * specifications themselves. Missing lists fall back to a directory scan.
   */
  async runOnce(sources: SearchIngestionSources = {}): Promise<BatchResult<string>> {
    if (!(await this.publisher.ensureIndex(this.schema))) {
      throw new StageError('index', `Failed to create search index ${this.schema.name}`);
    }

    const markdownFiles = sources.markdownFiles?.length
      ? sources.markdownFiles
      : await this.scan(this.dirs.markdownDir, listMarkdownFiles);
    const prepared = await this.buildDocuments(markdownFiles, f => this.markdownIndexer.index(f));

    if (this.swaggerIndexer) {
      const indexer = this.swaggerIndexer;
      const specFiles = sources.specFiles?.length
        ? sources.specFiles
        : await this.scan(this.dirs.swaggerDir, listSpecificationFiles);
      const extracted = await this.buildDocuments(specFiles, f => indexer.index(f));
      prepared.succeeded.push(...extracted.succeeded);
      prepared.failed.push(...extracted.failed);
    }

    const published = await this.publisher.publish(prepared.succeeded);
    const result = ErrorHandler.merge<string>({ succeeded: [], failed: prepared.failed }, published);

    this.observability.recordItem('index', 'succeeded', result.succeeded.length);
    this.observability.recordItem('index', 'failed', result.failed.length);
    this.logger.info({ indexed: result.succeeded.length, failed: result.failed.length }, 'Indexing finished');
    return result;
  }
}

export async function listMarkdownFiles(dir: string): Promise<string[]> {
  const names = await readdir(dir);
  return names
    .filter(n => n.endsWith('.md'))
    .sort()
    .map(n => path.join(dir, n));
}
