import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from '../services/logger';
import { ErrorHandler, ExtractionError } from '../services/ErrorHandler';
import type { EmbeddingService } from '../services/ai/EmbeddingService';
import type { ExtractionProvider } from '../services/ai/ExtractionProvider';
import type { SearchDocument } from '../types/Search';
import { md5 } from '../utils/json';

export function versionFromFileName(fileName: string): string {
  return /v\d+(\.\d+)*/.exec(fileName)?.[0] ?? '';
}

/**
 * Indexes a specification through a model summary instead of its Markdown.
 * An empty extraction throws {@link ExtractionError}; the caller records it
 * as a fatal failure for that document.
 */
export class SwaggerIndexer {
  private readonly now: () => Date;

  constructor(
    private readonly extraction: ExtractionProvider,
    private readonly logger: Logger,
    private readonly options: { llmDir?: string; embedding?: EmbeddingService; now?: () => Date } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async index(specPath: string): Promise<SearchDocument> {
    const fileName = path.basename(specPath);
    this.logger.info({ file: fileName }, 'Processing specification for LLM indexing');

    const raw = await readFile(specPath, 'utf-8');
    const info = await this.extraction.extract(raw, fileName);

    if (this.options.llmDir) {
      const target = path.join(this.options.llmDir, fileName);
      try {
        await mkdir(this.options.llmDir, { recursive: true });
        await writeFile(target, JSON.stringify(info, null, 2), 'utf-8');
        this.logger.info({ file: target }, 'Saved extracted API information');
      } catch (error) {
        this.logger.error({ file: target, err: ErrorHandler.describe(error) }, 'Error saving extracted API information');
      }
    }

    if (!info.apiName) {
      throw new ExtractionError(fileName);
    }

    const apiContent = JSON.stringify(info);
    const doc: SearchDocument = {
      id: md5(raw),
      title: info.apiName,
      apiName: info.apiName,
      apiContent,
      apiVersion: versionFromFileName(fileName),
      documentType: 'API Documentation',
      lastUpdated: this.now().toISOString(),
      reference: specPath,
    };
    if (this.options.embedding) {
      doc.apiContentVector = await this.options.embedding.embed(apiContent);
    }
    return doc;
  }
}
