import type { Logger } from '../services/logger';
import type { Observability } from '../services/Observability';
import { ErrorHandler, StageError, type BatchResult } from '../services/ErrorHandler';
import type { WikiFuser } from '../services/WikiFuser';
import type { WikiIndexer } from '../indexers/WikiIndexer';
import type { SearchPublisher } from '../indexers/SearchPublisher';
import type { SearchIndexDefinition } from '../types/Search';

export class WikiIngestion {
  constructor(
    private readonly fuser: WikiFuser,
    private readonly indexer: WikiIndexer,
    private readonly publisher: SearchPublisher,
    private readonly schema: SearchIndexDefinition,
    private readonly logger: Logger,
    private readonly observability: Observability,
    private readonly rootDir: string,
  ) {}

  /** Fuses the wiki tree into one document per service, ensures the index, uploads. */
  async runOnce(rootDir: string = this.rootDir): Promise<BatchResult<string>> {
    const bundles = await this.fuser.fuse(rootDir);
    if (bundles.length > 0 && !(await this.publisher.ensureIndex(this.schema))) {
      throw new StageError('wiki', `Failed to create search index ${this.schema.name}`);
    }
    const docs = bundles.map(b => this.indexer.index(b));
    const result = docs.length > 0 ? await this.publisher.publish(docs) : ErrorHandler.emptyBatch<string>();

    this.observability.recordItem('wiki', 'succeeded', result.succeeded.length);
    this.observability.recordItem('wiki', 'failed', result.failed.length);
    this.logger.info({ services: bundles.length, uploaded: result.succeeded.length }, 'Processed wiki documents');
    return result;
  }
}
