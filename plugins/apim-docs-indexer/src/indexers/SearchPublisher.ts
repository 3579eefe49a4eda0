import type { Logger } from '../services/logger';
import type { Observability } from '../services/Observability';
import { ErrorHandler, type BatchResult } from '../services/ErrorHandler';
import type { SearchDocument, SearchIndexDefinition, SearchIndexWriter } from '../types/Search';

export const BATCH_SIZE = 10;

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class SearchPublisher {
  constructor(
    private readonly writer: SearchIndexWriter,
    private readonly logger: Logger,
    private readonly observability: Observability,
    private readonly batchSize: number = BATCH_SIZE,
  ) {}

  /** Create-or-update; `false` when the service rejects the definition or cannot be reached. */
  async ensureIndex(schema: SearchIndexDefinition): Promise<boolean> {
    this.logger.info({ index: schema.name }, 'Creating or updating search index');
    try {
      await this.writer.createOrUpdateIndex(schema);
      this.logger.info({ index: schema.name }, 'Search index ready');
      return true;
    } catch (error) {
      this.logger.error({ index: schema.name, err: ErrorHandler.describe(error) }, 'Error creating search index');
      return false;
    }
  }

  /**
   * Uploads in batches. A failed batch marks its documents failed and the
   * next batch still goes out. Succeeded holds the ids the service accepted.
   */
  async publish(documents: SearchDocument[]): Promise<BatchResult<string>> {
    const result = ErrorHandler.emptyBatch<string>();

    for (const batch of chunk(documents, this.batchSize)) {
      try {
        const statuses = await this.writer.uploadDocuments(batch);
        const byKey = new Map(statuses.map(s => [s.key, s]));
        for (const doc of batch) {
          const status = byKey.get(doc.id);
          if (status?.succeeded) {
            result.succeeded.push(doc.id);
          } else {
            result.failed.push({ item: doc.id, reason: status?.errorMessage ?? 'not acknowledged by the search service' });
          }
        }
        this.logger.info({ size: batch.length }, 'Indexed batch of documents');
      } catch (error) {
        const reason = ErrorHandler.describe(error);
        this.logger.error({ size: batch.length, err: reason }, 'Error uploading batch to search index');
        result.failed.push(...batch.map(doc => ({ item: doc.id, reason })));
      }
    }

    const accepted = new Set(result.succeeded);
    const byType = new Map<string, number>();
    for (const doc of documents) {
      if (accepted.has(doc.id)) byType.set(doc.documentType, (byType.get(doc.documentType) ?? 0) + 1);
    }
    for (const [documentType, items] of byType) {
      this.observability.recordIndexing({ documentType, items });
    }
    return result;
  }
}
