import type { WikiServiceBundle } from '../services/WikiFuser';
import type { SearchDocument } from '../types/Search';
import { md5 } from '../utils/json';

export class WikiIndexer {
  constructor(private readonly now: () => Date = () => new Date()) {}

  // Keyed by service name: a re-run replaces the service's entry instead of adding one
  index(bundle: WikiServiceBundle): SearchDocument {
    return {
      id: `wiki-${md5(bundle.serviceName)}`,
      title: bundle.serviceName,
      content: bundle.content,
      apiName: bundle.serviceName,
      documentType: 'Wiki',
      lastUpdated: this.now().toISOString(),
      documentUrl: bundle.documentUrl,
      sourceType: 'Wiki',
    };
  }
}
