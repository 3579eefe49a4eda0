import { AzureOpenAI } from 'openai';
import type { CacheService } from '../CacheService';
import { InMemoryCacheService } from '../CacheService';
import type { Observability } from '../Observability';

export interface EmbeddingService {
  dim(): number;
  embed(text: string): Promise<number[]>;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private openai: AzureOpenAI;

  constructor(
    private readonly options: {
      endpoint: string;
      apiKey: string;
      apiVersion: string;
      deployment: string;
      model?: string;
      dimension?: number;
    },
    private readonly cache?: CacheService,
    private readonly observability?: Observability,
  ) {
    this.openai = new AzureOpenAI({
      apiKey: options.apiKey,
      endpoint: options.endpoint,
      apiVersion: options.apiVersion,
      deployment: options.deployment,
    });
  }

  dim(): number {
    return this.options.dimension ?? 1536; // text-embedding-3-small / ada-002
  }

  async embed(text: string): Promise<number[]> {
    // Identical specifications (same content hash) are embedded once per run
    const cacheKey = InMemoryCacheService.createEmbeddingKey(text);
    const cached = this.cache?.get<number[]>(cacheKey);
    if (cached) {
      return cached;
    }

    let embedding: number[] | undefined;
    try {
      const response = await this.openai.embeddings.create({
        model: this.options.model ?? this.options.deployment,
        input: text.slice(0, 8000), // stay under the model's input limit
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      this.observability?.recordAiUsage({ stage: 'embedding', success: false });
      throw error;
    }
    if (!embedding || !Array.isArray(embedding)) {
      this.observability?.recordAiUsage({ stage: 'embedding', success: false });
      throw new Error('Invalid embedding response from Azure OpenAI');
    }
    this.observability?.recordAiUsage({ stage: 'embedding', success: true });

    this.cache?.set(cacheKey, embedding);
    return embedding;
  }
}
