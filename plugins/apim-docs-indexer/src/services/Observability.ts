import { writeFile } from 'fs/promises';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { StageName } from './ErrorHandler';

export type ItemOutcome = 'succeeded' | 'failed';

export class Observability {
  readonly registry: Registry;
  private readonly tracer = trace.getTracer('apim-docs');

  private readonly stageDuration: Histogram<string>;
  private readonly stageItems: Counter<string>;
  private readonly aiUsage: Counter<string>;
  private readonly errors: Counter<string>;
  private readonly indexed: Counter<string>;

  constructor(opts?: { registry?: Registry; defaultMetrics?: boolean }) {
    this.registry = opts?.registry ?? new Registry();
    if (opts?.defaultMetrics !== false) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.stageDuration = new Histogram({
      name: 'apim_docs_stage_duration_ms',
      help: 'Wall time per pipeline stage in milliseconds',
      labelNames: ['stage'] as const,
      buckets: [100, 500, 1000, 5000, 15000, 60000, 300000],
      registers: [this.registry],
    });
    this.stageItems = new Counter({
      name: 'apim_docs_stage_items_total',
      help: 'Items processed per stage and outcome',
      labelNames: ['stage', 'outcome'] as const,
      registers: [this.registry],
    });
    this.aiUsage = new Counter({
      name: 'apim_docs_ai_usage_total',
      help: 'Model calls and outcomes',
      labelNames: ['stage', 'outcome'] as const,
      registers: [this.registry],
    });
    this.errors = new Counter({
      name: 'apim_docs_errors_total',
      help: 'Stage-level errors',
      labelNames: ['stage'] as const,
      registers: [this.registry],
    });
    this.indexed = new Counter({
      name: 'apim_docs_indexed_total',
      help: 'Documents accepted by the search index, by document type',
      labelNames: ['document_type'] as const,
      registers: [this.registry],
    });
  }

  recordItem(stage: StageName, outcome: ItemOutcome, count = 1) {
    if (count > 0) this.stageItems.labels(stage, outcome).inc(count);
  }

  recordStage(stage: StageName, event: { ms: number; succeeded: number; failed: number }) {
    this.stageDuration.labels(stage).observe(event.ms);
    const span = this.tracer.startSpan(`pipeline.${stage}`);
    span.setAttributes({
      'stage.succeeded': event.succeeded,
      'stage.failed': event.failed,
      'stage.duration_ms': event.ms,
    });
    span.setStatus({ code: SpanStatusCode.OK });
    span.end();
  }

  recordError(stage: StageName, error: unknown) {
    const span = this.tracer.startSpan(`error.${stage}`);
    try {
      this.errors.labels(stage).inc();
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
    } finally {
      span.end();
    }
  }

  recordIndexing(event: { documentType: string; items: number }) {
    if (event.items > 0) this.indexed.labels(event.documentType).inc(event.items);
    const span = this.tracer.startSpan('indexing.batch');
    span.setAttributes({ 'index.document_type': event.documentType, 'index.items': event.items });
    span.end();
  }

  recordAiUsage(event: { stage: 'extraction' | 'embedding'; success: boolean }) {
    this.aiUsage.labels(event.stage, event.success ? 'success' : 'failure').inc();
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /** Prometheus text format, for a node_exporter textfile collector. */
  async writeMetrics(filePath: string): Promise<void> {
    await writeFile(filePath, await this.getMetrics(), 'utf-8');
  }
}
