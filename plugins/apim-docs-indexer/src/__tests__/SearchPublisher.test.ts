import { chunk, SearchPublisher } from '../indexers/SearchPublisher';
import { buildIndexSchema } from '../indexers/indexSchema';
import type { SearchDocument } from '../types/Search';
import { FakeSearchWriter, silentLogger, testObservability } from './helpers';

const doc = (n: number, documentType: SearchDocument['documentType'] = 'API Documentation'): SearchDocument => ({
  id: `doc-${n}`,
  apiName: `API ${n}`,
  documentType,
  lastUpdated: '2024-01-01T00:00:00.000Z',
});

describe('chunk', () => {
  it('splits into fixed-size batches with a short tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 10)).toEqual([]);
  });
});

describe('SearchPublisher', () => {
  it('uploads 23 documents in batches of 10, 10 and 3', async () => {
    const writer = new FakeSearchWriter();
    const publisher = new SearchPublisher(writer, silentLogger(), testObservability());

    const docs = Array.from({ length: 23 }, (_, i) => doc(i));
    const result = await publisher.publish(docs);

    expect(writer.batches.map(b => b.length)).toEqual([10, 10, 3]);
    expect(result.succeeded).toHaveLength(23);
    expect(result.failed).toEqual([]);
  });

  it('continues after a failed batch', async () => {
    const writer = new FakeSearchWriter();
    writer.failBatch = 1;
    const publisher = new SearchPublisher(writer, silentLogger(), testObservability());

    const result = await publisher.publish(Array.from({ length: 23 }, (_, i) => doc(i)));

    expect(writer.batches).toHaveLength(3);
    expect(result.succeeded).toHaveLength(13);
    expect(result.failed).toHaveLength(10);
    expect(result.failed[0]).toEqual({ item: 'doc-10', reason: 'service unavailable' });
  });

  it('reports documents the service refused', async () => {
    const writer = new FakeSearchWriter();
    writer.reject = d => (d.id === 'doc-1' ? 'invalid field' : undefined);
    const publisher = new SearchPublisher(writer, silentLogger(), testObservability());

    const result = await publisher.publish([doc(0), doc(1)]);

    expect(result.succeeded).toEqual(['doc-0']);
    expect(result.failed).toEqual([{ item: 'doc-1', reason: 'invalid field' }]);
  });

  it('counts accepted documents per document type', async () => {
    const observability = testObservability();
    const publisher = new SearchPublisher(new FakeSearchWriter(), silentLogger(), observability);

    await publisher.publish([doc(0), doc(1, 'Wiki'), doc(2, 'Wiki')]);

    const metrics = await observability.registry.getMetricsAsJSON();
    const indexed = metrics.find(m => m.name === 'apim_docs_indexed_total');
    expect(indexed?.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { document_type: 'API Documentation' }, value: 1 }),
        expect.objectContaining({ labels: { document_type: 'Wiki' }, value: 2 }),
      ]),
    );
  });

  it('reports false when the index cannot be created', async () => {
    const writer = new FakeSearchWriter();
    writer.failIndex = true;
    const publisher = new SearchPublisher(writer, silentLogger(), testObservability());

    await expect(publisher.ensureIndex(buildIndexSchema({ indexName: 'apis' }))).resolves.toBe(false);
  });
});
