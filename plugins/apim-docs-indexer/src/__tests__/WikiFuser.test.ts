import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { StageError } from '../services/ErrorHandler';
import { buildDocumentUrl, inferServiceName, stripLeadingTitle, WikiFuser } from '../services/WikiFuser';
import { WikiIndexer } from '../indexers/WikiIndexer';
import { SearchPublisher } from '../indexers/SearchPublisher';
import { buildIndexSchema } from '../indexers/indexSchema';
import { WikiIngestion } from '../ingestion/WikiIngestion';
import { md5 } from '../utils/json';
import { FakeSearchWriter, makeTempDir, removeDir, silentLogger, testObservability } from './helpers';

async function writeWiki(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, 'utf-8');
  }
}

describe('inferServiceName', () => {
  it('uses the first directory, with dashes and underscores as spaces', () => {
    expect(inferServiceName('orders-service_v2/design.md', 'Service: Other')).toBe('orders service v2');
  });

  it('falls back to a Service line, then an API line, then the title, then the file name', () => {
    expect(inferServiceName('x.md', 'intro\nService: Billing \n')).toBe('Billing');
    expect(inferServiceName('x.md', 'API: Ledger\n')).toBe('Ledger');
    expect(inferServiceName('x.md', 'text\n# Heading\n')).toBe('Heading');
    expect(inferServiceName('x-design.md', 'plain text')).toBe('x-design');
  });
});

describe('stripLeadingTitle', () => {
  it('drops a first-line H1 only', () => {
    expect(stripLeadingTitle('# T\nbody')).toBe('body');
    expect(stripLeadingTitle('intro\n# T')).toBe('intro\n# T');
  });
});

describe('buildDocumentUrl', () => {
  it('returns the relative path when no base URL is set', () => {
    expect(buildDocumentUrl('a\\b.md', '')).toBe('a/b.md');
  });

  it('joins the base URL and the path without its extension', () => {
    expect(buildDocumentUrl('a/b.md', 'https://wiki.test/')).toBe('https://wiki.test/a/b');
    expect(buildDocumentUrl('a/b.md', 'https://wiki.test')).toBe('https://wiki.test/a/b');
  });
});

describe('WikiFuser', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeWiki(root, {
      'inventory-design.md': 'Service: Inventory\n# Title\nbody',
      'notes.md': '# Notes\nnot collected',
      'orders-service/design.md': '# Orders Design\nLine A\n',
      'orders-service/build.md': '# Build\nLine B\n',
      'payments_api/Design/overview.md': 'Payments overview',
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('groups design and build pages per service in first-seen order', async () => {
    const bundles = await new WikiFuser({ baseUrl: 'https://wiki.test/docs' }, silentLogger()).fuse(root);
    expect(bundles.map(b => b.serviceName)).toEqual(['Inventory', 'orders service', 'payments api']);
  });

  it('lists a page matching both design and build under each heading', async () => {
    await writeWiki(root, {
      'shared/build.md': 'Build only',
      'shared/design-build.md': '# Shared\nBoth phases',
    });

    const bundles = await new WikiFuser({ baseUrl: 'https://wiki.test/docs' }, silentLogger()).fuse(root);
    const shared = bundles.find(b => b.serviceName === 'shared');

    expect(shared?.design).toEqual([path.join(root, 'shared', 'design-build.md')]);
    expect(shared?.build).toEqual([path.join(root, 'shared', 'build.md'), path.join(root, 'shared', 'design-build.md')]);
    expect(shared?.content).toBe(
      '# shared\n\n## Design Documentation\n\nBoth phases\n\n## Build Documentation\n\nBuild only\n\nBoth phases\n\n',
    );
    expect(shared?.content.split('## Design Documentation')).toHaveLength(2);
    expect(shared?.content.split('## Build Documentation')).toHaveLength(2);
    expect(shared?.documentUrl).toBe('https://wiki.test/docs/shared/design-build');
  });

  it('fuses design before build under one heading per service', async () => {
    const bundles = await new WikiFuser({ baseUrl: 'https://wiki.test/docs' }, silentLogger()).fuse(root);
    const orders = bundles[1];
    expect(orders?.content).toBe(
      '# orders service\n\n## Design Documentation\n\nLine A\n\n\n## Build Documentation\n\nLine B\n\n\n',
    );
    expect(orders?.documentUrl).toBe('https://wiki.test/docs/orders-service/design');
    expect(bundles[0]?.content).toBe('# Inventory\n\n## Design Documentation\n\nService: Inventory\n# Title\nbody\n\n');
  });

  it('keeps the relative path as the URL without a base URL', async () => {
    const bundles = await new WikiFuser({}, silentLogger()).fuse(root);
    expect(bundles[2]?.documentUrl).toBe('payments_api/Design/overview.md');
  });

  it('fails the stage when the root is missing', async () => {
    await expect(new WikiFuser({}, silentLogger()).fuse(path.join(root, 'missing'))).rejects.toBeInstanceOf(StageError);
  });

  it('uploads one wiki document per service', async () => {
    const writer = new FakeSearchWriter();
    const logger = silentLogger();
    const observability = testObservability();
    const ingestion = new WikiIngestion(
      new WikiFuser({}, logger),
      new WikiIndexer(() => new Date('2024-01-02T03:04:05.000Z')),
      new SearchPublisher(writer, logger, observability),
      buildIndexSchema({ indexName: 'apis' }),
      logger,
      observability,
      root,
    );

    const result = await ingestion.runOnce();

    expect(result.succeeded).toEqual([
      `wiki-${md5('Inventory')}`,
      `wiki-${md5('orders service')}`,
      `wiki-${md5('payments api')}`,
    ]);
    expect(writer.definitions.map(d => d.name)).toEqual(['apis']);
    expect(writer.uploaded[0]).toMatchObject({
      title: 'Inventory',
      apiName: 'Inventory',
      documentType: 'Wiki',
      sourceType: 'Wiki',
      lastUpdated: '2024-01-02T03:04:05.000Z',
      documentUrl: 'inventory-design.md',
    });
  });
});
