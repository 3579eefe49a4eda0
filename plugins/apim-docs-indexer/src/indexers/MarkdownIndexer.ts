import { readFile } from 'fs/promises';
import path from 'path';
import type { SearchDocument } from '../types/Search';
import { md5 } from '../utils/json';

const ISO_DATETIME = /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?/;

/** Normalises a `Last updated` value to ISO-8601 UTC; a zone-less stamp is read as UTC. */
export function normalizeTimestamp(value: string): string | undefined {
  const match = ISO_DATETIME.exec(value);
  if (!match) return undefined;
  const stamp = /Z|[+-]\d{2}:\d{2}$/.test(match[0]) ? match[0] : `${match[0]}Z`;
  const ms = Date.parse(stamp);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

export class MarkdownIndexer {
  private readonly rootDir: string;
  private readonly now: () => Date;

  constructor(options: { rootDir?: string; now?: () => Date } = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.now = options.now ?? (() => new Date());
  }

  /** The id is the MD5 of the file content, so unchanged files keep their id across runs. */
  documentFromContent(content: string, filePath: string): SearchDocument {
    const fileName = path.basename(filePath);
    const title = /^# (.+)$/m.exec(content)?.[1] ?? fileName;
    const version = /\*\*Version[:\s]*\*\*\s*(.+)/.exec(content)?.[1] ?? '';
    const updated = /\*Last updated: ([^*]+)\*/.exec(content)?.[1];

    return {
      id: md5(content),
      title,
      content,
      apiName: title,
      apiVersion: version,
      documentType: 'API Documentation',
      lastUpdated: (updated && normalizeTimestamp(updated)) || this.now().toISOString(),
      fileName,
      fileUrl: `/${path.relative(this.rootDir, filePath).split(path.sep).join('/')}`,
    };
  }

  async index(filePath: string): Promise<SearchDocument> {
    return this.documentFromContent(await readFile(filePath, 'utf-8'), filePath);
  }
}
