import { readdir, readFile, stat } from 'fs/promises';
import path from 'path';
import type { Logger } from './logger';
import { ErrorHandler, StageError } from './ErrorHandler';

export type WikiServiceBundle = {
  serviceName: string;
  design: string[];
  build: string[];
  content: string;
  documentUrl: string;
};

type Sources = { design: string[]; build: string[] };

async function walkMarkdown(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkMarkdown(full)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.md')) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Grouping key for a wiki file: the first directory under the root (with
 * `-`/`_` turned into spaces), else a `Service:`/`API:` line, else the first
 * H1, else the file name. Keys are compared as-is, so case and punctuation
 * differences produce separate services.
 */
export function inferServiceName(relativePath: string, content: string): string {
  const segments = relativePath.split(/[\\/]/).filter(Boolean);
  if (segments.length > 1) {
    return segments[0].replace(/[-_]/g, ' ');
  }

  const service = /[Ss]ervice:\s*([^\n]+)/.exec(content);
  if (service) return service[1].trim();

  const api = /[Aa][Pp][Ii]:\s*([^\n]+)/.exec(content);
  if (api) return api[1].trim();

  const title = /^#\s+(.+)$/m.exec(content);
  if (title) return title[1].trim();

  return path.basename(relativePath, path.extname(relativePath));
}

export function stripLeadingTitle(content: string): string {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[0].startsWith('# ')) {
    lines.shift();
  }
  return lines.join('\n');
}

/**
 * `<base>/<path without .md>` with forward slashes; without a base URL the
 * relative file path is returned unchanged apart from separators.
 */
export function buildDocumentUrl(relativePath: string, baseUrl: string): string {
  const normalized = relativePath.replace(/\\/g, '/');
  if (!baseUrl) return normalized;
  const withoutExt = normalized.endsWith('.md') ? normalized.slice(0, -3) : normalized;
  return baseUrl.endsWith('/') ? baseUrl + withoutExt : `${baseUrl}/${withoutExt}`;
}

export class WikiFuser {
  constructor(
    private readonly options: { baseUrl?: string },
    private readonly logger: Logger,
  ) {}

  async fuse(rootDir: string): Promise<WikiServiceBundle[]> {
    try {
      if (!(await stat(rootDir)).isDirectory()) throw new Error('not a directory');
    } catch (error) {
      throw new StageError('wiki', `Wiki directory not found: ${rootDir} (${ErrorHandler.describe(error)})`, {
        cause: error,
      });
    }
    this.logger.info({ rootDir }, 'Processing wiki documents');

    const services = new Map<string, Sources>();
    const contents = new Map<string, string>();

    for (const file of await walkMarkdown(rootDir)) {
      const rel = path.relative(rootDir, file);
      const lower = rel.toLowerCase();
      const isDesign = lower.includes('design');
      const isBuild = lower.includes('build');
      if (!isDesign && !isBuild) continue;

      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (error) {
        this.logger.error({ file: rel, err: ErrorHandler.describe(error) }, 'Could not read wiki file; skipping');
        continue;
      }
      contents.set(file, content);

      const name = inferServiceName(rel, content);
      const sources = services.get(name) ?? { design: [], build: [] };
      if (isDesign) sources.design.push(file);
      if (isBuild) sources.build.push(file);
      services.set(name, sources);
    }

    const bundles: WikiServiceBundle[] = [];
    for (const [serviceName, sources] of services) {
      this.logger.debug({ service: serviceName }, 'Combining wiki documents');
      bundles.push(this.combine(rootDir, serviceName, sources, contents));
    }
    return bundles;
  }

  private combine(rootDir: string, serviceName: string, sources: Sources, contents: Map<string, string>): WikiServiceBundle {
    let content = `# ${serviceName}\n\n`;
    const sections: Array<[string, string[]]> = [
      ['## Design Documentation', sources.design],
      ['## Build Documentation', sources.build],
    ];
    for (const [heading, files] of sections) {
      if (files.length === 0) continue;
      content += `${heading}\n\n`;
      for (const file of files) {
        content += `${stripLeadingTitle(contents.get(file) ?? '')}\n\n`;
      }
    }

    const first = sources.design[0] ?? sources.build[0];
    const documentUrl = first ? buildDocumentUrl(path.relative(rootDir, first), this.options.baseUrl ?? '') : '';

    return { serviceName, design: sources.design, build: sources.build, content, documentUrl };
  }
}
