import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from '../services/logger';
import type { Observability } from '../services/Observability';
import { ErrorHandler, StageError, type BatchResult, type Result } from '../services/ErrorHandler';
import { parseSpecification, renderMarkdown } from '../renderer/MarkdownRenderer';

export const SPEC_EXTENSIONS = ['.json', '.yaml', '.yml'];

export async function listSpecificationFiles(dir: string): Promise<string[]> {
  const names = await readdir(dir);
  return names
    .filter(n => SPEC_EXTENSIONS.includes(path.extname(n).toLowerCase()))
    .sort()
    .map(n => path.join(dir, n));
}

/** `<base name>.md`; two specifications with the same base name overwrite each other. */
export function markdownFileName(specPath: string): string {
  return `${path.basename(specPath, path.extname(specPath))}.md`;
}

export class MarkdownConversion {
  constructor(
    private readonly options: { swaggerDir: string; markdownDir: string },
    private readonly logger: Logger,
    private readonly observability: Observability,
  ) {}

  async convertFile(specPath: string): Promise<string> {
    const fileName = path.basename(specPath);
    this.logger.info({ file: fileName }, 'Converting specification to Markdown');

    const spec = parseSpecification(await readFile(specPath, 'utf-8'), fileName);
    const markdownPath = path.join(this.options.markdownDir, markdownFileName(specPath));
    await writeFile(markdownPath, renderMarkdown(spec), 'utf-8');

    this.logger.info({ file: markdownPath }, 'Saved Markdown');
    return markdownPath;
  }

  /** Converts `files`, or every specification in the swagger directory when none are given. */
  async runOnce(files?: string[]): Promise<BatchResult<string>> {
    await mkdir(this.options.markdownDir, { recursive: true });

    let specs = files ?? [];
    if (specs.length === 0) {
      try {
        specs = await listSpecificationFiles(this.options.swaggerDir);
      } catch (error) {
        throw new StageError('convert', `Cannot read ${this.options.swaggerDir}: ${ErrorHandler.describe(error)}`, {
          cause: error,
        });
      }
    }

    const results: Result<string>[] = [];
    for (const spec of specs) {
      const result = await ErrorHandler.attempt(path.basename(spec), () => this.convertFile(spec));
      if (!result.ok) {
        this.logger.error({ file: result.error.item, err: result.error.reason }, 'Error converting specification');
      }
      results.push(result);
    }

    const batch = ErrorHandler.collect(results);
    this.observability.recordItem('convert', 'succeeded', batch.succeeded.length);
    this.observability.recordItem('convert', 'failed', batch.failed.length);
    this.logger.info({ converted: batch.succeeded.length, failed: batch.failed.length }, 'Conversion finished');
    return batch;
  }
}
