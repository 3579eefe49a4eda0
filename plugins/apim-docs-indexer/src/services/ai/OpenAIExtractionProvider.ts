import { AzureOpenAI } from 'openai';
import type { Logger } from '../logger';
import type { Observability } from '../Observability';
import { ErrorHandler } from '../ErrorHandler';
import { asString, isRecord } from '../../utils/json';
import type { ApiExtraction, ExtractionProvider, OperationSummary } from './ExtractionProvider';
import { truncateForExtraction } from './specTruncation';

/** Sends a system and a user message, resolves to the raw completion text. */
export type CompletionFn = (system: string, user: string) => Promise<string | null>;

export class OpenAIExtractionProvider implements ExtractionProvider {
  private readonly complete: CompletionFn;
  private openai?: AzureOpenAI;

  constructor(
    private readonly options: {
      endpoint: string;
      apiKey: string;
      apiVersion: string;
      model: string; // Azure deployment name
      temperature?: number;
    },
    private readonly logger: Logger,
    private readonly observability?: Observability,
    complete?: CompletionFn,
  ) {
    if (!options.apiKey) {
      throw new Error('Azure OpenAI API key is required');
    }
    this.complete = complete ?? ((system, user) => this.chat(system, user));
  }

  private client(): AzureOpenAI {
    this.openai ??= new AzureOpenAI({
      apiKey: this.options.apiKey,
      endpoint: this.options.endpoint,
      apiVersion: this.options.apiVersion,
      deployment: this.options.model,
    });
    return this.openai;
  }

  private async chat(system: string, user: string): Promise<string | null> {
    const completion = await this.client().chat.completions.create({
      model: this.options.model,
      temperature: this.options.temperature ?? 0.1,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
    });
    return completion.choices[0]?.message?.content ?? null;
  }

  async extract(specText: string, fileName: string): Promise<ApiExtraction> {
    this.logger.info({ file: fileName }, 'Extracting API information using LLM');

    const spec = truncateForExtraction(specText);
    if (spec.truncated) {
      this.logger.warn(
        { file: fileName, estimatedTokens: Math.round(spec.estimatedTokens) },
        'Specification too large; truncated before extraction',
      );
    }

    let content: string | null;
    try {
      content = await this.complete(this.getSystemPrompt(), this.getUserPrompt(spec.text));
    } catch (error) {
      this.observability?.recordAiUsage({ stage: 'extraction', success: false });
      this.logger.error({ file: fileName, err: ErrorHandler.describe(error) }, 'Error calling Azure OpenAI');
      return {};
    }

    const result = this.parseAIResponse(content ?? '', fileName);
    this.observability?.recordAiUsage({ stage: 'extraction', success: !!result.apiName });
    return result;
  }

  private getSystemPrompt(): string {
    return 'You are an AI assistant that extracts structured information from API specifications.';
  }

  getUserPrompt(specText: string): string {
    return `Analyze the following Swagger/OpenAPI definition (which may be truncated) and extract the following information:
1. The API name
2. The purpose and description of the API
3. The business context in which this API is used
4. A list of all operations with their names and descriptions

Format your response as a JSON object with the following structure:
{
  "apiName": "Name of the API",
  "apiPurpose": "Detailed purpose and description of the API",
  "apiDescription": "A brief description of the API",
  "apiContext": "The business context where this API is used",
  "operations": [
    { "operationName": "Name of operation 1", "operationDescription": "Description of operation 1" }
  ]
}

Only return the valid JSON object, nothing else.

Here's the Swagger definition (possibly truncated):
${specText}`;
  }

  parseAIResponse(content: string, fileName: string): ApiExtraction {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.error({ file: fileName, err: ErrorHandler.describe(error) }, 'Failed to parse LLM response as JSON');
      this.logger.debug({ raw: content.slice(0, 500) }, 'Raw LLM response');
      return {};
    }
    if (!isRecord(parsed)) return {};

    const operations: OperationSummary[] = Array.isArray(parsed.operations)
      ? parsed.operations.filter(isRecord).map(op => ({
          operationName: asString(op.operationName) ?? '',
          operationDescription: asString(op.operationDescription) ?? '',
        }))
      : [];

    return {
      apiName: asString(parsed.apiName) || undefined,
      apiPurpose: asString(parsed.apiPurpose),
      apiDescription: asString(parsed.apiDescription),
      apiContext: asString(parsed.apiContext),
      operations,
    };
  }
}
