import type { IndexField, SearchIndexDefinition } from '../types/Search';

export const VECTOR_PROFILE = 'api-vector-profile';
export const VECTOR_ALGORITHM = 'api-hnsw';
export const VECTORIZER = 'api-openai-vectorizer';
export const SEMANTIC_CONFIG = 'api-semantic-config';

export type VectorizerOptions = { resourceUri: string; deploymentId: string; modelName: string; apiKey: string };

export type IndexSchemaOptions = {
  indexName: string;
  llmExtraction?: boolean;
  vector?: { dimensions: number; vectorizer: VectorizerOptions };
};

const text = (name: IndexField['name'], extra: Partial<IndexField> = {}): IndexField => ({
  name,
  type: 'Edm.String',
  retrievable: true,
  ...extra,
});

/**
 * One index serves Markdown, wiki and (optionally) LLM-extracted documents.
 * The vector field is only declared together with LLM extraction.
 */
export function buildIndexSchema(options: IndexSchemaOptions): SearchIndexDefinition {
  const fields: IndexField[] = [
    text('id', { key: true, filterable: true }),
    text('title', { searchable: true, analyzer: 'en.microsoft' }),
    text('content', { searchable: true, analyzer: 'en.microsoft' }),
    text('apiName', { searchable: true, filterable: true, facetable: true }),
    text('apiVersion', { filterable: true, facetable: true }),
    text('documentType', { filterable: true, facetable: true }),
    { name: 'lastUpdated', type: 'Edm.DateTimeOffset', filterable: true, sortable: true, retrievable: true },
    text('fileName'),
    text('fileUrl'),
    text('documentUrl'),
    text('sourceType', { filterable: true }),
  ];

  const definition: SearchIndexDefinition = { name: options.indexName, fields };
  if (!options.llmExtraction) return definition;

  fields.push(text('apiContent', { searchable: true, analyzer: 'en.microsoft' }), text('reference'));
  definition.semantic = {
    configurations: [
      {
        name: SEMANTIC_CONFIG,
        prioritizedFields: {
          titleField: { fieldName: 'apiName' },
          prioritizedContentFields: [{ fieldName: 'apiContent' }],
        },
      },
    ],
  };

  if (options.vector) {
    const { vectorizer } = options.vector;
    fields.push({
      name: 'apiContentVector',
      type: 'Collection(Edm.Single)',
      searchable: true,
      retrievable: true,
      dimensions: options.vector.dimensions,
      vectorSearchProfile: VECTOR_PROFILE,
    });
    definition.vectorSearch = {
      algorithms: [{ name: VECTOR_ALGORITHM, kind: 'hnsw' }],
      profiles: [{ name: VECTOR_PROFILE, algorithm: VECTOR_ALGORITHM, vectorizer: VECTORIZER }],
      vectorizers: [{ name: VECTORIZER, kind: 'azureOpenAI', azureOpenAIParameters: vectorizer }],
    };
  }
  return definition;
}
