export type DocumentType = 'API Documentation' | 'Wiki';

export type SearchDocument = {
  id: string;
  apiName: string;
  documentType: DocumentType;
  lastUpdated: string;
  title?: string;
  content?: string;
  apiVersion?: string;
  apiContent?: string;
  apiContentVector?: number[];
  fileName?: string;
  fileUrl?: string;
  documentUrl?: string;
  sourceType?: string;
  reference?: string;
};

export type IndexFieldType = 'Edm.String' | 'Edm.DateTimeOffset' | 'Collection(Edm.Single)';

export type IndexField = {
  name: keyof SearchDocument;
  type: IndexFieldType;
  key?: boolean;
  searchable?: boolean;
  filterable?: boolean;
  sortable?: boolean;
  facetable?: boolean;
  retrievable?: boolean;
  analyzer?: string;
  dimensions?: number;
  vectorSearchProfile?: string;
};

export type VectorizerDefinition = {
  name: string;
  kind: 'azureOpenAI';
  azureOpenAIParameters: {
    resourceUri: string;
    deploymentId: string;
    modelName: string;
    apiKey: string;
  };
};

export type SearchIndexDefinition = {
  name: string;
  fields: IndexField[];
  vectorSearch?: {
    algorithms: Array<{ name: string; kind: 'hnsw' }>;
    profiles: Array<{ name: string; algorithm: string; vectorizer: string }>;
    vectorizers: VectorizerDefinition[];
  };
  semantic?: {
    configurations: Array<{
      name: string;
      prioritizedFields: {
        titleField: { fieldName: string };
        prioritizedContentFields: Array<{ fieldName: string }>;
      };
    }>;
  };
};

export type IndexingResult = {
  key: string;
  succeeded: boolean;
  errorMessage?: string;
};

export interface SearchIndexWriter {
  createOrUpdateIndex(definition: SearchIndexDefinition): Promise<void>;
  uploadDocuments(documents: SearchDocument[]): Promise<IndexingResult[]>;
}
