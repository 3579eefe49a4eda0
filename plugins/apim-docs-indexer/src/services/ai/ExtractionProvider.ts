export type OperationSummary = {
  operationName: string;
  operationDescription: string;
};

export type ApiExtraction = {
  apiName?: string;
  apiPurpose?: string;
  apiDescription?: string;
  apiContext?: string; // business context the API serves
  operations?: OperationSummary[];
};

export interface ExtractionProvider {
  /** Resolves to `{}` when the model call or its JSON fails; callers decide what that means. */
  extract(specText: string, fileName: string): Promise<ApiExtraction>;
}
