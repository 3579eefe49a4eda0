export class FeatureToggle {
  constructor(
    private readonly flags: {
      convertToMarkdown?: boolean;
      processWiki?: boolean;
      uploadToSearch?: boolean;
      llmExtraction?: boolean;
      vectorSearch?: boolean;
    } = {},
  ) {}

  isConvertEnabled() {
    return !!this.flags.convertToMarkdown;
  }

  isWikiEnabled() {
    return !!this.flags.processWiki;
  }

  isUploadEnabled() {
    return !!this.flags.uploadToSearch;
  }

  isLlmExtractionEnabled() {
    return !!this.flags.llmExtraction;
  }

  // The vector field embeds the extracted apiContent, so it needs extraction too
  isVectorSearchEnabled() {
    return !!this.flags.vectorSearch && this.isLlmExtractionEnabled();
  }
}
