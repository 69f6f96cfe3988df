export * from './CohereRankerNode'
export * from './DocumentSplitterNode'
export * from './HtmlToDocumentNode'
export * from './LinkContentFetcherNode'
export * from './OpenAIGeneratorNode'
export * from './PromptBuilderNode'
