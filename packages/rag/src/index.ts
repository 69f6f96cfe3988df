export * from './cli'
export * from './clients/cohere'
export * from './clients/openai'
export * from './config'
export * from './flow'
export * from './guards'
export * from './nodes'
export * from './pipeline'
export * from './prompt'
export * from './serializer'
export * from './types'
export * from './utils/citations'
export * from './utils/document'
export * from './utils/html'
export * from './utils/splitter'
