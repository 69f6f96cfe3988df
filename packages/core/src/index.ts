export * from './analysis'
export * from './context'
export * from './errors'
export * from './flow'
export * from './linter'
export * from './logger'
export * from './node'
export * from './runtime'
export * from './serializer'
export * from './types'
