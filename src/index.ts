// Core exports
export * from './uniqueness'
export * from './locks'
export * from './storage'
export * from './timing/clock'

// Configuration exports
export * from './config'
export * from './bootstrap'

// Logging and metrics
export * from './observability'
