/**
 * Configuration module
 * Provides YAML-based config with Zod validation and TypeScript defaults
 */

export * from './schema'
export * from './loader'
export * from './environment'
