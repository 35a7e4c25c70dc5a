export * from './errors'
export * from './options'
export * from './probe-token'
export * from './uniqueness-constraint'
export * from './multi-row-uniqueness-constraint'
