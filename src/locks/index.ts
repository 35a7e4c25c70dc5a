export * from './row-lock'
export * from './column-prefix-row-lock'
