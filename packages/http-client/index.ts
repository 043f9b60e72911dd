export * from './src/client'
export * from './src/env'
