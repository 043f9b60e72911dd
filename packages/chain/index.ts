export * from './src/chain-info'
export * from './src/options'
export * from './src/time'
