export * from './src/beacon'
export * from './src/message'
export * from './src/scheme'
export * from './src/verify'
