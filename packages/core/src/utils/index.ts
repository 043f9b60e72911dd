/**
 * Utility exports for the core package
 */

export * from './bls'
export * from './crypto'
