/**
 * Shared type definitions for the randomness beacon packages
 */

export * from './beacon'
export * from './chain'
export * from './client'
export * from './errors'
export * from './safe'
