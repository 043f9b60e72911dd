export * from './src/env'
export * from './src/logger'
export * from './src/schemas/wire-hex'
export * from './src/utils'
// Safe result helpers live in @randverify/types; re-exported for convenience
export {
  type Safe,
  type SafePromise,
  safeCall,
  safeError,
  safeResult,
  safeTry,
  toError,
} from '@randverify/types'
export * from './src/zod'
