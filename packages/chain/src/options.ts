/**
 * Chain options: the verification policy a client applies to what it fetches.
 * The beacon verifier itself ignores these and always verifies fully.
 */

import { bytesEqual } from '@randverify/core'
import type {
  ChainInfo,
  ChainOptions,
  ChainVerification,
} from '@randverify/types'

export const DEFAULT_CHAIN_OPTIONS: ChainOptions = Object.freeze({
  verifyBeacons: true,
  cache: true,
})

export function createChainOptions(
  options: Partial<ChainOptions> = {},
): ChainOptions {
  return Object.freeze({
    verifyBeacons: options.verifyBeacons ?? DEFAULT_CHAIN_OPTIONS.verifyBeacons,
    cache: options.cache ?? DEFAULT_CHAIN_OPTIONS.cache,
    ...(options.verification
      ? { verification: createChainVerification(options.verification) }
      : {}),
  })
}

export function createChainVerification(
  verification: ChainVerification,
): ChainVerification {
  return Object.freeze({
    ...(verification.hash ? { hash: new Uint8Array(verification.hash) } : {}),
    ...(verification.publicKey
      ? { publicKey: new Uint8Array(verification.publicKey) }
      : {}),
  })
}

/**
 * Check a chain info against the expectations a caller pinned.
 * Absent expectations always pass.
 */
export function matchesVerification(
  info: ChainInfo,
  verification: ChainVerification | undefined,
): boolean {
  if (!verification) return true
  if (verification.hash && !bytesEqual(verification.hash, info.hash)) {
    return false
  }
  if (
    verification.publicKey &&
    !bytesEqual(verification.publicKey, info.publicKey)
  ) {
    return false
  }
  return true
}

export function verifyChainInfo(
  options: ChainOptions,
  info: ChainInfo,
): boolean {
  return matchesVerification(info, options.verification)
}
