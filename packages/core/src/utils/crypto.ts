/**
 * Hashing and byte helpers
 */

import { sha256 as nobleSha256 } from '@noble/hashes/sha2'
import {
  BEACON_ERRORS,
  BeaconError,
  type Safe,
  safeError,
  safeResult,
} from '@randverify/types'
import {
  bytesToHex,
  concatBytes,
  type Hex,
  hexToBytes,
  isHex,
  numberToBytes,
} from 'viem'

export { bytesToHex, concatBytes, hexToBytes, numberToBytes, type Hex }

export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data)
}

/**
 * Constant-length comparison; returns early only on length mismatch
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  let diff = 0
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i]
  }
  return diff === 0
}

/**
 * Decode the network's hex encoding (no `0x` prefix, even length).
 * A `0x` prefix is tolerated.
 */
export function fromWireHex(value: string): Safe<Uint8Array> {
  const prefixed: string = value.startsWith('0x') ? value : `0x${value}`
  if (!isHex(prefixed, { strict: true }) || prefixed.length % 2 !== 0) {
    return safeError(new BeaconError(BEACON_ERRORS.INVALID_HEX, value))
  }
  return safeResult(hexToBytes(prefixed))
}

/**
 * Encode bytes the way the network serves them: lowercase, no prefix
 */
export function toWireHex(bytes: Uint8Array): string {
  return bytesToHex(bytes).slice(2)
}

/**
 * 8-byte big-endian encoding of an unsigned 64-bit integer
 */
export function uint64BE(value: bigint): Safe<Uint8Array> {
  if (value < 0n || value > 0xffffffffffffffffn) {
    return safeError(
      new BeaconError(BEACON_ERRORS.INVALID_ROUND, value.toString()),
    )
  }
  return safeResult(numberToBytes(value, { size: 8 }))
}

/**
 * `value` as a JSON number, or undefined when a double cannot hold it exactly
 */
export function toJsonInteger(value: bigint): number | undefined {
  if (
    value < BigInt(Number.MIN_SAFE_INTEGER) ||
    value > BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return undefined
  }
  return Number(value)
}
