/**
 * Signed message construction
 *
 * chained:   SHA256(previous_signature[96] || round as u64 big-endian)
 * unchained: SHA256(round as u64 big-endian)
 *
 * Round 0 gets no special treatment: whatever previous signature a chained
 * beacon carries is what goes into the buffer.
 */

import { G2_POINT_LENGTH, sha256, uint64BE } from '@randverify/core'
import {
  BEACON_ERRORS,
  BeaconError,
  type RandomnessBeacon,
  type Safe,
  safeError,
  safeResult,
} from '@randverify/types'

const ROUND_LENGTH = 8

export function chainedMessage(
  previousSignature: Uint8Array,
  round: bigint,
): Safe<Uint8Array> {
  if (previousSignature.length !== G2_POINT_LENGTH) {
    return safeError(
      new BeaconError(
        BEACON_ERRORS.INVALID_PREVIOUS_SIGNATURE_LENGTH,
        `got ${previousSignature.length} bytes`,
      ),
    )
  }
  const [error, roundBytes] = uint64BE(round)
  if (error) return safeError(error)

  const buf = new Uint8Array(G2_POINT_LENGTH + ROUND_LENGTH)
  buf.set(previousSignature, 0)
  buf.set(roundBytes, G2_POINT_LENGTH)
  return safeResult(sha256(buf))
}

export function unchainedMessage(round: bigint): Safe<Uint8Array> {
  const [error, roundBytes] = uint64BE(round)
  if (error) return safeError(error)
  return safeResult(sha256(roundBytes))
}

/**
 * The 32-byte digest the beacon's signature is over
 */
export function beaconMessage(beacon: RandomnessBeacon): Safe<Uint8Array> {
  switch (beacon.kind) {
    case 'chained':
      return chainedMessage(beacon.previousSignature, beacon.round)
    case 'unchained':
      return unchainedMessage(beacon.round)
  }
}
