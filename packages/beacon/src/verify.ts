/**
 * Beacon verification
 *
 * A beacon is valid for a chain when all of the following hold:
 * 1. its derived scheme is the chain's scheme
 * 2. its signature verifies over its message under the chain's public key
 * 3. its randomness is SHA256(signature)
 *
 * Failing any of these yields `[undefined, false]`. An error is returned only
 * when the inputs cannot be checked (lengths the curve cannot decode, a
 * previous signature that does not fill the message buffer).
 *
 * Pure and synchronous: no I/O, no shared state, safe to call concurrently
 * with chain info coming from a cache or a fresh fetch alike.
 */

import { blsVerify, bytesEqual, sha256 } from '@randverify/core'
import {
  type ChainInfo,
  type RandomnessBeacon,
  type Safe,
  safeError,
  safeResult,
} from '@randverify/types'
import { beaconMessage } from './message'
import { schemeIdOf } from './scheme'

/**
 * SHA256(signature) == randomness
 */
export function verifyRandomness(beacon: RandomnessBeacon): boolean {
  return bytesEqual(sha256(beacon.signature), beacon.randomness)
}

export function verifyBeacon(
  beacon: RandomnessBeacon,
  info: ChainInfo,
): Safe<boolean> {
  const schemeId = schemeIdOf(beacon)
  if (schemeId !== info.schemeId) {
    return safeResult(false)
  }

  const [messageError, message] = beaconMessage(beacon)
  if (messageError) return safeError(messageError)

  const [signatureError, signatureValid] = blsVerify(
    beacon.signature,
    message,
    info.publicKey,
    schemeId,
  )
  if (signatureError) return safeError(signatureError)

  const randomnessValid = verifyRandomness(beacon)

  return safeResult(signatureValid && randomnessValid)
}
