/**
 * Scheme discrimination
 *
 * Beacons carry no scheme tag on the wire. The scheme is read off their
 * shape: a previous signature means chained; otherwise a 48-byte signature
 * means signatures on G1, anything else the pedersen unchained scheme.
 * Every caller must go through `schemeIdOf` so the rule lives in one place.
 */

import { G1_POINT_LENGTH } from '@randverify/core'
import {
  type ChainedBeacon,
  type RandomnessBeacon,
  SCHEME_IDS,
  type SchemeId,
} from '@randverify/types'

export function schemeIdOf(beacon: RandomnessBeacon): SchemeId {
  if (beacon.kind === 'chained') {
    return SCHEME_IDS.PEDERSEN_BLS_CHAINED
  }
  return beacon.signature.length === G1_POINT_LENGTH
    ? SCHEME_IDS.BLS_UNCHAINED_ON_G1
    : SCHEME_IDS.PEDERSEN_BLS_UNCHAINED
}

export function isChained(beacon: RandomnessBeacon): beacon is ChainedBeacon {
  return beacon.kind === 'chained'
}

export function isUnchained(beacon: RandomnessBeacon): boolean {
  return schemeIdOf(beacon).includes('unchained')
}

export function isSignatureOnG1(beacon: RandomnessBeacon): boolean {
  return schemeIdOf(beacon).includes('on-g1')
}
