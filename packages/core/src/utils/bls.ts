/**
 * BLS12-381 signature verification for the network's schemes
 *
 * Chained and pedersen unchained chains keep the public key on G1 and sign on
 * G2. `bls-unchained-on-g1` swaps the groups but still hashes to the curve
 * with the G2 domain separation tag, as the network does.
 */

import { bls12_381 } from '@noble/curves/bls12-381'
import {
  BLS_ERRORS,
  BeaconError,
  SCHEME_IDS,
  type Safe,
  safeCall,
  safeError,
  safeResult,
} from '@randverify/types'

export const NETWORK_DST = 'BLS_SIG_BLS12381G2_XMD:SHA-256_SSWU_RO_NUL_'

export const G1_POINT_LENGTH = 48
export const G2_POINT_LENGTH = 96

interface SchemeGroups {
  publicKeyLength: number
  signatureLength: number
  signaturesOnG1: boolean
}

const SCHEME_GROUPS: Record<string, SchemeGroups> = {
  [SCHEME_IDS.PEDERSEN_BLS_CHAINED]: {
    publicKeyLength: G1_POINT_LENGTH,
    signatureLength: G2_POINT_LENGTH,
    signaturesOnG1: false,
  },
  [SCHEME_IDS.PEDERSEN_BLS_UNCHAINED]: {
    publicKeyLength: G1_POINT_LENGTH,
    signatureLength: G2_POINT_LENGTH,
    signaturesOnG1: false,
  },
  [SCHEME_IDS.BLS_UNCHAINED_ON_G1]: {
    publicKeyLength: G2_POINT_LENGTH,
    signatureLength: G1_POINT_LENGTH,
    signaturesOnG1: true,
  },
}

/**
 * Verify `signature` over `message` under `publicKey` for the given scheme.
 *
 * Returns `[undefined, false]` for a well-formed signature that does not
 * verify, and an error when the inputs cannot be checked at all: unknown
 * scheme, wrong byte lengths, or bytes that are not curve points.
 */
export function blsVerify(
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array,
  schemeId: string,
): Safe<boolean> {
  const groups = SCHEME_GROUPS[schemeId]
  if (!groups) {
    return safeError(new BeaconError(BLS_ERRORS.UNSUPPORTED_SCHEME, schemeId))
  }
  if (publicKey.length !== groups.publicKeyLength) {
    return safeError(
      new BeaconError(
        BLS_ERRORS.INVALID_PUBLIC_KEY_LENGTH,
        `expected ${groups.publicKeyLength} bytes, got ${publicKey.length}`,
      ),
    )
  }
  if (signature.length !== groups.signatureLength) {
    return safeError(
      new BeaconError(
        BLS_ERRORS.INVALID_SIGNATURE_LENGTH,
        `expected ${groups.signatureLength} bytes, got ${signature.length}`,
      ),
    )
  }

  const [error, isValid] = safeCall(() => {
    if (groups.signaturesOnG1) {
      const blss = bls12_381.shortSignatures
      return blss.verify(signature, blss.hash(message, NETWORK_DST), publicKey)
    }
    const blss = bls12_381.longSignatures
    return blss.verify(signature, blss.hash(message, NETWORK_DST), publicKey)
  })
  if (error) {
    return safeError(
      new BeaconError(BLS_ERRORS.POINT_DECODING_FAILED, error.message),
    )
  }
  return safeResult(isValid)
}
