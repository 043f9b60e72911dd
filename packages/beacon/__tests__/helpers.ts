/**
 * Test chains signed in-process with placeholder secret keys
 */

import { bls12_381 } from '@noble/curves/bls12-381'
import { createChainInfo } from '@randverify/chain'
import { hexToBytes, NETWORK_DST, sha256 } from '@randverify/core'
import {
  type ChainInfo,
  type ChainedBeacon,
  SCHEME_IDS,
  type UnchainedBeacon,
} from '@randverify/types'
import {
  createChainedBeacon,
  createUnchainedBeacon,
} from '../src/beacon'
import { chainedMessage, unchainedMessage } from '../src/message'

export const SECRET_KEY_A = hexToBytes(`0x${'11'.repeat(32)}`)
export const SECRET_KEY_B = hexToBytes(`0x${'22'.repeat(32)}`)

function unwrap<T>([error, value]: [Error, undefined] | [undefined, T]): T {
  if (error) throw error
  return value
}

function testChainInfo(publicKey: Uint8Array, schemeId: string): ChainInfo {
  return createChainInfo({
    publicKey,
    period: 3n,
    genesisTime: 1700000000n,
    hash: sha256(publicKey),
    groupHash: new Uint8Array(32),
    schemeId,
  })
}

/**
 * Signatures on G2, public key on G1
 */
export function g2Signer(secretKey: Uint8Array) {
  const blss = bls12_381.longSignatures
  const publicKey = blss.getPublicKey(secretKey).toBytes()
  const sign = (message: Uint8Array) =>
    blss.sign(blss.hash(message, NETWORK_DST), secretKey).toBytes()
  return { publicKey, sign }
}

/**
 * Signatures on G1, public key on G2
 */
export function g1Signer(secretKey: Uint8Array) {
  const blss = bls12_381.shortSignatures
  const publicKey = blss.getPublicKey(secretKey).toBytes()
  const sign = (message: Uint8Array) =>
    blss.sign(blss.hash(message, NETWORK_DST), secretKey).toBytes()
  return { publicKey, sign }
}

export function chainedChain(secretKey: Uint8Array) {
  const signer = g2Signer(secretKey)
  const info = testChainInfo(signer.publicKey, SCHEME_IDS.PEDERSEN_BLS_CHAINED)

  const beaconAt = (
    round: bigint,
    previousSignature: Uint8Array,
  ): ChainedBeacon => {
    const signature = signer.sign(
      unwrap(chainedMessage(previousSignature, round)),
    )
    return createChainedBeacon({
      round,
      randomness: sha256(signature),
      signature,
      previousSignature,
    })
  }
  return { info, beaconAt }
}

export function unchainedChain(secretKey: Uint8Array) {
  const signer = g2Signer(secretKey)
  const info = testChainInfo(
    signer.publicKey,
    SCHEME_IDS.PEDERSEN_BLS_UNCHAINED,
  )

  const beaconAt = (round: bigint): UnchainedBeacon => {
    const signature = signer.sign(unwrap(unchainedMessage(round)))
    return createUnchainedBeacon({
      round,
      randomness: sha256(signature),
      signature,
    })
  }
  return { info, beaconAt }
}

export function unchainedOnG1Chain(secretKey: Uint8Array) {
  const signer = g1Signer(secretKey)
  const info = testChainInfo(signer.publicKey, SCHEME_IDS.BLS_UNCHAINED_ON_G1)

  const beaconAt = (round: bigint): UnchainedBeacon => {
    const signature = signer.sign(unwrap(unchainedMessage(round)))
    return createUnchainedBeacon({
      round,
      randomness: sha256(signature),
      signature,
    })
  }
  return { info, beaconAt }
}
