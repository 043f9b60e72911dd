/**
 * Chain Types
 *
 * A chain is one instance of a randomness network: fixed public key, fixed
 * genesis, fixed scheme. Its info never changes once published.
 */

export const SCHEME_IDS = {
  PEDERSEN_BLS_CHAINED: 'pedersen-bls-chained',
  PEDERSEN_BLS_UNCHAINED: 'pedersen-bls-unchained',
  BLS_UNCHAINED_ON_G1: 'bls-unchained-on-g1',
} as const

export type SchemeId = (typeof SCHEME_IDS)[keyof typeof SCHEME_IDS]

export interface ChainMetadata {
  readonly beaconId: string
}

export interface ChainInfo {
  /** 48 bytes (G1) or 96 bytes (G2) depending on the scheme */
  readonly publicKey: Uint8Array
  /** Seconds between rounds */
  readonly period: bigint
  readonly genesisTime: bigint
  /** Content hash published by the network, used as the chain identity */
  readonly hash: Uint8Array
  readonly groupHash: Uint8Array
  /**
   * Kept as a plain string: a chain may announce a scheme this library does
   * not know, in which case no beacon ever matches it.
   */
  readonly schemeId: string
  readonly metadata?: ChainMetadata
}

/**
 * Expected values a fetched chain info must match
 */
export interface ChainVerification {
  readonly hash?: Uint8Array
  readonly publicKey?: Uint8Array
}

export interface ChainOptions {
  /** Verify every fetched beacon against the chain info */
  readonly verifyBeacons: boolean
  /** Cache chain info on the client and let beacon responses be cached */
  readonly cache: boolean
  readonly verification?: ChainVerification
}
