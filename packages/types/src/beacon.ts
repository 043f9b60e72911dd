/**
 * Beacon Types
 *
 * One published round of randomness together with its BLS proof.
 */

interface BeaconFields {
  readonly round: bigint
  /** SHA-256 of the signature, 32 bytes */
  readonly randomness: Uint8Array
  /** 96 bytes when signed on G2, 48 bytes when signed on G1 */
  readonly signature: Uint8Array
  /** Unix time of the round, known once the beacon is tied to a chain */
  readonly time?: bigint
}

/**
 * Each signature covers the previous round's signature and the round number
 */
export interface ChainedBeacon extends BeaconFields {
  readonly kind: 'chained'
  /** 96 bytes */
  readonly previousSignature: Uint8Array
}

/**
 * Each signature covers the round number only
 */
export interface UnchainedBeacon extends BeaconFields {
  readonly kind: 'unchained'
}

export type RandomnessBeacon = ChainedBeacon | UnchainedBeacon

/**
 * JSON shape served by `GET /public/{round}`
 */
export interface ApiBeacon {
  round: number
  randomness: string
  signature: string
  previous_signature?: string
}
