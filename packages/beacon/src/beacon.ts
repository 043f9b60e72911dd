/**
 * Beacon construction and wire (de)serialisation
 *
 * `GET <base>/public/{round}` serves
 * `{ round, randomness, signature, previous_signature? }`; the presence of
 * `previous_signature` selects the chained variant.
 */

import {
  bytesEqual,
  toJsonInteger,
  toWireHex,
  wireHexSchema,
  z,
} from '@randverify/core'
import {
  type ApiBeacon,
  BEACON_ERRORS,
  BeaconError,
  type ChainedBeacon,
  type RandomnessBeacon,
  type Safe,
  type UnchainedBeacon,
  safeError,
  safeResult,
} from '@randverify/types'

interface BeaconInit {
  round: bigint
  randomness: Uint8Array
  signature: Uint8Array
  time?: bigint
}

export function createChainedBeacon(
  init: BeaconInit & { previousSignature: Uint8Array },
): ChainedBeacon {
  return Object.freeze({
    kind: 'chained' as const,
    round: init.round,
    randomness: new Uint8Array(init.randomness),
    signature: new Uint8Array(init.signature),
    previousSignature: new Uint8Array(init.previousSignature),
    ...(init.time !== undefined ? { time: init.time } : {}),
  })
}

export function createUnchainedBeacon(init: BeaconInit): UnchainedBeacon {
  return Object.freeze({
    kind: 'unchained' as const,
    round: init.round,
    randomness: new Uint8Array(init.randomness),
    signature: new Uint8Array(init.signature),
    ...(init.time !== undefined ? { time: init.time } : {}),
  })
}

/**
 * Copy of `beacon` carrying the unix time of its round
 */
export function withTime(
  beacon: RandomnessBeacon,
  time: bigint,
): RandomnessBeacon {
  return beacon.kind === 'chained'
    ? createChainedBeacon({ ...beacon, time })
    : createUnchainedBeacon({ ...beacon, time })
}

// JSON numbers past 2^53 arrive already rounded
export const apiBeaconSchema = z.object({
  round: z.number().int().nonnegative().safe(),
  randomness: wireHexSchema,
  signature: wireHexSchema,
  previous_signature: wireHexSchema.optional(),
})

/**
 * Parse an already decoded JSON value
 */
export function parseBeacon(json: unknown): Safe<RandomnessBeacon> {
  const result = apiBeaconSchema.safeParse(json)
  if (!result.success) {
    return safeError(
      new BeaconError(
        BEACON_ERRORS.MALFORMED_BEACON,
        result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; '),
      ),
    )
  }

  const { round, randomness, signature, previous_signature } = result.data
  if (previous_signature) {
    return safeResult(
      createChainedBeacon({
        round: BigInt(round),
        randomness,
        signature,
        previousSignature: previous_signature,
      }),
    )
  }
  return safeResult(
    createUnchainedBeacon({ round: BigInt(round), randomness, signature }),
  )
}

export function beaconFromJson(text: string): Safe<RandomnessBeacon> {
  try {
    return parseBeacon(JSON.parse(text))
  } catch (error) {
    return safeError(
      new BeaconError(
        BEACON_ERRORS.MALFORMED_BEACON,
        error instanceof Error ? error.message : String(error),
      ),
    )
  }
}

export function beaconToJson(beacon: RandomnessBeacon): Safe<ApiBeacon> {
  const round = toJsonInteger(beacon.round)
  if (round === undefined) {
    return safeError(
      new BeaconError(
        BEACON_ERRORS.INVALID_ROUND,
        `${beacon.round} does not fit a JSON number`,
      ),
    )
  }

  const json: ApiBeacon = {
    round,
    randomness: toWireHex(beacon.randomness),
    signature: toWireHex(beacon.signature),
  }
  if (beacon.kind === 'chained') {
    json.previous_signature = toWireHex(beacon.previousSignature)
  }
  return safeResult(json)
}

/**
 * Field-wise equality; `time` is not part of a beacon's identity
 */
export function beaconsEqual(a: RandomnessBeacon, b: RandomnessBeacon): boolean {
  if (a.kind !== b.kind) return false
  if (a.round !== b.round) return false
  if (!bytesEqual(a.randomness, b.randomness)) return false
  if (!bytesEqual(a.signature, b.signature)) return false
  if (a.kind === 'chained' && b.kind === 'chained') {
    return bytesEqual(a.previousSignature, b.previousSignature)
  }
  return true
}
