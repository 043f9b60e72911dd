/**
 * Chain info parsing and serialisation
 *
 * Wire format of `GET <base>/info`:
 * `{ public_key, period, genesis_time, hash, groupHash, schemeID, metadata? }`
 * with hex fields carried without a `0x` prefix.
 */

import { toJsonInteger, toWireHex, wireHexSchema, z } from '@randverify/core'
import {
  CHAIN_ERRORS,
  type ChainInfo,
  SCHEME_IDS,
  BeaconError,
  type Safe,
  safeError,
  safeResult,
} from '@randverify/types'

export const chainInfoJsonSchema = z.object({
  public_key: z.string(),
  period: z.number().int().positive().safe(),
  genesis_time: z.number().int().nonnegative().safe(),
  hash: z.string(),
  groupHash: z.string(),
  // nodes predating scheme selection only ran chained networks
  schemeID: z.string().default(SCHEME_IDS.PEDERSEN_BLS_CHAINED),
  metadata: z.object({ beaconID: z.string() }).optional(),
})

export type ChainInfoJson = z.input<typeof chainInfoJsonSchema>

const chainInfoSchema = chainInfoJsonSchema
  .extend({
    public_key: wireHexSchema,
    hash: wireHexSchema,
    groupHash: wireHexSchema,
  })
  .transform(
    (json): ChainInfo =>
      createChainInfo({
        publicKey: json.public_key,
        period: BigInt(json.period),
        genesisTime: BigInt(json.genesis_time),
        hash: json.hash,
        groupHash: json.groupHash,
        schemeId: json.schemeID,
        metadata: json.metadata
          ? { beaconId: json.metadata.beaconID }
          : undefined,
      }),
  )

/**
 * Freeze a chain info. Byte arrays are copied so callers cannot mutate the
 * instance through buffers they still hold.
 */
export function createChainInfo(fields: ChainInfo): ChainInfo {
  return Object.freeze({
    publicKey: new Uint8Array(fields.publicKey),
    period: fields.period,
    genesisTime: fields.genesisTime,
    hash: new Uint8Array(fields.hash),
    groupHash: new Uint8Array(fields.groupHash),
    schemeId: fields.schemeId,
    ...(fields.metadata
      ? { metadata: Object.freeze({ beaconId: fields.metadata.beaconId }) }
      : {}),
  })
}

/**
 * Parse an already decoded JSON value
 */
export function parseChainInfo(json: unknown): Safe<ChainInfo> {
  const result = chainInfoSchema.safeParse(json)
  if (!result.success) {
    return safeError(
      new BeaconError(
        CHAIN_ERRORS.MALFORMED_CHAIN_INFO,
        result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; '),
      ),
    )
  }
  return safeResult(result.data)
}

export function chainInfoFromJson(text: string): Safe<ChainInfo> {
  try {
    return parseChainInfo(JSON.parse(text))
  } catch (error) {
    return safeError(
      new BeaconError(
        CHAIN_ERRORS.MALFORMED_CHAIN_INFO,
        error instanceof Error ? error.message : String(error),
      ),
    )
  }
}

export function chainInfoToJson(info: ChainInfo): Safe<ChainInfoJson> {
  const period = toJsonInteger(info.period)
  const genesisTime = toJsonInteger(info.genesisTime)
  if (period === undefined || genesisTime === undefined) {
    return safeError(
      new BeaconError(
        CHAIN_ERRORS.MALFORMED_CHAIN_INFO,
        `period ${info.period} or genesis time ${info.genesisTime} does not fit a JSON number`,
      ),
    )
  }

  return safeResult({
    public_key: toWireHex(info.publicKey),
    period,
    genesis_time: genesisTime,
    hash: toWireHex(info.hash),
    groupHash: toWireHex(info.groupHash),
    schemeID: info.schemeId,
    ...(info.metadata ? { metadata: { beaconID: info.metadata.beaconId } } : {}),
  })
}
