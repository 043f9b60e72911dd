import {
  BeaconError,
  CLIENT_ERRORS,
  type ChainInfo,
  type Safe,
  safeError,
  safeResult,
} from '@randverify/types'

/**
 * Unix time at which `round` is published
 */
export function roundTime(info: ChainInfo, round: bigint): bigint {
  return info.genesisTime + round * info.period
}

/**
 * Round published at `unixTime`, rounding down to the period boundary
 */
export function roundAt(info: ChainInfo, unixTime: bigint): Safe<bigint> {
  if (unixTime < info.genesisTime) {
    return safeError(
      new BeaconError(
        CLIENT_ERRORS.TIME_BEFORE_GENESIS,
        `${unixTime} < ${info.genesisTime}`,
      ),
    )
  }
  return safeResult((unixTime - info.genesisTime) / info.period)
}
