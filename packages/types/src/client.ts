import type { RandomnessBeacon } from './beacon'
import type { ChainInfo, ChainOptions } from './chain'
import type { SafePromise } from './safe'

/**
 * Read access to one chain, whatever the transport
 */
export interface ChainClient {
  readonly options: ChainOptions
  chainInfo(): SafePromise<ChainInfo>
  latest(): SafePromise<RandomnessBeacon>
  get(round: bigint): SafePromise<RandomnessBeacon>
  getByUnixTime(unixTime: bigint): SafePromise<RandomnessBeacon>
}
