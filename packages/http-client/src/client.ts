/**
 * HTTP chain client
 *
 * Reads `<base>/info` and `<base>/public/{round|latest}` from a node or relay
 * and applies the caller's ChainOptions: pinned hash / public key for the
 * chain info, beacon verification, chain info caching.
 */

import { beaconFromJson, verifyBeacon, withTime } from '@randverify/beacon'
import {
  chainInfoFromJson,
  createChainOptions,
  roundAt,
  roundTime,
  verifyChainInfo,
} from '@randverify/chain'
import { logger, toWireHex } from '@randverify/core'
import {
  BeaconError,
  CHAIN_ERRORS,
  CLIENT_ERRORS,
  type ChainClient,
  type ChainInfo,
  type ChainOptions,
  type RandomnessBeacon,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@randverify/types'
import { randomBytes } from '@noble/hashes/utils'
import axios, { type AxiosInstance, type AxiosProxyConfig } from 'axios'
import { bytesToBigInt } from 'viem'

export interface HttpChainClientConfig {
  /** Request timeout in milliseconds, 0 for none */
  timeoutMs?: number
  /** `false` ignores the proxy environment variables */
  proxy?: AxiosProxyConfig | false
}

export class HttpChainClient implements ChainClient {
  /**
   * Pending or settled chain info fetch. Set on a cold fetch, cleared only if
   * that fetch fails; concurrent callers share the same promise.
   */
  private cachedChainInfo: SafePromise<ChainInfo> | null = null

  private constructor(
    private readonly url: URL,
    readonly options: ChainOptions,
    private readonly http: AxiosInstance,
  ) {}

  static create(
    baseUrl: string,
    options: Partial<ChainOptions> = {},
    config: HttpChainClientConfig = {},
  ): Safe<HttpChainClient> {
    const [error, url] = parseBaseUrl(baseUrl)
    if (error) return safeError(error)

    const http = axios.create({
      timeout: config.timeoutMs ?? 0,
      ...(config.proxy !== undefined ? { proxy: config.proxy } : {}),
      responseType: 'text',
      // status is checked by hand so the body can be surfaced
      validateStatus: () => true,
    })
    return safeResult(
      new HttpChainClient(url, createChainOptions(options), http),
    )
  }

  get baseUrl(): string {
    return this.url.toString()
  }

  async chainInfo(): SafePromise<ChainInfo> {
    if (!this.options.cache) {
      return this.fetchChainInfo()
    }
    return this.cachedChainInfo ?? this.fillChainInfoCache()
  }

  async latest(): SafePromise<RandomnessBeacon> {
    return this.fetchBeacon('latest')
  }

  async get(round: bigint): SafePromise<RandomnessBeacon> {
    return this.fetchBeacon(round.toString())
  }

  async getByUnixTime(unixTime: bigint): SafePromise<RandomnessBeacon> {
    const [infoError, info] = await this.chainInfo()
    if (infoError) return safeError(infoError)

    const [roundError, round] = roundAt(info, unixTime)
    if (roundError) return safeError(roundError)

    return this.get(round)
  }

  private fillChainInfoCache(): SafePromise<ChainInfo> {
    const pending = this.fetchChainInfo().then((result) => {
      if (result[0] && this.cachedChainInfo === pending) {
        this.cachedChainInfo = null
      }
      return result
    })
    this.cachedChainInfo = pending
    return pending
  }

  private async fetchChainInfo(): SafePromise<ChainInfo> {
    const [error, body] = await this.getText(new URL('info', this.url))
    if (error) return safeError(error)

    const [parseError, info] = chainInfoFromJson(body)
    if (parseError) return safeError(parseError)

    if (!verifyChainInfo(this.options, info)) {
      logger.warn('Chain info does not match the pinned verification', {
        baseUrl: this.baseUrl,
        hash: toWireHex(info.hash),
      })
      return safeError(new BeaconError(CHAIN_ERRORS.CHAIN_INFO_INVALID))
    }
    return safeResult(info)
  }

  private beaconUrl(round: string): URL {
    const url = new URL(`public/${round}`, this.url)
    if (!this.options.cache) {
      url.search = bytesToBigInt(randomBytes(8)).toString()
    }
    return url
  }

  private async fetchBeacon(round: string): SafePromise<RandomnessBeacon> {
    const [error, body] = await this.getText(this.beaconUrl(round))
    if (error) return safeError(error)

    const [parseError, fetched] = beaconFromJson(body)
    if (parseError) return safeError(parseError)

    const [infoError, info] = await this.chainInfo()
    if (infoError) return safeError(infoError)

    const beacon = withTime(fetched, roundTime(info, fetched.round))
    if (!this.options.verifyBeacons) {
      return safeResult(beacon)
    }

    const [verifyError, valid] = verifyBeacon(beacon, info)
    if (verifyError) return safeError(verifyError)
    if (!valid) {
      logger.warn('Beacon does not validate', {
        baseUrl: this.baseUrl,
        round: beacon.round.toString(),
      })
      return safeError(new BeaconError(CLIENT_ERRORS.BEACON_DOES_NOT_VALIDATE))
    }
    return safeResult(beacon)
  }

  private async getText(url: URL): SafePromise<string> {
    logger.debug('GET', { url: url.toString() })
    const [error, response] = await safeTry(
      this.http.get<string>(url.toString()),
    )
    if (error) return safeError(error)

    if (response.status < 200 || response.status >= 300) {
      return safeError(
        new BeaconError(
          CLIENT_ERRORS.HTTP_STATUS,
          `${response.status} ${String(response.data)}`,
        ),
      )
    }
    return safeResult(String(response.data))
  }
}

/**
 * Parse the base URL and make sure its path ends with `/`, so that relative
 * joins (`info`, `public/...`) stay under it.
 */
export function parseBaseUrl(baseUrl: string): Safe<URL> {
  let url: URL
  try {
    url = new URL(baseUrl)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return safeError(
      new BeaconError(
        baseUrl.includes('://')
          ? CLIENT_ERRORS.INVALID_BASE_URL
          : CLIENT_ERRORS.MISSING_PROTOCOL,
        `${baseUrl} (${detail})`,
      ),
    )
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return safeError(
      new BeaconError(
        baseUrl.includes('://')
          ? CLIENT_ERRORS.INVALID_BASE_URL
          : CLIENT_ERRORS.MISSING_PROTOCOL,
        baseUrl,
      ),
    )
  }
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`
  }
  return safeResult(url)
}
