/**
 * HTTP chain client against an in-process relay serving the mainnet vector
 */

import { fromWireHex } from '@randverify/core'
import { BeaconError, CHAIN_ERRORS, CLIENT_ERRORS } from '@randverify/types'
import { afterEach, describe, expect, it } from 'vitest'
import mainnet from './fixtures/mainnet.json'
import { HttpChainClient, parseBaseUrl } from '../src/client'
import { startServer, type TestServer } from './server'

const infoBody = JSON.stringify(mainnet.chainInfo)
const beaconBody = JSON.stringify(mainnet.beacon)
const invalidBeaconBody = JSON.stringify({ ...mainnet.beacon, round: 1 })

function bytes(hex: string): Uint8Array {
  const [error, value] = fromWireHex(hex)
  if (error) throw error
  return value
}

function errorCode(error: Error | undefined): string | undefined {
  return error instanceof BeaconError ? error.code : undefined
}

describe('HttpChainClient', () => {
  const servers: TestServer[] = []

  async function serve(
    routes: Parameters<typeof startServer>[0],
  ): Promise<TestServer> {
    const server = await startServer(routes)
    servers.push(server)
    return server
  }

  function client(
    server: TestServer,
    options: Parameters<typeof HttpChainClient.create>[1] = {},
  ): HttpChainClient {
    const [error, created] = HttpChainClient.create(server.url, options, {
      proxy: false,
    })
    if (error) throw error
    return created
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()))
  })

  describe('without cache', () => {
    it('refetches chain info on every call', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: beaconBody },
      })
      const noCache = client(server, { cache: false })

      const [error, info] = await noCache.chainInfo()
      expect(error).toBeUndefined()
      expect(info?.period).toBe(30n)
      await noCache.chainInfo()
      expect(server.hits.get('/info')).toBe(2)
    })

    it('busts caches on beacon requests', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: beaconBody },
      })
      const noCache = client(server, { cache: false })

      const [error, beacon] = await noCache.latest()
      expect(error).toBeUndefined()
      expect(beacon?.round).toBe(1000000n)
      expect(beacon?.time).toBe(1625431050n)
      await noCache.latest()

      expect(server.hits.get('/public/latest')).toBe(2)
      const [first, second] = server.queries.get('/public/latest') ?? []
      expect(first).toMatch(/^\?\d+$/)
      expect(second).toMatch(/^\?\d+$/)
    })
  })

  describe('with cache', () => {
    it('fetches chain info once', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: beaconBody },
      })
      const cached = client(server)

      const [, first] = await cached.chainInfo()
      const [, second] = await cached.chainInfo()
      await cached.latest()

      expect(second).toBe(first)
      expect(server.hits.get('/info')).toBe(1)
      expect(server.queries.get('/public/latest')).toEqual([''])
    })

    it('shares one fetch between concurrent callers', async () => {
      const server = await serve({ '/info': { body: infoBody } })
      const cached = client(server)

      const results = await Promise.all([
        cached.chainInfo(),
        cached.chainInfo(),
        cached.chainInfo(),
      ])

      expect(server.hits.get('/info')).toBe(1)
      expect(results[1][1]).toBe(results[0][1])
      expect(results[2][1]).toBe(results[0][1])
    })

    it('does not keep a failed fetch', async () => {
      let calls = 0
      const server = await serve({
        '/info': () => {
          calls += 1
          return calls === 1
            ? { status: 503, body: 'unavailable' }
            : { body: infoBody }
        },
      })
      const cached = client(server)

      const [firstError] = await cached.chainInfo()
      expect(firstError?.message).toBe('Request failed: 503 unavailable')

      const [secondError, info] = await cached.chainInfo()
      expect(secondError).toBeUndefined()
      expect(info?.genesisTime).toBe(1595431050n)
      expect(server.hits.get('/info')).toBe(2)
    })
  })

  describe('beacon verification', () => {
    it('returns verified beacons', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/1000000': { body: beaconBody },
      })

      const [error, beacon] = await client(server).get(1000000n)
      expect(error).toBeUndefined()
      expect(beacon?.kind).toBe('chained')
    })

    it('rejects a beacon that does not validate', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: invalidBeaconBody },
      })

      const [error, beacon] = await client(server).latest()
      expect(beacon).toBeUndefined()
      expect(errorCode(error)).toBe(CLIENT_ERRORS.BEACON_DOES_NOT_VALIDATE)
    })

    it('passes unverified beacons through when verification is off', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: invalidBeaconBody },
      })

      const [error, beacon] = await client(server, {
        verifyBeacons: false,
      }).latest()
      expect(error).toBeUndefined()
      expect(beacon?.round).toBe(1n)
      expect(beacon?.time).toBe(1595431080n)
    })

    it('reports malformed beacon bodies', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: '{"round":"latest"}' },
      })

      const [error] = await client(server).latest()
      expect(error?.message.startsWith('Malformed beacon: ')).toBe(true)
    })
  })

  describe('chain verification', () => {
    it('accepts chain info matching the pinned hash and key', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: beaconBody },
      })
      const pinned = client(server, {
        verification: {
          hash: bytes(mainnet.chainInfo.hash),
          publicKey: bytes(mainnet.chainInfo.public_key),
        },
      })

      const [error, beacon] = await pinned.latest()
      expect(error).toBeUndefined()
      expect(beacon?.time).toBe(1625431050n)
    })

    it('rejects chain info with another hash', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/latest': { body: beaconBody },
      })
      const pinned = client(server, {
        verification: { hash: new Uint8Array(32) },
      })

      const [error] = await pinned.latest()
      expect(errorCode(error)).toBe(CHAIN_ERRORS.CHAIN_INFO_INVALID)
      expect(error?.message).toBe('Chain info is invalid')
    })

    it('rejects chain info with another public key', async () => {
      const server = await serve({ '/info': { body: infoBody } })
      const pinned = client(server, {
        verification: { publicKey: new Uint8Array(48).fill(7) },
      })

      const [error] = await pinned.chainInfo()
      expect(errorCode(error)).toBe(CHAIN_ERRORS.CHAIN_INFO_INVALID)
    })
  })

  describe('getByUnixTime', () => {
    it('requests the round published at that time', async () => {
      const server = await serve({
        '/info': { body: infoBody },
        '/public/1000000': { body: beaconBody },
      })

      const [error, beacon] = await client(server).getByUnixTime(1625431065n)
      expect(error).toBeUndefined()
      expect(beacon?.round).toBe(1000000n)
      expect(server.hits.get('/public/1000000')).toBe(1)
    })

    it('errors before genesis without requesting a beacon', async () => {
      const server = await serve({ '/info': { body: infoBody } })

      const [error] = await client(server).getByUnixTime(0n)
      expect(errorCode(error)).toBe(CLIENT_ERRORS.TIME_BEFORE_GENESIS)
      expect([...server.hits.keys()]).toEqual(['/info'])
    })
  })

  describe('transport errors', () => {
    it('surfaces the response body of a failed request', async () => {
      const server = await serve({})

      const [error] = await client(server).chainInfo()
      expect(errorCode(error)).toBe(CLIENT_ERRORS.HTTP_STATUS)
      expect(error?.message).toBe('Request failed: 404 not found')
    })

    it('keeps requests under the base path', async () => {
      const server = await serve({
        '/chain-a/info': { body: infoBody },
        '/chain-a/public/latest': { body: beaconBody },
      })
      const [createError, nested] = HttpChainClient.create(
        `${server.url}/chain-a`,
        {},
        { proxy: false },
      )
      if (createError) throw createError

      const [error, beacon] = await nested.latest()
      expect(error).toBeUndefined()
      expect(beacon?.round).toBe(1000000n)
      expect(nested.baseUrl).toBe(`${server.url}/chain-a/`)
    })
  })
})

describe('parseBaseUrl', () => {
  it('appends a trailing slash', () => {
    const [, url] = parseBaseUrl('https://relay.example.com/chain')
    expect(url?.toString()).toBe('https://relay.example.com/chain/')
  })

  it('keeps an existing trailing slash', () => {
    const [, url] = parseBaseUrl('https://relay.example.com/')
    expect(url?.pathname).toBe('/')
  })

  it('hints at the protocol when it is missing', () => {
    const [error] = parseBaseUrl('relay.example.com')
    expect(errorCode(error)).toBe(CLIENT_ERRORS.MISSING_PROTOCOL)
    expect(
      error?.message.startsWith(
        'Missing protocol, you might need to add "https://" to the provided URL: relay.example.com',
      ),
    ).toBe(true)
  })

  it('treats host:port without protocol as missing the protocol', () => {
    const [error] = parseBaseUrl('localhost:8080')
    expect(errorCode(error)).toBe(CLIENT_ERRORS.MISSING_PROTOCOL)
  })

  it('rejects other protocols', () => {
    const [error] = parseBaseUrl('ftp://relay.example.com')
    expect(errorCode(error)).toBe(CLIENT_ERRORS.INVALID_BASE_URL)
  })
})
