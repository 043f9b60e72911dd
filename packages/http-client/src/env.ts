import {
  createEnvSchema,
  loadEnvVariables,
  wireHexSchema,
  z,
  zBooleanString,
} from '@randverify/core'
import type { Safe } from '@randverify/types'
import { HttpChainClient } from './client'

export const clientEnvSchema = createEnvSchema({
  BEACON_BASE_URL: z.string().url(),
  BEACON_VERIFY: zBooleanString(true),
  BEACON_CACHE: zBooleanString(true),
  BEACON_CHAIN_HASH: wireHexSchema.optional(),
  BEACON_PUBLIC_KEY: wireHexSchema.optional(),
})

export type ClientEnv = z.infer<typeof clientEnvSchema>

/**
 * Load the client variables, reading `envPath` (or `.env`) first
 */
export function loadClientEnv(envPath?: string): ClientEnv {
  return loadEnvVariables(clientEnvSchema, envPath)
}

export function createClientFromEnv(env: ClientEnv): Safe<HttpChainClient> {
  const pinned = env.BEACON_CHAIN_HASH || env.BEACON_PUBLIC_KEY
  return HttpChainClient.create(env.BEACON_BASE_URL, {
    verifyBeacons: env.BEACON_VERIFY,
    cache: env.BEACON_CACHE,
    ...(pinned
      ? {
          verification: {
            hash: env.BEACON_CHAIN_HASH,
            publicKey: env.BEACON_PUBLIC_KEY,
          },
        }
      : {}),
  })
}
