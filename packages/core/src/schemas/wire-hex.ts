import { z } from 'zod'
import { fromWireHex } from '../utils/crypto'

/**
 * Hex string as served by the network, decoded to bytes
 */
export const wireHexSchema = z.string().transform((value, ctx) => {
  const [error, bytes] = fromWireHex(value)
  if (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message })
    return z.NEVER
  }
  return bytes
})
