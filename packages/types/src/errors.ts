/**
 * Error strings for operational failures.
 *
 * A beacon that simply fails verification is never reported through these:
 * verification yields `false`. These cover inputs that cannot be verified at
 * all, and transport or policy failures in the HTTP client.
 */

export const BEACON_ERRORS = {
  INVALID_PREVIOUS_SIGNATURE_LENGTH: 'invalid_previous_signature_length',
  INVALID_ROUND: 'invalid_round',
  INVALID_HEX: 'invalid_hex',
  MALFORMED_BEACON: 'malformed_beacon',
} as const

export const BLS_ERRORS = {
  INVALID_PUBLIC_KEY_LENGTH: 'invalid_public_key_length',
  INVALID_SIGNATURE_LENGTH: 'invalid_signature_length',
  UNSUPPORTED_SCHEME: 'unsupported_scheme',
  POINT_DECODING_FAILED: 'point_decoding_failed',
} as const

export const CHAIN_ERRORS = {
  MALFORMED_CHAIN_INFO: 'malformed_chain_info',
  CHAIN_INFO_INVALID: 'chain_info_invalid',
} as const

export const CLIENT_ERRORS = {
  INVALID_BASE_URL: 'invalid_base_url',
  MISSING_PROTOCOL: 'missing_protocol',
  HTTP_STATUS: 'http_status',
  BEACON_DOES_NOT_VALIDATE: 'beacon_does_not_validate',
  TIME_BEFORE_GENESIS: 'time_before_genesis',
} as const

export const ALL_ERRORS = {
  ...BEACON_ERRORS,
  ...BLS_ERRORS,
  ...CHAIN_ERRORS,
  ...CLIENT_ERRORS,
} as const

export type ErrorCode = (typeof ALL_ERRORS)[keyof typeof ALL_ERRORS]

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [BEACON_ERRORS.INVALID_PREVIOUS_SIGNATURE_LENGTH]:
    'Previous signature must be 96 bytes',
  [BEACON_ERRORS.INVALID_ROUND]:
    'Round must be an unsigned 64-bit integer',
  [BEACON_ERRORS.INVALID_HEX]: 'Invalid hex string',
  [BEACON_ERRORS.MALFORMED_BEACON]: 'Malformed beacon',
  [BLS_ERRORS.INVALID_PUBLIC_KEY_LENGTH]:
    'Public key has the wrong length for the scheme',
  [BLS_ERRORS.INVALID_SIGNATURE_LENGTH]:
    'Signature has the wrong length for the scheme',
  [BLS_ERRORS.UNSUPPORTED_SCHEME]: 'Unsupported scheme',
  [BLS_ERRORS.POINT_DECODING_FAILED]:
    'Bytes do not decode to a BLS12-381 point',
  [CHAIN_ERRORS.MALFORMED_CHAIN_INFO]: 'Malformed chain info',
  [CHAIN_ERRORS.CHAIN_INFO_INVALID]: 'Chain info is invalid',
  [CLIENT_ERRORS.INVALID_BASE_URL]: 'Invalid base URL',
  [CLIENT_ERRORS.MISSING_PROTOCOL]:
    'Missing protocol, you might need to add "https://" to the provided URL',
  [CLIENT_ERRORS.HTTP_STATUS]: 'Request failed',
  [CLIENT_ERRORS.BEACON_DOES_NOT_VALIDATE]: 'Beacon does not validate',
  [CLIENT_ERRORS.TIME_BEFORE_GENESIS]:
    'Requested time is before the chain genesis',
}

/**
 * Error carrying one of the codes above
 */
export class BeaconError extends Error {
  constructor(
    public readonly code: ErrorCode,
    detail?: string,
  ) {
    super(detail ? `${ERROR_MESSAGES[code]}: ${detail}` : ERROR_MESSAGES[code])
    this.name = 'BeaconError'
  }
}
