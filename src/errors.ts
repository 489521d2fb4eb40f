/**
 * Structured escrow errors with codes, exit codes, and retry hints.
 */

export type ErrorCode =
  | 'ERR_INVALID_STATE'
  | 'ERR_INVALID_SIGNATURE'
  | 'ERR_INVALID_PREIMAGE'
  | 'ERR_UNAUTHORIZED'
  | 'ERR_TIMELOCK_NOT_REACHED'
  | 'ERR_INVALID_AMOUNT'
  | 'ERR_ALREADY_EXISTS'
  | 'ERR_INSUFFICIENT_BALANCE'
  | 'ERR_NO_BALANCE'
  | 'ERR_TRANSFER_FAILED'
  | 'ERR_NOT_FOUND'
  | 'ERR_INVALID_ARGUMENT'
  | 'ERR_INVALID_ADDRESS'
  | 'ERR_MISSING_KEY'
  | 'ERR_STATE_CORRUPT'
  | 'ERR_STATE_LOCKED'

const EXIT_CODES: Record<ErrorCode, number> = {
  ERR_INVALID_ARGUMENT: 1,
  ERR_INVALID_ADDRESS: 1,
  ERR_INVALID_AMOUNT: 1,
  ERR_ALREADY_EXISTS: 1,
  ERR_INVALID_SIGNATURE: 2,
  ERR_INVALID_PREIMAGE: 2,
  ERR_UNAUTHORIZED: 2,
  ERR_MISSING_KEY: 2,
  ERR_INVALID_STATE: 3,
  ERR_TIMELOCK_NOT_REACHED: 3,
  ERR_INSUFFICIENT_BALANCE: 3,
  ERR_NO_BALANCE: 3,
  ERR_TRANSFER_FAILED: 3,
  ERR_NOT_FOUND: 4,
  ERR_STATE_LOCKED: 7,
  ERR_STATE_CORRUPT: 8,
}

const RETRYABLE: Set<ErrorCode> = new Set([
  'ERR_TIMELOCK_NOT_REACHED',
  'ERR_INSUFFICIENT_BALANCE',
  'ERR_TRANSFER_FAILED',
  'ERR_STATE_LOCKED',
])

export class EscrowError extends Error {
  code: ErrorCode
  exitCode: number
  retryable: boolean
  suggestion: string | null
  retryAfterSeconds: number | null

  constructor(code: ErrorCode, message: string, suggestion: string | null = null, retryAfterSeconds: number | null = null) {
    super(message)
    this.name = 'EscrowError'
    this.code = code
    this.exitCode = EXIT_CODES[code]
    this.retryable = RETRYABLE.has(code)
    this.suggestion = suggestion
    this.retryAfterSeconds = retryAfterSeconds
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
        suggestion: this.suggestion,
        retryAfterSeconds: this.retryAfterSeconds,
      },
    }
  }

  toHuman(): string {
    let msg = `error: ${this.code} — ${this.message}`
    if (this.suggestion) msg += `. ${this.suggestion}`
    return msg
  }
}

/**
 * Timelock guard failure. `retryAfterSeconds` is how long until the guard opens.
 */
export function timelockNotReached(label: string, unlocksAt: bigint, now: bigint): EscrowError {
  const wait = unlocksAt - now
  return new EscrowError(
    'ERR_TIMELOCK_NOT_REACHED',
    `${label} timelock not reached`,
    `Retry after ${unlocksAt} (unix seconds)`,
    Number(wait > 0n ? wait : 0n)
  )
}
