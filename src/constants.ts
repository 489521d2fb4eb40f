/**
 * Shared constants for escrow state, message families and timelocks.
 */

export const ESCROW_STATE = {
  None: 0,
  Unfunded: 1,
  Open: 2,
  PuzzlePosted: 3,
  Closed: 4,
} as const

export type EscrowStateValue = typeof ESCROW_STATE[keyof typeof ESCROW_STATE]
export type EscrowStateName = keyof typeof ESCROW_STATE

export const MESSAGE_TYPE = {
  Cashout: 1,
  Puzzle: 2,
  Refund: 3,
} as const

export type MessageTypeValue = typeof MESSAGE_TYPE[keyof typeof MESSAGE_TYPE]

// handle (20) + type tag (1) + uint256 fields (32 each) + bytes32 puzzle hash
export const CASHOUT_MESSAGE_LENGTH = 53
export const REFUND_MESSAGE_LENGTH = 53
export const PUZZLE_MESSAGE_LENGTH = 149

export const FORCE_REFUND_GRACE_SECONDS = 2n * 24n * 60n * 60n

export const PREIMAGE_LENGTH = 32

export const MAX_UINT256 = 2n ** 256n - 1n

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const

const STATE_NAMES: Record<EscrowStateValue, EscrowStateName> = {
  0: 'None',
  1: 'Unfunded',
  2: 'Open',
  3: 'PuzzlePosted',
  4: 'Closed',
}

export function stateName(value: EscrowStateValue): EscrowStateName {
  return STATE_NAMES[value]
}

export function isStateName(value: string): value is EscrowStateName {
  return Object.prototype.hasOwnProperty.call(ESCROW_STATE, value)
}
