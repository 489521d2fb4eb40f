import type { Address, Hex } from 'viem'
import type { EscrowStateValue } from './constants'

export type Claimant = 'escrower' | 'payee'

export type CloseReason =
  | 'cashout'
  | 'refund'
  | 'force-refund'
  | 'puzzle-solved'
  | 'puzzle-refunded'

/** Immutable parameters fixed at registration. */
export interface EscrowParams {
  /** Total value expected at funding */
  amount: bigint
  /** Unix seconds; earliest signed refund */
  timelock: bigint
  escrowerReserve: Address
  escrowerTrade: Address
  escrowerRefund: Address
  payeeReserve: Address
  payeeTrade: Address
}

export interface EscrowRecord extends EscrowParams {
  handle: Address
  state: EscrowStateValue
  /** Credited to the escrower, not yet paid out */
  escrowerBalance: bigint
  /** Credited to the payee, not yet paid out */
  payeeBalance: bigint
  escrowerWithdrawn: bigint
  payeeWithdrawn: bigint
  /** Over-funding the escrower is owed because returning it at open failed */
  escrowerExcess: bigint
  closeReason: CloseReason | null
}

export interface PuzzleRecord {
  handle: Address
  tradeAmount: bigint
  puzzleHash: Hex
  puzzleTimelock: bigint
  /** Digest both trade keys signed to post this puzzle */
  authorizingSighash: Hex
}

export interface RegistrySnapshot {
  records: EscrowRecord[]
  puzzles: PuzzleRecord[]
}

export interface EscrowEvents {
  Opened: { handle: Address; amount: bigint; timelock: bigint }
  Funded: { handle: Address; amount: bigint; excess: bigint }
  PuzzlePosted: {
    handle: Address
    tradeAmount: bigint
    puzzleHash: Hex
    puzzleTimelock: bigint
    sighash: Hex
  }
  PreimageRevealed: { handle: Address; puzzleHash: Hex; preimage: Hex }
  Closed: { handle: Address; reason: CloseReason }
  FundsTransferred: { handle: Address; party: Claimant; recipient: Address; amount: bigint }
  TransferFailed: { handle: Address; party: Claimant; recipient: Address; amount: bigint }
}

export type EscrowEventName = keyof EscrowEvents
