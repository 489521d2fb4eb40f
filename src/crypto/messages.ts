/**
 * Signed message encoding for escrow transitions.
 *
 * Every message is tightly packed as
 *   handle (20 bytes) || type tag (1 byte) || fields...
 * and signed as an EIP-191 personal message, so the digest is
 *   keccak256("\x19Ethereum Signed Message:\n" || byteLength || message)
 *
 * The handle and type tag keep a signature from being replayed against another
 * escrow or reused for a different message family.
 */

import { encodePacked, hashMessage, size, type Address, type Hex } from 'viem'
import {
  MESSAGE_TYPE,
  CASHOUT_MESSAGE_LENGTH,
  REFUND_MESSAGE_LENGTH,
  PUZZLE_MESSAGE_LENGTH,
} from '../constants'
import { EscrowError } from '../errors'

export interface PuzzleTerms {
  /** Amount already agreed to the payee before this puzzle */
  prevAmountTraded: bigint
  /** Amount locked behind the hash puzzle */
  tradeAmount: bigint
  /** sha256(preimage) */
  puzzleHash: Hex
  /** Unix seconds after which the escrower can reclaim tradeAmount */
  puzzleTimelock: bigint
}

export function cashoutMessage(handle: Address, amountTraded: bigint): Hex {
  return encodePacked(
    ['address', 'uint8', 'uint256'],
    [handle, MESSAGE_TYPE.Cashout, amountTraded]
  )
}

export function refundMessage(handle: Address, amountTraded: bigint): Hex {
  return encodePacked(
    ['address', 'uint8', 'uint256'],
    [handle, MESSAGE_TYPE.Refund, amountTraded]
  )
}

export function puzzleMessage(handle: Address, terms: PuzzleTerms): Hex {
  return encodePacked(
    ['address', 'uint8', 'uint256', 'uint256', 'bytes32', 'uint256'],
    [
      handle,
      MESSAGE_TYPE.Puzzle,
      terms.prevAmountTraded,
      terms.tradeAmount,
      terms.puzzleHash,
      terms.puzzleTimelock,
    ]
  )
}

/**
 * EIP-191 digest of a packed message. The length prefix is derived from the
 * encoded bytes; `expectedLength` pins it to the message family's fixed size.
 */
export function messageDigest(raw: Hex, expectedLength: number): Hex {
  const actual = size(raw)
  if (actual !== expectedLength) {
    throw new EscrowError(
      'ERR_INVALID_ARGUMENT',
      `Packed message is ${actual} bytes, expected ${expectedLength}`
    )
  }
  return hashMessage({ raw })
}

export function cashoutDigest(handle: Address, amountTraded: bigint): Hex {
  return messageDigest(cashoutMessage(handle, amountTraded), CASHOUT_MESSAGE_LENGTH)
}

export function refundDigest(handle: Address, amountTraded: bigint): Hex {
  return messageDigest(refundMessage(handle, amountTraded), REFUND_MESSAGE_LENGTH)
}

export function puzzleDigest(handle: Address, terms: PuzzleTerms): Hex {
  return messageDigest(puzzleMessage(handle, terms), PUZZLE_MESSAGE_LENGTH)
}
