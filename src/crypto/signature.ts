/**
 * Signature verification and message signing for escrow roles.
 */

import { recoverAddress, isAddressEqual, isHex, size, type Address, type Hex, type LocalAccount } from 'viem'
import { cashoutMessage, refundMessage, puzzleMessage, type PuzzleTerms } from './messages'

/**
 * Recover the signer of a 32-byte digest.
 * Returns null for anything that is not a well-formed 64/65-byte signature;
 * a bad signature is a rejection, never a match.
 */
export async function recoverSigner(digest: Hex, signature: string): Promise<Address | null> {
  if (!isHex(signature, { strict: true })) return null
  const length = size(signature)
  if (length !== 64 && length !== 65) return null
  return recoverAddress({ hash: digest, signature }).catch(() => null)
}

export async function isSignedBy(digest: Hex, signature: string, expected: Address): Promise<boolean> {
  const signer = await recoverSigner(digest, signature)
  return signer !== null && isAddressEqual(signer, expected)
}

export function signCashout(account: LocalAccount, handle: Address, amountTraded: bigint): Promise<Hex> {
  return account.signMessage({ message: { raw: cashoutMessage(handle, amountTraded) } })
}

export function signRefund(account: LocalAccount, handle: Address, amountTraded: bigint): Promise<Hex> {
  return account.signMessage({ message: { raw: refundMessage(handle, amountTraded) } })
}

export function signPuzzle(account: LocalAccount, handle: Address, terms: PuzzleTerms): Promise<Hex> {
  return account.signMessage({ message: { raw: puzzleMessage(handle, terms) } })
}
