/**
 * Hash puzzle helpers. The puzzle hash is SHA-256, the hash lock used by
 * HTLCs on the counterparty chain.
 */

import { sha256 } from '@noble/hashes/sha2.js'
import { randomBytes } from '@noble/hashes/utils.js'
import { bytesToHex, hexToBytes, isHex, size, type Hex } from 'viem'
import { PREIMAGE_LENGTH } from '../constants'

export function isBytes32(value: string): value is Hex {
  return isHex(value, { strict: true }) && size(value) === 32
}

export function generatePreimage(): Hex {
  return bytesToHex(randomBytes(PREIMAGE_LENGTH))
}

export function hashPreimage(preimage: Hex): Hex {
  return bytesToHex(sha256(hexToBytes(preimage)))
}

export function verifyPreimage(preimage: Hex, puzzleHash: Hex): boolean {
  return hashPreimage(preimage).toLowerCase() === puzzleHash.toLowerCase()
}
