import type { Address } from 'viem'

/**
 * Custody side of an escrow. The registry is the only caller of `send`;
 * a `false` result means no value moved.
 */
export interface AssetHolder {
  readonly address: Address
  balance(): Promise<bigint>
  send(recipient: Address, amount: bigint): Promise<boolean>
}

/** Builds (or looks up) the asset holder living at an escrow handle. */
export type HolderProvider = (handle: Address) => AssetHolder
