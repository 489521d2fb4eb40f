/**
 * Asset holders backed by a live chain through viem clients.
 * The custody account signs the outgoing transfers; `send` only reports
 * success once the receipt confirms it.
 */

import {
  erc20Abi,
  getAddress,
  type Account,
  type Address,
  type Chain,
  type Hash,
  type PublicClient,
  type WalletClient,
} from 'viem'
import type { AssetHolder } from './types'

const CHAIN_TIMEOUT_MS = 60_000

export interface ChainHolderConfig {
  pub: Pick<PublicClient, 'getBalance' | 'readContract' | 'waitForTransactionReceipt'>
  wallet: Pick<WalletClient, 'sendTransaction' | 'writeContract'>
  /** Custody account holding the escrowed value */
  account: Account
  chain: Chain
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

abstract class ChainAssetHolder implements AssetHolder {
  readonly address: Address

  constructor(protected readonly config: ChainHolderConfig) {
    this.address = getAddress(config.account.address)
  }

  abstract balance(): Promise<bigint>

  protected abstract submitTransfer(recipient: Address, amount: bigint): Promise<Hash>

  async send(recipient: Address, amount: bigint): Promise<boolean> {
    try {
      const hash = await this.submitTransfer(recipient, amount)
      const receipt = await this.config.pub.waitForTransactionReceipt({ hash, timeout: CHAIN_TIMEOUT_MS })
      if (receipt.status !== 'success') {
        console.error(`Transfer ${hash} to ${recipient} reverted`)
        return false
      }
      return true
    } catch (err) {
      console.error(`Transfer of ${amount} to ${recipient} failed: ${describeError(err)}`)
      return false
    }
  }
}

/** Holds the chain's native currency (ETH on mainnet). */
export class NativeAssetHolder extends ChainAssetHolder {
  balance(): Promise<bigint> {
    return this.config.pub.getBalance({ address: this.address })
  }

  protected submitTransfer(recipient: Address, amount: bigint): Promise<Hash> {
    const { wallet, account, chain } = this.config
    return wallet.sendTransaction({ account, chain, to: recipient, value: amount })
  }
}

/** Holds an ERC-20 token balance. */
export class Erc20AssetHolder extends ChainAssetHolder {
  readonly token: Address

  constructor(config: ChainHolderConfig, token: Address) {
    super(config)
    this.token = getAddress(token)
  }

  balance(): Promise<bigint> {
    return this.config.pub.readContract({
      address: this.token,
      abi: erc20Abi,
      functionName: 'balanceOf',
      args: [this.address],
    })
  }

  protected submitTransfer(recipient: Address, amount: bigint): Promise<Hash> {
    const { wallet, account, chain } = this.config
    return wallet.writeContract({
      address: this.token,
      abi: erc20Abi,
      functionName: 'transfer',
      args: [recipient, amount],
      account,
      chain,
    })
  }
}
