/**
 * In-memory account ledger standing in for a chain's native balances.
 * Used by the CLI simulator and the test suite.
 */

import { getAddress, type Address } from 'viem'
import { EscrowError } from '../errors'
import type { AssetHolder } from './types'

export interface LedgerSnapshot {
  balances: Record<string, string>
  rejecting: string[]
}

export class Ledger {
  private balances = new Map<Address, bigint>()
  private rejecting = new Set<Address>()

  balanceOf(address: Address): bigint {
    return this.balances.get(getAddress(address)) ?? 0n
  }

  /** Value entering from outside the ledger (a funder's wallet). */
  deposit(address: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new EscrowError('ERR_INVALID_AMOUNT', 'Deposit amount must be positive')
    }
    const key = getAddress(address)
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount)
  }

  /**
   * Move value between accounts. Fails without side effects when the sender is
   * short or the recipient refuses incoming value.
   */
  transfer(from: Address, to: Address, amount: bigint): boolean {
    const src = getAddress(from)
    const dst = getAddress(to)
    if (amount < 0n) return false
    if (this.rejecting.has(dst)) return false
    const available = this.balances.get(src) ?? 0n
    if (available < amount) return false
    this.balances.set(src, available - amount)
    this.balances.set(dst, (this.balances.get(dst) ?? 0n) + amount)
    return true
  }

  /** Mark an address as a recipient that rejects transfers (e.g. a contract without a payable fallback). */
  setRejecting(address: Address, rejecting: boolean): void {
    const key = getAddress(address)
    if (rejecting) this.rejecting.add(key)
    else this.rejecting.delete(key)
  }

  isRejecting(address: Address): boolean {
    return this.rejecting.has(getAddress(address))
  }

  snapshot(): LedgerSnapshot {
    const balances: Record<string, string> = {}
    for (const [address, amount] of this.balances) {
      balances[address] = amount.toString()
    }
    return { balances, rejecting: [...this.rejecting] }
  }

  static restore(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger()
    for (const [address, amount] of Object.entries(snapshot.balances)) {
      ledger.balances.set(getAddress(address), BigInt(amount))
    }
    for (const address of snapshot.rejecting) {
      ledger.rejecting.add(getAddress(address))
    }
    return ledger
  }
}

export class LedgerAssetHolder implements AssetHolder {
  readonly address: Address

  constructor(private readonly ledger: Ledger, address: Address) {
    this.address = getAddress(address)
  }

  async balance(): Promise<bigint> {
    return this.ledger.balanceOf(this.address)
  }

  async send(recipient: Address, amount: bigint): Promise<boolean> {
    return this.ledger.transfer(this.address, recipient, amount)
  }
}
