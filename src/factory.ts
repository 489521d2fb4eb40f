/**
 * Escrow factory: derives deterministic handles and registers escrows with
 * the registry it holds the factory capability for.
 *
 * The handle is known before registration, so the escrower can fund it first
 * and have the escrow opened in the same step it is created.
 */

import { encodePacked, getAddress, keccak256, slice, type Address } from 'viem'
import { ZERO_ADDRESS } from './constants'
import { EscrowError } from './errors'
import { requireUint256, toAddress, type EscrowRegistry, type FactoryCapability } from './registry'
import type { HolderProvider } from './holders/types'
import type { EscrowParams, EscrowRecord } from './types'

/**
 * Deterministic escrow handle: the last 20 bytes of
 * keccak256(factory || asset || amount || timelock || five role addresses).
 * `asset` is the zero address for the chain's native currency.
 */
export function computeEscrowHandle(params: EscrowParams, factory: Address, asset: Address = ZERO_ADDRESS): Address {
  requireUint256(params.amount, 'Escrow amount', 'ERR_INVALID_AMOUNT')
  requireUint256(params.timelock, 'Escrow timelock', 'ERR_INVALID_ARGUMENT')
  const packed = encodePacked(
    ['address', 'address', 'uint256', 'uint256', 'address', 'address', 'address', 'address', 'address'],
    [
      toAddress(factory, 'factory'),
      toAddress(asset, 'asset'),
      params.amount,
      params.timelock,
      toAddress(params.escrowerReserve, 'escrowerReserve'),
      toAddress(params.escrowerTrade, 'escrowerTrade'),
      toAddress(params.escrowerRefund, 'escrowerRefund'),
      toAddress(params.payeeReserve, 'payeeReserve'),
      toAddress(params.payeeTrade, 'payeeTrade'),
    ]
  )
  return getAddress(slice(keccak256(packed), 12))
}

export interface FactoryOptions {
  /** Factory identity mixed into every handle */
  address: Address
  /** Token contract, or the zero address for native value */
  asset?: Address
  holders: HolderProvider
}

export class EscrowFactory {
  readonly address: Address
  readonly asset: Address
  private readonly capability: FactoryCapability
  private readonly holders: HolderProvider

  constructor(private readonly registry: EscrowRegistry, options: FactoryOptions) {
    this.address = toAddress(options.address, 'factory')
    this.asset = toAddress(options.asset ?? ZERO_ADDRESS, 'asset')
    this.holders = options.holders
    this.capability = registry.issueFactoryCapability()
  }

  handleFor(params: EscrowParams): Address {
    return computeEscrowHandle(params, this.address, this.asset)
  }

  /**
   * Register an escrow for `params` and open it right away when its handle
   * already holds the full amount.
   */
  async createEscrow(params: EscrowParams): Promise<EscrowRecord> {
    if (params.amount <= 0n) {
      throw new EscrowError('ERR_INVALID_AMOUNT', 'Escrow amount must be greater than zero')
    }
    const handle = this.handleFor(params)
    const holder = this.holders(handle)
    const created = await this.registry.create(this.capability, handle, params, holder)

    const held = await holder.balance()
    if (held < created.amount) return created
    return this.registry.open(handle)
  }
}
